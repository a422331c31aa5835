import { z } from 'zod';
import { ConfigMissingError, ConfigTypeError } from './errors';

const scalar = z.union([z.string(), z.number(), z.boolean()]);

/** `[{name: relative/path}]` lists used for mounts. */
const pathMapList = z.array(z.record(z.string()));

const envList = z.array(z.union([z.string(), z.record(scalar)]));

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const appSettingsSchema = z
  .object({
    app_config_home_directory: z.string().optional(),
    timezone: z.string().refine(isTimeZone, (value) => ({ message: `Unknown IANA timezone ${value}` })),
    metadata: z
      .object({
        user: z.object({ id: z.string() }).passthrough(),
        generation_date: z.string().optional(),
        version: z.string().optional()
      })
      .passthrough(),
    jupyter: z
      .object({
        dockerfile_src: z.array(z.string()).optional(),
        docker_image: z
          .object({
            allow_apt_repository: z.boolean().default(false),
            allow_apt_packages: z.boolean().default(true),
            allow_requirements: z.boolean().default(true),
            allow_lab_extensions: z.boolean().default(true)
          })
          .passthrough()
          .default({})
      })
      .passthrough()
      .default({}),
    airflow: z
      .object({
        docker_compose_file: z.string().optional(),
        dags_folder: z.string().optional(),
        setup: z
          .object({ workspace_paths: z.array(z.string()).default([]) })
          .passthrough()
          .default({})
      })
      .passthrough()
      .default({})
  })
  .passthrough();

export const appConfigSchema = z.object({ labflow: appSettingsSchema }).passthrough();

export type AppSettings = z.output<typeof appSettingsSchema>;

export const dockerImageSchema = z
  .object({
    input_docker_src: z.string().default('jupyter-spark'),
    apt_repository_path: z.string().optional(),
    apt_package_path: z.string().optional(),
    requirements_path: z.string().optional(),
    lab_extension_path: z.string().optional(),
    output_docker_name: z.string().optional(),
    output_docker_tag: z.string().optional(),
    docker_extra_options: z.array(z.string()).default([])
  })
  .passthrough();

export type DockerImageSettings = z.output<typeof dockerImageSchema>;

export const stepSchema = z
  .object({
    task: z
      .object({
        type: z.string(),
        code_path: z.string(),
        code_format: z.string().default('py'),
        jupytext_format: z.string().default('percent'),
        execution_dir_path: z.string().default('notebook_run'),
        modules_src_path: pathMapList.default([]),
        input_data_path: pathMapList.default([]),
        output_data_path: pathMapList.default([]),
        parameters: z.array(z.record(scalar)).default([]),
        env: envList.default([])
      })
      .passthrough(),
    docker_image: dockerImageSchema.default({})
  })
  .passthrough();

export type StepSettings = z.output<typeof stepSchema>;

export const dagSchema = z
  .object({
    definition: z
      .object({
        code_path: z.string(),
        code_format: z.string().default('py'),
        jupytext_format: z.string().default('percent')
      })
      .passthrough(),
    docker_image: dockerImageSchema.default({}),
    env: envList.default([])
  })
  .passthrough();

export type DagSettings = z.output<typeof dagSchema>;

export type EnvEntry = z.output<typeof envList>[number];

/**
 * Parses a configuration section, turning the first schema issue into a
 * `ConfigMissingError` (absent key) or a `ConfigTypeError` (anything else).
 */
export function parseSection<T extends z.ZodTypeAny>(schema: T, value: unknown, context: string): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const location = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
  if (issue && issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    throw new ConfigMissingError(`${context}: missing definition of ${location}`);
  }
  throw new ConfigTypeError(`${context}: type mismatch for ${location}: ${issue?.message ?? 'invalid value'}`);
}
