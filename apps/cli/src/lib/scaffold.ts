import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { UsageError } from './errors';
import { pathExists, readTextFile, writeFile } from './fs';
import { templatePath } from './resources';
import { renderTemplateFile } from './template';

export const CONFIG_FORMATS = ['yaml', 'json'] as const;

export type ConfigFormat = (typeof CONFIG_FORMATS)[number];

const JOB_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function assertJobName(name: string): void {
  if (!JOB_NAME_PATTERN.test(name)) {
    throw new UsageError(`Invalid name "${name}": use letters, digits, ".", "_" or "-"`);
  }
}

export function isConfigFormat(value: string): value is ConfigFormat {
  return CONFIG_FORMATS.some((format) => format === value);
}

/** The configuration file `new` would write, if one already exists. */
export async function findExistingJobConfig(directory: string, name: string): Promise<string | null> {
  for (const format of CONFIG_FORMATS) {
    const candidate = path.resolve(directory, name, `${name}.${format}`);
    if (await pathExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/** Renders a job template into `<directory>/<name>/<name>.<format>`. */
export async function writeJobConfig(
  template: string,
  directory: string,
  name: string,
  format: ConfigFormat
): Promise<string> {
  const jobDir = path.resolve(directory, name);
  const yamlFile = await renderTemplateFile(templatePath(template), path.join(jobDir, `${name}.yaml`), { name });
  if (format === 'yaml') {
    return yamlFile;
  }
  const data: unknown = parse(await readTextFile(yamlFile));
  const jsonFile = path.join(jobDir, `${name}.json`);
  await writeFile(jsonFile, `${JSON.stringify(data, null, 2)}\n`);
  await fs.rm(yamlFile);
  return jsonFile;
}
