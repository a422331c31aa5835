import { randomBytes } from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import { parseDocument, type Document } from 'yaml';
import { appConfigSchema, parseSection, type AppSettings, type EnvEntry } from './configSchemas';
import { getCliEnv } from './env';
import { ConfigTypeError } from './errors';
import { createTempDir, pathExists, readTextFile, touch, writeFile } from './fs';
import { getLogger } from './logger';
import { templatePath } from './resources';
import { renderTemplateFile } from './template';
import { LABFLOW_VERSION } from './version';

export const APP_CONFIG_FILENAME = 'labflow.yaml';
export const USER_LIST_FILES = ['apt_packages.txt', 'requirements.txt', 'lab_extensions.txt'];

const CONTEXT = 'In global application configuration';

export function expandHome(target: string): string {
  if (target === '~' || target.startsWith('~/')) {
    return path.join(os.homedir(), target.slice(1));
  }
  return target;
}

export function defaultAppConfigHome(): string {
  return getCliEnv().home ?? path.join(os.homedir(), '.labflow');
}

export function appConfigFile(): string {
  return path.join(defaultAppConfigHome(), 'config', APP_CONFIG_FILENAME);
}

/** `u` followed by the decimal value of the first hardware address found. */
export function generateUserId(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): string {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (!entry.internal && entry.mac && entry.mac !== '00:00:00:00:00:00') {
        return `u${BigInt(`0x${entry.mac.replace(/:/g, '')}`).toString()}`;
      }
    }
  }
  return `u${BigInt(`0x${randomBytes(6).toString('hex')}`).toString()}`;
}

export function detectTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';
}

export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((entry) => entry.type === type)?.value ?? '00';
  return `${part('year')}${part('month')}${part('day')}${part('hour')}${part('minute')}${part('second')}`;
}

export async function generateAppConfig(file: string, home: string): Promise<void> {
  await renderTemplateFile(templatePath(APP_CONFIG_FILENAME), file, {
    home,
    timezone: detectTimezone(),
    user_id: generateUserId(),
    generation_date: new Date().toISOString(),
    version: LABFLOW_VERSION
  });
  for (const name of USER_LIST_FILES) {
    await touch(path.join(path.dirname(file), name));
  }
  getLogger().info(`Generated new configuration file: ${file}`);
}

export type SetupAppConfigOptions = {
  configHome?: string;
  force?: boolean;
};

export type SetupAppConfigResult = {
  file: string;
  created: boolean;
};

export async function setupAppConfig(options: SetupAppConfigOptions = {}): Promise<SetupAppConfigResult> {
  const file = appConfigFile();
  let created = false;
  if (options.force || !(await pathExists(file))) {
    await generateAppConfig(file, defaultAppConfigHome());
    created = true;
  }
  if (options.configHome) {
    const app = await AppConfig.load(file);
    await app.redefineAppConfigHome(options.configHome);
  }
  return { file, created };
}

function parseSettings(document: Document.Parsed, file: string): AppSettings {
  if (document.errors.length > 0) {
    throw new ConfigTypeError(`Unable to parse ${file}: ${document.errors[0].message}`);
  }
  const data: unknown = document.toJS();
  return parseSection(appConfigSchema, data, CONTEXT).labflow;
}

/**
 * The per-user `labflow.yaml`. Edits go through the YAML document so that
 * comments and key order in the file survive a rewrite.
 */
export class AppConfig {
  private constructor(
    readonly filePath: string,
    private readonly document: Document.Parsed,
    private current: AppSettings
  ) {}

  static async load(file: string = appConfigFile()): Promise<AppConfig> {
    if (!(await pathExists(file))) {
      await generateAppConfig(file, defaultAppConfigHome());
    }
    const document = parseDocument(await readTextFile(file));
    return new AppConfig(file, document, parseSettings(document, file));
  }

  get settings(): AppSettings {
    return this.current;
  }

  appConfigHome(): string {
    const configured = this.current.app_config_home_directory?.trim();
    return configured ? path.resolve(expandHome(configured)) : defaultAppConfigHome();
  }

  timezone(): string {
    return this.current.timezone;
  }

  userId(): string {
    return this.current.metadata.user.id;
  }

  timestampNow(date: Date = new Date()): string {
    return formatTimestamp(date, this.timezone());
  }

  dockerfileSources(): string[] {
    return (this.current.jupyter.dockerfile_src ?? []).map((entry) => path.resolve(expandHome(entry)));
  }

  airflowWorkspaces(): string[] {
    return this.current.airflow.setup.workspace_paths;
  }

  dockerComposeFile(): string {
    const configured = this.current.airflow.docker_compose_file;
    return configured
      ? path.resolve(expandHome(configured))
      : path.join(this.appConfigHome(), 'config', 'docker-compose-CeleryExecutor.yml');
  }

  dagsFolder(): string {
    const configured = this.current.airflow.dags_folder;
    return configured ? path.resolve(expandHome(configured)) : path.join(this.appConfigHome(), 'workspace', 'dags');
  }

  async redefineAppConfigHome(home: string): Promise<void> {
    this.document.setIn(['labflow', 'app_config_home_directory'], path.resolve(expandHome(home)));
    await this.save();
  }

  async redefineAirflowWorkspaces(workspaces: string[]): Promise<void> {
    const resolved = workspaces.map((entry) => path.resolve(expandHome(entry)));
    this.document.setIn(['labflow', 'airflow', 'setup', 'workspace_paths'], this.document.createNode(resolved));
    await this.save();
  }

  /**
   * Environment files for docker. Job `env` entries (variable maps, or env
   * files relative to `rootDir`) are merged into one temporary file; the
   * user's `<home>/config/.env` always comes last. Files may not exist.
   */
  async userEnvFiles(entries: EnvEntry[] = [], rootDir: string | null = null): Promise<string[]> {
    const files: string[] = [];
    if (entries.length > 0) {
      const chunks: string[] = [];
      for (const entry of entries) {
        if (typeof entry === 'string') {
          const envFile = path.resolve(rootDir ?? process.cwd(), entry);
          if (await pathExists(envFile)) {
            const content = await readTextFile(envFile);
            chunks.push(content.endsWith('\n') || content.length === 0 ? content : `${content}\n`);
          } else {
            getLogger().warn(`Environment file ${envFile} was not found, skipping`);
          }
          continue;
        }
        for (const [key, value] of Object.entries(entry)) {
          chunks.push(`${key}=${String(value)}\n`);
        }
      }
      const dir = await createTempDir('labflow_');
      const merged = path.join(dir, 'job.env');
      await writeFile(merged, chunks.join(''));
      files.push(merged);
    }
    files.push(path.join(this.appConfigHome(), 'config', '.env'));
    return files;
  }

  validate(): void {
    this.current = parseSettings(this.document, this.filePath);
  }

  private async save(): Promise<void> {
    await writeFile(this.filePath, this.document.toString());
    this.validate();
  }
}
