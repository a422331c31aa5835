import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { AppConfig, expandHome } from './appConfig';
import { dagSchema, parseSection, stepSchema, type DagSettings, type StepSettings } from './configSchemas';
import { ConfigMissingError, ConfigTypeError } from './errors';
import { readTextFile } from './fs';

export type ConfigNode = Record<string, unknown>;

export type ConfigCandidate = {
  name: string;
  node: ConfigNode;
};

export type JobSelection = {
  step?: string | null;
  dag?: string | null;
};

export type SelectedStep = {
  name: string;
  settings: StepSettings;
};

export type SelectedDag = {
  name: string;
  settings: DagSettings;
};

export const CONTAINER_WORK_DIR = '/home/jovyan/work';

export function isConfigNode(value: unknown): value is ConfigNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Every node below `tree` holding a `childNode` key, named by its dotted path. */
export function findConfigTree(tree: ConfigNode, childNode: string, prefix: string[] = []): ConfigCandidate[] {
  const candidates: ConfigCandidate[] = [];
  for (const [key, value] of Object.entries(tree)) {
    if (!isConfigNode(value)) {
      continue;
    }
    const location = [...prefix, key];
    if (childNode in value) {
      candidates.push({ name: location.join('.'), node: value });
    } else {
      candidates.push(...findConfigTree(value, childNode, location));
    }
  }
  return candidates;
}

export function selectConfig(
  document: ConfigNode,
  rootNode: string,
  childNode: string,
  selection?: string | null
): ConfigCandidate | null {
  const root = document[rootNode];
  const candidates = isConfigNode(root) ? findConfigTree(root, childNode) : [];
  if (!selection) {
    return candidates[0] ?? null;
  }
  const match = candidates.find((candidate) => candidate.name === selection);
  if (!match) {
    const available = candidates.map((candidate) => candidate.name).join(' ');
    throw new ConfigMissingError(
      `${selection}'s ${childNode} was not found in ${rootNode} configurations. Available candidates are: ${available}`
    );
  }
  return match;
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

function normalizeName(name: string): string {
  return name.replace(/\./g, '_');
}

/**
 * A job configuration file (or inline document) with one step and/or one dag
 * selected from its `steps` and `dags` trees.
 */
export class JobConfig {
  private constructor(
    readonly app: AppConfig,
    private readonly file: string | null,
    readonly document: ConfigNode,
    readonly step: SelectedStep | null,
    readonly dag: SelectedDag | null
  ) {}

  static async load(source: string, selection: JobSelection = {}, app?: AppConfig): Promise<JobConfig> {
    const appConfig = app ?? (await AppConfig.load());

    let file: string | null = null;
    let text = source;
    if (await isFile(source)) {
      file = await fs.realpath(source);
      text = await readTextFile(file);
    }

    let data: unknown;
    try {
      data = parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigTypeError(`Unable to parse job configuration ${file ?? '<inline>'}: ${message}`);
    }
    if (!isConfigNode(data)) {
      throw new ConfigTypeError(`${source} is neither a job configuration file nor a configuration document`);
    }

    const stepCandidate = selectConfig(data, 'steps', 'task', selection.step);
    const dagCandidate = selectConfig(data, 'dags', 'definition', selection.dag);

    const step = stepCandidate
      ? {
          name: stepCandidate.name,
          settings: parseSection(stepSchema, stepCandidate.node, `In step named ${stepCandidate.name}`)
        }
      : null;
    const dag = dagCandidate
      ? {
          name: dagCandidate.name,
          settings: parseSection(dagSchema, dagCandidate.node, `In dag named ${dagCandidate.name}`)
        }
      : null;

    return new JobConfig(appConfig, file, data, step, dag);
  }

  configPath(): string | null {
    return this.file;
  }

  rootDir(): string {
    return this.file ? path.dirname(this.file) : process.cwd();
  }

  /** Absolute path of a location written relative to the configuration file. */
  resolvePath(relative: string): string {
    return path.resolve(this.rootDir(), expandHome(relative));
  }

  requireStep(): SelectedStep {
    if (!this.step) {
      throw new ConfigMissingError('No step with a task definition was found in the steps configurations');
    }
    return this.step;
  }

  requireDag(): SelectedDag {
    if (!this.dag) {
      throw new ConfigMissingError('No dag with a definition was found in the dags configurations');
    }
    return this.dag;
  }

  stepContainerName(): string {
    const step = this.requireStep();
    return `${step.settings.task.type}_${normalizeName(step.name)}`;
  }

  dagContainerName(): string {
    return `airflow_${normalizeName(this.requireDag().name)}`;
  }

  stepExtractParameters(): string[] {
    const args: string[] = [];
    for (const entry of this.requireStep().settings.task.parameters) {
      for (const [key, value] of Object.entries(entry)) {
        args.push('-p', key, String(value));
      }
    }
    return args;
  }

  stepNotebookOutputPath(notebook: string): string {
    const base = path.basename(notebook).replace('.ipynb', '');
    const stamp = `${this.app.timestampNow()}${this.app.userId()}`;
    return path.posix.join(CONTAINER_WORK_DIR, 'notebook_run', `${base}_${stamp}.ipynb`);
  }
}
