import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { AppConfig } from './appConfig';
import { openBrowser } from './browser';
import { buildStepImage } from './dockerImage';
import { getCliEnv } from './env';
import { ProcessError } from './errors';
import { ensureDir, pathExists, touch } from './fs';
import { CONTAINER_WORK_DIR, JobConfig } from './jobConfig';
import { getLogger } from './logger';
import { LogPatternWatcher } from './logPattern';
import { DEFAULT_NOTEBOOK_FORMAT, ensureNotebookDir, notebookFormat, notebookPaths } from './notebook';
import { runProcess, startProcess } from './process';
import { templatePath } from './resources';
import { assertJobName, writeJobConfig, type ConfigFormat } from './scaffold';
import { renderTemplateFile } from './template';

export type NotebookParameter = [name: string, value: string];

export type JupyterRunOptions = {
  prepareOnly?: boolean;
  /** Papermill `-p` parameters, applied after the ones from the configuration. */
  param?: NotebookParameter[];
  /** Papermill `-r` raw parameters. */
  paramRaw?: NotebookParameter[];
};

export type JupyterEditOptions = Omit<JupyterRunOptions, 'prepareOnly'> & {
  openBrowser?: boolean;
};

export type JupyterNewOptions = {
  format?: ConfigFormat;
  openBrowser?: boolean;
  app?: AppConfig;
};

export type LabOptions = {
  port: number;
  folder: string;
  openBrowser?: boolean;
};

export const LAB_PORT = 10000;
export const SPARK_UI_PORT = 4040;
export const STEP_LIST_FILES = ['apt_repository.txt', 'apt_packages.txt', 'requirements.txt', 'lab_extensions.txt'];

// Older notebook servers print `:8888/?token=`, jupyter_server prints `:8888/lab?token=`.
export const LAB_TOKEN_PATTERN = /http:\/\/\S*:8888\/(?:lab)?\?token=([a-zA-Z0-9]+)/;

export function bindMount(source: string, target: string, readonly = false): string[] {
  return ['--mount', `type=bind,source=${source},target=${target}${readonly ? ',readonly' : ''}`];
}

export async function envFileArgs(files: string[]): Promise<string[]> {
  const args: string[] = [];
  for (const file of files) {
    if (await pathExists(file)) {
      args.push('--env-file', file);
    }
  }
  return args;
}

function stepFormat(conf: JobConfig): string {
  const { task } = conf.requireStep().settings;
  return notebookFormat(task.code_format, task.jupytext_format);
}

/** Mounts the configuration file and the image list files next to the notebooks. */
export async function prepareDockerImageEnv(conf: JobConfig): Promise<string[]> {
  const image = conf.requireStep().settings.docker_image;
  const args: string[] = [];
  const configPath = conf.configPath();
  if (configPath) {
    args.push(...bindMount(configPath, path.posix.join(CONTAINER_WORK_DIR, path.basename(configPath))));
  }
  const listFiles = [image.apt_repository_path, image.apt_package_path, image.requirements_path, image.lab_extension_path];
  for (const relative of listFiles) {
    if (!relative) {
      continue;
    }
    const file = conf.resolvePath(relative);
    if (await pathExists(file)) {
      args.push(...bindMount(file, path.posix.join(CONTAINER_WORK_DIR, path.basename(file))));
    }
  }
  return args;
}

async function mountPaths(
  conf: JobConfig,
  entries: Record<string, string>[],
  target: string,
  options: { readonly?: boolean; create?: boolean } = {}
): Promise<string[]> {
  const args: string[] = [];
  for (const entry of entries) {
    for (const [name, relative] of Object.entries(entry)) {
      const source = conf.resolvePath(relative);
      if (options.create) {
        await ensureDir(source);
      }
      if (await pathExists(source)) {
        args.push(...bindMount(source, path.posix.join(target, name), options.readonly));
      } else {
        getLogger().warn(`${source} does not exist, it is not mounted in ${target}`);
      }
    }
  }
  return args;
}

/** Notebook, module, data and execution directory mounts of the selected step. */
export async function prepareTaskEnv(conf: JobConfig): Promise<string[]> {
  const { task } = conf.requireStep().settings;
  const { notebook } = await ensureNotebookDir(conf.resolvePath(task.code_path), stepFormat(conf));
  const args = bindMount(path.dirname(notebook), path.posix.join(CONTAINER_WORK_DIR, 'notebook'));

  args.push(...(await mountPaths(conf, task.modules_src_path, path.posix.join(CONTAINER_WORK_DIR, 'modules'), { readonly: true })));
  args.push(...(await mountPaths(conf, task.input_data_path, path.posix.join(CONTAINER_WORK_DIR, 'data', 'input'), { readonly: true })));
  args.push(...(await mountPaths(conf, task.output_data_path, path.posix.join(CONTAINER_WORK_DIR, 'data', 'output'), { create: true })));

  const executionDir = conf.resolvePath(task.execution_dir_path);
  await ensureDir(executionDir);
  args.push(...bindMount(executionDir, path.posix.join(CONTAINER_WORK_DIR, 'notebook_run')));
  return args;
}

/** Arguments of `docker run` for the selected step, ending with `program`. */
export async function prepareDockerEnv(conf: JobConfig, program: string[], reason: string): Promise<string[]> {
  const { settings } = conf.requireStep();
  const args = [
    'run',
    '--name',
    `${conf.stepContainerName()}_${reason}`,
    '--rm',
    '-p',
    `${LAB_PORT}:8888`,
    '-p',
    `${SPARK_UI_PORT}:4040`
  ];
  args.push(...(await envFileArgs(await conf.app.userEnvFiles(settings.task.env, conf.rootDir()))));
  args.push(...(await prepareDockerImageEnv(conf)));
  args.push(...(await prepareTaskEnv(conf)));
  args.push(...settings.docker_image.docker_extra_options);
  args.push(...program);
  return args;
}

async function requireStepImage(conf: JobConfig): Promise<string> {
  const imageId = await buildStepImage(conf);
  if (!imageId) {
    throw new Error(`Failed to build the docker image of step ${conf.requireStep().name}`);
  }
  return imageId;
}

async function runPapermill(conf: JobConfig, imageId: string, options: JupyterRunOptions): Promise<string> {
  const step = conf.requireStep();
  const { task } = step.settings;
  const notebookName = path.basename(notebookPaths(task.code_path, stepFormat(conf)).notebook);
  const input = path.posix.join(CONTAINER_WORK_DIR, 'notebook', notebookName);
  const output = conf.stepNotebookOutputPath(input);

  const program = [imageId, 'start-papermill.sh', 'papermill', input, output];
  if (options.prepareOnly) {
    program.push('--prepare-only');
  }
  program.push(...conf.stepExtractParameters());
  for (const [name, value] of options.param ?? []) {
    program.push('-p', name, value);
  }
  for (const [name, value] of options.paramRaw ?? []) {
    program.push('-r', name, value);
  }

  const args = await prepareDockerEnv(conf, program, 'run');
  const watcher = new LogPatternWatcher();
  const exitCode = await runProcess('docker', args, { onLine: watcher.handleLine });
  if (exitCode !== 0) {
    throw new ProcessError('docker', exitCode, `Notebook run of step ${step.name} exited with code ${exitCode ?? 'unknown'}`);
  }
  return path.join(conf.resolvePath(task.execution_dir_path), path.basename(output));
}

/** Runs the step notebook through papermill and resolves with the output notebook on the host. */
export async function jupyterRun(conf: JobConfig, options: JupyterRunOptions = {}): Promise<string> {
  const imageId = await requireStepImage(conf);
  return runPapermill(conf, imageId, options);
}

/**
 * Starts a detached `docker run` of jupyter lab and polls its output for the
 * access token. Resolves with the lab url, or an empty string when no token
 * showed up in time.
 */
export async function waitForJupyterLab(dockerArgs: string[], notebook: string, options: LabOptions): Promise<string> {
  const logger = getLogger();
  const env = getCliEnv();
  const watcher = new LogPatternWatcher(LAB_TOKEN_PATTERN);
  const state: { failure: Error | null } = { failure: null };

  const handle = startProcess('docker', dockerArgs, { onLine: watcher.handleLine });
  void handle.completion.then(
    (exitCode) => {
      logger.debug(`Jupyter lab container exited with code ${exitCode ?? 'unknown'}`);
    },
    (err: unknown) => {
      state.failure = err instanceof Error ? err : new Error(String(err));
    }
  );

  for (let attempt = 1; attempt <= env.labWaitAttempts && !watcher.artifact; attempt += 1) {
    await delay(env.labWaitIntervalMs);
    if (state.failure) {
      throw state.failure;
    }
    if (!watcher.artifact) {
      logger.warn(`docker run does not seem to be up yet... retrying (${attempt}/${env.labWaitAttempts})`);
    }
  }

  const token = watcher.artifact;
  if (!token) {
    logger.error('Jupyter lab did not report an access token');
    return '';
  }
  const url = `http://localhost:${options.port}/lab/tree/${options.folder}/${notebook}?token=${token}`;
  logger.info(`Jupyter lab is available at ${url}`);
  if (options.openBrowser) {
    openBrowser(url);
  }
  return url;
}

/** Opens the step notebook in jupyter lab, preparing parameters first when there are any. */
export async function jupyterEdit(conf: JobConfig, options: JupyterEditOptions = {}): Promise<string> {
  const imageId = await requireStepImage(conf);
  const param = options.param ?? [];
  const paramRaw = options.paramRaw ?? [];
  if (conf.stepExtractParameters().length > 0 || param.length > 0 || paramRaw.length > 0) {
    await runPapermill(conf, imageId, { prepareOnly: true, param, paramRaw });
  }

  const { task } = conf.requireStep().settings;
  const notebookName = path.basename(notebookPaths(task.code_path, stepFormat(conf)).notebook);
  const args = await prepareDockerEnv(conf, [imageId, 'start.sh', 'jupyter', 'lab'], 'edit');
  return waitForJupyterLab(args, notebookName, {
    port: LAB_PORT,
    folder: 'work/notebook',
    openBrowser: options.openBrowser
  });
}

/** Scaffolds `<directory>/<name>/` from the step template and opens it. */
export async function jupyterNew(name: string, directory: string, options: JupyterNewOptions = {}): Promise<string> {
  assertJobName(name);
  const file = await writeJobConfig('step.yaml', directory, name, options.format ?? 'yaml');
  const stepDir = path.dirname(file);
  await renderTemplateFile(templatePath('notebook.json'), path.join(stepDir, 'notebook', `${name}.ipynb`), {
    format: DEFAULT_NOTEBOOK_FORMAT
  });
  for (const listFile of STEP_LIST_FILES) {
    await touch(path.join(stepDir, listFile));
  }
  const conf = await JobConfig.load(file, { step: name }, options.app);
  return jupyterEdit(conf, { openBrowser: options.openBrowser });
}
