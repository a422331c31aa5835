import { promises as fs } from 'node:fs';
import path from 'node:path';
import { expandHome, type AppConfig } from './appConfig';
import { AIRFLOW_IMAGE, buildAirflowImage } from './dockerImage';
import { ConfigMissingError, ProcessError } from './errors';
import { ensureDir, pathExists, readTextFile, touch, writeFile } from './fs';
import { JobConfig } from './jobConfig';
import { bindMount, envFileArgs, waitForJupyterLab, type JupyterNewOptions } from './jupyter';
import { getLogger } from './logger';
import { DEFAULT_NOTEBOOK_FORMAT, ensureNotebook, ensureNotebookDir, notebookFormat } from './notebook';
import { runProcess } from './process';
import { resourcePath, templatePath } from './resources';
import { assertJobName, writeJobConfig } from './scaffold';
import { renderTemplateFile } from './template';

export const AIRFLOW_LAB_PORT = 10001;
export const AIRFLOW_HOME = '/usr/local/airflow';
export const COMPOSE_FILES = ['docker-compose-CeleryExecutor.yml', 'docker-compose-LocalExecutor.yml'];
export const SERVICE_URLS = ['http://localhost:8080 (airflow webserver)', 'http://localhost:5555 (celery flower)'];

export type AirflowSetupOptions = {
  append?: boolean;
  /** Host group database the docker group id is read from. */
  groupFile?: string;
};

export type AirflowSetupResult = {
  home: string;
  workspaces: string[];
  imageId: string;
};

export type AirflowEditOptions = {
  openBrowser?: boolean;
};

export function dagFileName(name: string): string {
  return `${name.replace(/\./g, '_')}.py`;
}

/**
 * Runs docker-compose on the airflow services after merging the user's env
 * files into the `.env` file docker-compose reads beside the compose file.
 */
export async function dockerCompose(app: AppConfig, extra: string[]): Promise<void> {
  app.validate();
  const composeFile = app.dockerComposeFile();
  if (!(await pathExists(composeFile))) {
    throw new ConfigMissingError(`${composeFile} was not found, run "labflow airflow setup <workspace>" first`);
  }

  const chunks: string[] = [];
  for (const file of await app.userEnvFiles()) {
    if (await pathExists(file)) {
      chunks.push(await readTextFile(file));
    }
  }
  await writeFile(path.join(path.dirname(composeFile), '.env'), chunks.join(''));

  const exitCode = await runProcess('docker-compose', ['-f', composeFile, ...extra], { inherit: true });
  if (exitCode !== 0) {
    throw new ProcessError('docker-compose', exitCode);
  }
}

export async function airflowSetup(
  app: AppConfig,
  configHome: string | undefined,
  workspaces: string[],
  options: AirflowSetupOptions = {}
): Promise<AirflowSetupResult> {
  const home = path.resolve(expandHome(configHome ?? app.appConfigHome()));
  await app.redefineAppConfigHome(home);

  const requested = workspaces.map((workspace) => path.resolve(expandHome(workspace)));
  const merged = options.append ? [...app.airflowWorkspaces(), ...requested] : requested;
  const unique = [...new Set(merged)];
  await app.redefineAirflowWorkspaces(unique);
  for (const workspace of unique) {
    await ensureDir(workspace);
  }

  const configDir = path.join(home, 'config');
  const dagsFolder = app.dagsFolder();
  await ensureDir(dagsFolder);
  for (const composeFile of COMPOSE_FILES) {
    await renderTemplateFile(resourcePath('docker', 'airflow', 'config', composeFile), path.join(configDir, composeFile), {
      airflow_image: AIRFLOW_IMAGE,
      dags_folder: dagsFolder,
      logs_folder: path.join(home, 'workspace', 'logs'),
      workspaces: unique
    });
  }
  await touch(path.join(configDir, '.env'));

  const imageId = await buildAirflowImage(options.groupFile);
  if (!imageId) {
    throw new Error('Failed to build the airflow docker image');
  }
  return { home, workspaces: unique, imageId };
}

export async function airflowUp(app: AppConfig): Promise<void> {
  await dockerCompose(app, ['up', '-d']);
}

export async function airflowDown(app: AppConfig): Promise<void> {
  await dockerCompose(app, ['down']);
}

export async function airflowCmd(app: AppConfig, service = 'webserver', command: string[] = []): Promise<void> {
  await dockerCompose(app, ['run', '--rm', service, ...(command.length > 0 ? command : ['airflow'])]);
}

/**
 * Opens the DAG notebook in jupyter lab inside the airflow image. The
 * entrypoint links every workspace under the airflow home and the DAG's
 * paired source into the dags folder, so `airflow` commands in the lab
 * terminal see it.
 */
export async function airflowEdit(conf: JobConfig, options: AirflowEditOptions = {}): Promise<string> {
  const dag = conf.requireDag();
  const { definition } = dag.settings;
  const format = notebookFormat(definition.code_format, definition.jupytext_format);
  const { notebook, source } = await ensureNotebookDir(conf.resolvePath(definition.code_path), format);
  const notebookDir = path.posix.join(AIRFLOW_HOME, 'work', 'notebook');

  const args = ['run', '--name', `${conf.dagContainerName()}_edit`, '--rm', '-p', `${AIRFLOW_LAB_PORT}:8888`];
  args.push(...(await envFileArgs(await conf.app.userEnvFiles(dag.settings.env, conf.rootDir()))));
  args.push(...bindMount(path.dirname(notebook), notebookDir));

  const links: string[] = [];
  for (const workspace of conf.app.airflowWorkspaces()) {
    if (!(await pathExists(workspace))) {
      getLogger().warn(`Workspace ${workspace} does not exist, it is not mounted`);
      continue;
    }
    args.push(...bindMount(workspace, workspace));
    links.push(`${workspace}:${path.posix.join(AIRFLOW_HOME, 'workspace', path.basename(workspace))}`);
  }
  links.push(
    `${path.posix.join(notebookDir, path.basename(source))}:${path.posix.join(AIRFLOW_HOME, 'dags', dagFileName(dag.name))}`
  );

  args.push(...dag.settings.docker_image.docker_extra_options);
  args.push('--entrypoint', 'start-jupyter.sh', AIRFLOW_IMAGE, ...links);

  return waitForJupyterLab(args, path.basename(notebook), {
    port: AIRFLOW_LAB_PORT,
    folder: 'work/notebook',
    openBrowser: options.openBrowser
  });
}

/** Scaffolds `<directory>/<name>/` from the dag template and opens it. */
export async function airflowNew(name: string, directory: string, options: JupyterNewOptions = {}): Promise<string> {
  assertJobName(name);
  const file = await writeJobConfig('dag.yaml', directory, name, options.format ?? 'yaml');
  await renderTemplateFile(templatePath('notebook.json'), path.join(path.dirname(file), 'code', `${name}.ipynb`), {
    format: DEFAULT_NOTEBOOK_FORMAT
  });
  const conf = await JobConfig.load(file, { dag: name }, options.app);
  return airflowEdit(conf, { openBrowser: options.openBrowser });
}

/** Compares real paths, so a workspace reached through a symlink still contains its files. */
export async function isInsideWorkspace(file: string, workspaces: string[]): Promise<boolean> {
  const target = (await pathExists(file)) ? await fs.realpath(file) : path.resolve(file);
  for (const workspace of workspaces) {
    const root = (await pathExists(workspace)) ? await fs.realpath(workspace) : path.resolve(workspace);
    if (target.startsWith(`${root}${path.sep}`)) {
      return true;
    }
  }
  return false;
}

/** Links the DAG source into the dags folder and resolves with the link path. */
export async function airflowPush(conf: JobConfig): Promise<string> {
  const dag = conf.requireDag();
  const { definition } = dag.settings;
  const format = notebookFormat(definition.code_format, definition.jupytext_format);
  const { source } = await ensureNotebook(conf.resolvePath(definition.code_path), format);
  if (!(await pathExists(source))) {
    throw new ConfigMissingError(`DAG source ${source} was not found`);
  }

  const dagsFolder = conf.app.dagsFolder();
  await ensureDir(dagsFolder);
  const link = path.join(dagsFolder, dagFileName(dag.name));
  await fs.rm(link, { force: true });
  await fs.symlink(source, link);

  if (!(await isInsideWorkspace(source, conf.app.airflowWorkspaces()))) {
    getLogger().warn(`${source} is outside the airflow workspaces, the link will not resolve inside the airflow containers`);
  }
  getLogger().info(`Pushed ${dag.name} to ${link}`);
  return link;
}
