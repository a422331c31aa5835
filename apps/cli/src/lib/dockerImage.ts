import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { AppConfig } from './appConfig';
import { ConfigMissingError } from './errors';
import { createTempDir, isNonEmptyFile, pathExists, readTextFile, removeDir } from './fs';
import type { JobConfig } from './jobConfig';
import { getLogger } from './logger';
import { LogPatternWatcher } from './logPattern';
import { runProcess } from './process';
import { dockerSourcePath } from './resources';
import { renderTemplateFile, type TemplateValues } from './template';

export const AIRFLOW_IMAGE = 'labflow/airflow';
export const DEFAULT_DOCKER_GID = '999';

// Classic builder, then BuildKit.
const BUILT_IMAGE_PATTERN = /Successfully built ([a-zA-Z0-9]+)|writing image sha256:([a-f0-9]+)/;

const SHELL_SAFE = /^[A-Za-z0-9@%+=:,./_-]+$/;

export function shellQuote(value: string): string {
  if (value === '') {
    return "''";
  }
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/** Non-blank, non-comment lines of a package list, quoted for a RUN instruction. */
export async function readListFile(file: string): Promise<string[]> {
  const content = await readTextFile(file);
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map(shellQuote);
}

function runInstruction(commands: string[]): string {
  return `RUN ${commands.join(' \\\n && ')}`;
}

export function aptRepositorySlot(repositories: string[]): string {
  return runInstruction([
    'apt-get update',
    'apt-get install -yqq software-properties-common',
    ...repositories.map((repository) => `apt-add-repository -y ${repository}`),
    'apt-get update'
  ]);
}

export function aptPackagesSlot(packages: string[]): string {
  return runInstruction([
    'apt-get update',
    `apt-get install -yqq --no-install-recommends ${packages.join(' ')}`,
    'apt-get autoremove -yqq --purge',
    'apt-get clean',
    'rm -rf /var/lib/apt/lists/* /tmp/* /var/tmp/*'
  ]);
}

export const REQUIREMENTS_SLOT = `COPY requirements.txt requirements.txt
${runInstruction(['pip install --no-cache-dir -r requirements.txt', 'rm requirements.txt'])}`;

export function labExtensionsSlot(extensions: string[]): string {
  return runInstruction([
    'echo "Installing Jupyter lab extensions"',
    ...extensions.map((extension) => `jupyter labextension install ${extension}`)
  ]);
}

/**
 * Directory holding `<name>/Dockerfile`: user-provided sources listed in the
 * app configuration win over the packaged ones.
 */
export async function resolveDockerSource(name: string, app: AppConfig): Promise<string> {
  const candidates = [...app.dockerfileSources().map((dir) => path.join(dir, name)), dockerSourcePath(name)];
  for (const candidate of candidates) {
    if (await pathExists(path.join(candidate, 'Dockerfile'))) {
      return candidate;
    }
  }
  throw new ConfigMissingError(`Docker source ${name} was not found in: ${candidates.join(', ')}`);
}

/** Copies the docker source into `buildDir` and renders its Dockerfile. */
export async function prepareBuildContext(conf: JobConfig, buildDir: string): Promise<TemplateValues> {
  const image = conf.requireStep().settings.docker_image;
  const allowed = conf.app.settings.jupyter.docker_image;
  const sourceDir = await resolveDockerSource(image.input_docker_src, conf.app);
  await fs.cp(sourceDir, buildDir, { recursive: true });

  const listFile = async (enabled: boolean, relative: string | undefined): Promise<string | null> => {
    if (!enabled || !relative) {
      return null;
    }
    const file = conf.resolvePath(relative);
    return (await isNonEmptyFile(file)) ? file : null;
  };

  const slots: TemplateValues = {};

  const repositories = await listFile(allowed.allow_apt_repository, image.apt_repository_path);
  if (repositories) {
    const entries = await readListFile(repositories);
    if (entries.length > 0) {
      slots.apt_repository = aptRepositorySlot(entries);
    }
  }

  const packages = await listFile(allowed.allow_apt_packages, image.apt_package_path);
  if (packages) {
    const entries = await readListFile(packages);
    if (entries.length > 0) {
      slots.apt_packages = aptPackagesSlot(entries);
    }
  }

  const requirements = await listFile(allowed.allow_requirements, image.requirements_path);
  if (requirements) {
    await fs.copyFile(requirements, path.join(buildDir, 'requirements.txt'));
    slots.requirements = REQUIREMENTS_SLOT;
  }

  const extensions = await listFile(allowed.allow_lab_extensions, image.lab_extension_path);
  if (extensions) {
    const entries = await readListFile(extensions);
    if (entries.length > 0) {
      slots.lab_extensions = labExtensionsSlot(entries);
    }
  }

  await renderTemplateFile(path.join(sourceDir, 'Dockerfile'), path.join(buildDir, 'Dockerfile'), slots);
  return slots;
}

async function runDockerBuild(buildDir: string, args: string[]): Promise<string | null> {
  const watcher = new LogPatternWatcher(BUILT_IMAGE_PATTERN);
  const exitCode = await runProcess('docker', ['build', ...args, '.'], { cwd: buildDir, onLine: watcher.handleLine });
  if (exitCode !== 0) {
    getLogger().error(`docker build exited with code ${exitCode ?? 'unknown'}`);
    return null;
  }
  return watcher.artifact;
}

/** Builds the image of the selected step and resolves with its id. */
export async function buildStepImage(conf: JobConfig): Promise<string | null> {
  const image = conf.requireStep().settings.docker_image;
  const buildDir = await createTempDir('labflow_');
  try {
    await prepareBuildContext(conf, buildDir);
    const name = image.output_docker_name;
    const imageId = await runDockerBuild(buildDir, ['--rm', ...(name ? ['-t', `${name}:latest`] : [])]);
    if (imageId && name && image.output_docker_tag) {
      const exitCode = await runProcess('docker', ['tag', imageId, `${name}:${image.output_docker_tag}`]);
      if (exitCode !== 0) {
        getLogger().warn(`docker tag exited with code ${exitCode ?? 'unknown'}`);
      }
    }
    return imageId;
  } finally {
    await removeDir(buildDir);
  }
}

/** Group id of `docker` on the host, which the airflow image reuses for socket access. */
export async function dockerGroupId(groupFile = '/etc/group'): Promise<string> {
  if (!(await pathExists(groupFile))) {
    return DEFAULT_DOCKER_GID;
  }
  for (const line of (await readTextFile(groupFile)).split('\n')) {
    const [name, , gid] = line.split(':');
    if (name === 'docker' && gid) {
      return gid;
    }
  }
  return DEFAULT_DOCKER_GID;
}

export async function buildAirflowImage(groupFile?: string): Promise<string | null> {
  const buildDir = await createTempDir('labflow_');
  try {
    await fs.cp(dockerSourcePath('airflow'), buildDir, { recursive: true });
    const gid = await dockerGroupId(groupFile);
    return await runDockerBuild(buildDir, ['--build-arg', `DOCKER_GID=${gid}`, '--rm', '-t', AIRFLOW_IMAGE]);
  } finally {
    await removeDir(buildDir);
  }
}
