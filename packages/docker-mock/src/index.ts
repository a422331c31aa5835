import { chmod, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export type DockerMockConfig = {
  imageId?: string;
  labToken?: string;
  buildExitCode?: number;
  runExitCode?: number;
};

export type MockInvocation = {
  command: string;
  args: string[];
};

const RECORD_INVOCATION = `{ printf '%s' "$(basename "$0")"; for arg in "$@"; do printf '\\t%s' "$arg"; done; printf '\\n'; } >> "$LABFLOW_MOCK_LOG"`;

function dockerScript(config: Required<DockerMockConfig>): string {
  return `#!/bin/sh
${RECORD_INVOCATION}
cmd="$1"
shift
case "$cmd" in
  build)
    echo "Step 1/2 : FROM jupyter/base-notebook"
    if [ "${config.buildExitCode}" -ne 0 ]; then
      echo "The command returned a non-zero code: ${config.buildExitCode}"
      exit ${config.buildExitCode}
    fi
    echo "Successfully built ${config.imageId}"
    exit 0
    ;;
  run)
    for arg in "$@"; do
      if [ "$arg" = "lab" ] || [ "$arg" = "start-jupyter.sh" ]; then
        echo "[I 2024-01-01 12:00:00.000 ServerApp] Jupyter Server is running at:"
        echo "[I 2024-01-01 12:00:00.000 ServerApp] http://127.0.0.1:8888/lab?token=${config.labToken}"
        exit 0
      fi
    done
    echo "Executing notebook"
    exit ${config.runExitCode}
    ;;
  *)
    exit 0
    ;;
esac
`;
}

const PASSIVE_SCRIPT = `#!/bin/sh
${RECORD_INVOCATION}
exit 0
`;

const JUPYTEXT_SCRIPT = `#!/bin/sh
${RECORD_INVOCATION}
out=""
while [ "$#" -gt 0 ]; do
  if [ "$1" = "-o" ]; then
    out="$2"
    shift 2
    continue
  fi
  shift
done
if [ -n "$out" ] && [ ! -e "$out" ]; then
  echo '{"cells": [], "metadata": {}, "nbformat": 4, "nbformat_minor": 2}' > "$out"
fi
exit 0
`;

/**
 * Stand-ins for the docker, docker-compose and jupytext binaries. Callers put
 * `pathPrefix` first on PATH; every invocation is appended to a log that
 * `calls()` reads back.
 */
export class DockerMock {
  private readonly config: Required<DockerMockConfig>;
  private tempDir: string | null = null;
  private logPath: string | null = null;
  private previousPath: string | undefined;
  private previousLog: string | undefined;
  private running = false;

  constructor(config: DockerMockConfig = {}) {
    this.config = {
      imageId: config.imageId ?? 'a1b2c3d4e5f6',
      labToken: config.labToken ?? 'abc123token',
      buildExitCode: config.buildExitCode ?? 0,
      runExitCode: config.runExitCode ?? 0
    };
  }

  async start(): Promise<{ pathPrefix: string }> {
    if (this.running) {
      throw new Error('DockerMock already running');
    }

    const dir = await mkdtemp(path.join(os.tmpdir(), 'docker-mock-'));
    this.tempDir = dir;
    this.logPath = path.join(dir, 'calls.log');
    await writeFile(this.logPath, '', 'utf8');

    const scripts: Record<string, string> = {
      docker: dockerScript(this.config),
      'docker-compose': PASSIVE_SCRIPT,
      jupytext: JUPYTEXT_SCRIPT
    };
    for (const [name, script] of Object.entries(scripts)) {
      const scriptPath = path.join(dir, name);
      await writeFile(scriptPath, script, 'utf8');
      await chmod(scriptPath, 0o755);
    }

    this.previousPath = process.env.PATH;
    this.previousLog = process.env.LABFLOW_MOCK_LOG;
    process.env.PATH = `${dir}${path.delimiter}${process.env.PATH ?? ''}`;
    process.env.LABFLOW_MOCK_LOG = this.logPath;
    this.running = true;

    return { pathPrefix: dir };
  }

  async calls(command?: string): Promise<MockInvocation[]> {
    if (!this.logPath) {
      return [];
    }
    const content = await readFile(this.logPath, 'utf8');
    const invocations = content
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line) => {
        const [name, ...args] = line.split('\t');
        return { command: name ?? '', args } satisfies MockInvocation;
      });
    return command ? invocations.filter((entry) => entry.command === command) : invocations;
  }

  async stop(): Promise<void> {
    if (this.running) {
      if (this.previousPath === undefined) {
        delete process.env.PATH;
      } else {
        process.env.PATH = this.previousPath;
      }
      if (this.previousLog === undefined) {
        delete process.env.LABFLOW_MOCK_LOG;
      } else {
        process.env.LABFLOW_MOCK_LOG = this.previousLog;
      }
    }
    if (this.tempDir) {
      await rm(this.tempDir, { recursive: true, force: true });
      this.tempDir = null;
      this.logPath = null;
    }
    this.running = false;
  }
}
