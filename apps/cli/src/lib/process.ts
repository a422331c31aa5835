import { spawn, type ChildProcess } from 'node:child_process';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { ProcessError } from './errors';
import { getLogger } from './logger';

export type LineHandler = (line: string) => void;

export type RunProcessOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Hand the terminal to the child instead of collecting its output. */
  inherit?: boolean;
  onLine?: LineHandler;
};

export type ProcessHandle = {
  child: ChildProcess;
  completion: Promise<number | null>;
};

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

function forwardLines(stream: Readable | null, onLine: LineHandler): void {
  if (!stream) {
    return;
  }
  const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
  reader.on('line', onLine);
}

export function startProcess(command: string, args: string[], options: RunProcessOptions = {}): ProcessHandle {
  const logger = getLogger();
  logger.info(`Running...: ${formatCommand(command, args)}`);

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe']
  });

  if (!options.inherit) {
    const onLine = options.onLine ?? ((line: string) => logger.debug({ command }, line));
    forwardLines(child.stdout, onLine);
    forwardLines(child.stderr, onLine);
  }

  const completion = new Promise<number | null>((resolve, reject) => {
    child.once('error', (err) => {
      reject(new ProcessError(command, null, `Failed to start ${command}: ${err.message}`));
    });
    child.once('close', (code) => {
      resolve(code);
    });
  });

  return { child, completion };
}

/** Runs a command to completion and resolves with its exit code. */
export async function runProcess(command: string, args: string[], options: RunProcessOptions = {}): Promise<number | null> {
  return startProcess(command, args, options).completion;
}
