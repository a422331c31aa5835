import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, realpath, rm } from 'node:fs/promises';
import type { TestContext } from 'node:test';
import { DockerMock, type DockerMockConfig } from '@labflow/docker-mock';
import { writeFile } from '../src/lib/fs';

process.env.LABFLOW_LOG_LEVEL = 'silent';
process.env.LABFLOW_NO_BROWSER = 'true';
process.env.LABFLOW_LAB_WAIT_ATTEMPTS = '20';
process.env.LABFLOW_LAB_WAIT_INTERVAL_MS = '100';

export async function createTempDir(prefix = 'labflow-cli-test-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  return realpath(dir);
}

export async function useTempDir(t: TestContext, prefix?: string): Promise<string> {
  const dir = await createTempDir(prefix);
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  return dir;
}

/** Points LABFLOW_HOME at a fresh directory for the duration of the test. */
export async function useLabflowHome(t: TestContext): Promise<string> {
  const home = await useTempDir(t, 'labflow-home-');
  const previous = process.env.LABFLOW_HOME;
  process.env.LABFLOW_HOME = home;
  t.after(() => {
    if (previous === undefined) {
      delete process.env.LABFLOW_HOME;
    } else {
      process.env.LABFLOW_HOME = previous;
    }
  });
  return home;
}

export async function useDockerMock(t: TestContext, config?: DockerMockConfig): Promise<DockerMock> {
  const mock = new DockerMock(config);
  await mock.start();
  t.after(async () => {
    await mock.stop();
  });
  return mock;
}

export async function writeText(file: string, content: string): Promise<string> {
  await writeFile(file, content);
  return file;
}

export function captureConsole(t: TestContext, method: 'log' | 'error' = 'log'): string[] {
  const lines: string[] = [];
  const original = console[method];
  console[method] = (...args: unknown[]) => {
    lines.push(args.map((arg) => String(arg)).join(' '));
  };
  t.after(() => {
    console[method] = original;
  });
  return lines;
}

export function setEnv(t: TestContext, key: string, value: string): void {
  const previous = process.env[key];
  process.env[key] = value;
  t.after(() => {
    if (previous === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = previous;
    }
  });
}
