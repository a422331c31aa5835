import { InvalidArgumentError } from 'commander';
import { getCliEnv } from '../lib/env';
import { UsageError } from '../lib/errors';
import { pathExists } from '../lib/fs';
import type { NotebookParameter } from '../lib/jupyter';
import { isConfigFormat, type ConfigFormat } from '../lib/scaffold';

export function collectParameter(value: string, previous: NotebookParameter[] = []): NotebookParameter[] {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError('Expected <name>=<value>.');
  }
  return [...previous, [value.slice(0, separator), value.slice(separator + 1)]];
}

export function parameterOption(options: Record<string, unknown>, key: string): NotebookParameter[] {
  const value = options[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(
    (entry): entry is NotebookParameter =>
      Array.isArray(entry) && entry.length === 2 && typeof entry[0] === 'string' && typeof entry[1] === 'string'
  );
}

export function formatOption(options: Record<string, unknown>): ConfigFormat {
  const value = typeof options.format === 'string' ? options.format : 'yaml';
  return isConfigFormat(value) ? value : 'yaml';
}

/** `--no-browser` and `LABFLOW_NO_BROWSER` both keep the browser closed. */
export function browserOption(options: Record<string, unknown>): boolean {
  return options.browser !== false && !getCliEnv().noBrowser;
}

export async function requireConfigFile(file: string): Promise<string> {
  if (!(await pathExists(file))) {
    throw new UsageError(`Configuration file ${file} does not exist`);
  }
  return file;
}

/** Commands that edit a single job reject several names. */
export function singleName(names: string[], kind: string): string | undefined {
  if (names.length > 1) {
    throw new UsageError(`Expecting one or less ${kind} names`);
  }
  return names[0];
}
