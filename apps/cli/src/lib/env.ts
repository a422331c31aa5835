import { z } from 'zod';
import { booleanVar, integerVar, loadEnvConfig, pathVar, stringVar } from '@labflow/shared';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const cliEnvSchema = z
  .object({
    LABFLOW_HOME: pathVar(),
    LABFLOW_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true, allowed: LOG_LEVELS }),
    LABFLOW_LOG_FILE: pathVar(),
    LABFLOW_NO_BROWSER: booleanVar({ defaultValue: false }),
    LABFLOW_LAB_WAIT_ATTEMPTS: integerVar({ defaultValue: 5, min: 1 }),
    LABFLOW_LAB_WAIT_INTERVAL_MS: integerVar({ defaultValue: 2000, min: 0 })
  })
  .passthrough();

export type CliEnv = {
  home: string | null;
  logLevel: string;
  logFile: string | null;
  noBrowser: boolean;
  labWaitAttempts: number;
  labWaitIntervalMs: number;
};

// Read on every call: tests and `airflow setup` change the environment at runtime.
export function getCliEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  const parsed = loadEnvConfig(cliEnvSchema, { env, context: 'labflow:cli' });
  return {
    home: parsed.LABFLOW_HOME ?? null,
    logLevel: parsed.LABFLOW_LOG_LEVEL ?? 'info',
    logFile: parsed.LABFLOW_LOG_FILE ?? null,
    noBrowser: parsed.LABFLOW_NO_BROWSER,
    labWaitAttempts: parsed.LABFLOW_LAB_WAIT_ATTEMPTS ?? 5,
    labWaitIntervalMs: parsed.LABFLOW_LAB_WAIT_INTERVAL_MS ?? 2000
  };
}
