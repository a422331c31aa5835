import pino, { stdTimeFunctions, type Logger } from 'pino';
import { getCliEnv } from './env';
import { LABFLOW_VERSION } from './version';

export type { Logger };

export type LoggerOptions = {
  level?: string;
  file?: string | null;
};

let rootLogger: Logger | null = null;

export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.file
    ? pino.destination({ dest: options.file, mkdir: true, sync: true })
    : pino.destination({ dest: 2, sync: true });
  return pino(
    {
      level: options.level ?? 'info',
      base: undefined,
      timestamp: stdTimeFunctions.isoTime
    },
    destination
  );
}

/**
 * Process-wide logger. Command output goes to stdout through `console.log`,
 * so log records default to stderr.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    const env = getCliEnv();
    rootLogger = createLogger({ level: env.logLevel, file: env.logFile });
    rootLogger.debug({ version: LABFLOW_VERSION, platform: process.platform, node: process.version }, 'Starting labflow');
  }
  return rootLogger;
}
