export class ConfigMissingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigMissingError';
  }
}

export class ConfigTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigTypeError';
  }
}

export class ProcessError extends Error {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, message?: string) {
    super(message ?? `${command} exited with code ${exitCode ?? 'unknown'}`);
    this.name = 'ProcessError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
