#!/usr/bin/env node

import { Command, type OutputConfiguration } from 'commander';
import { registerAirflowCommands } from './commands/airflow';
import { registerJupyterCommands } from './commands/jupyter';
import { registerSetupCommand } from './commands/setup';
import { registerVersionCommand } from './commands/version';
import { LABFLOW_VERSION } from './lib/version';

export type ProgramOptions = {
  /** Throw commander errors instead of exiting; inherited by every subcommand. */
  exitOverride?: boolean;
  output?: OutputConfiguration;
};

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('labflow')
    .description('Provision and launch jupyter and airflow environments in docker')
    .version(LABFLOW_VERSION);

  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.output) {
    program.configureOutput(options.output);
  }

  registerVersionCommand(program);
  registerSetupCommand(program);
  registerJupyterCommands(program);
  registerAirflowCommands(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
