import { Command } from 'commander';
import { LABFLOW_VERSION } from '../lib/version';

export function registerVersionCommand(program: Command): void {
  program
    .command('version')
    .description('Show the version and exit')
    .action(() => {
      console.log(`${program.name()}, version ${LABFLOW_VERSION}`);
    });
}
