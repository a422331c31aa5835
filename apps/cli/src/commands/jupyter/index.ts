import { Command } from 'commander';
import { registerJupyterEditCommand } from './edit';
import { registerJupyterNewCommand } from './new';
import { registerJupyterRunCommand } from './run';

export function registerJupyterCommands(program: Command): void {
  const jupyter = program.command('jupyter').description('Notebook environment for each step of a job');

  registerJupyterNewCommand(jupyter);
  registerJupyterEditCommand(jupyter);
  registerJupyterRunCommand(jupyter);
}
