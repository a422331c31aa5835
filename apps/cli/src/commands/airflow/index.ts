import { Command } from 'commander';
import { registerAirflowEditCommand, registerAirflowNewCommand, registerAirflowPushCommand } from './dags';
import { registerAirflowRunCommand, registerAirflowStartCommand, registerAirflowStopCommand } from './services';
import { registerAirflowSetupCommand } from './setup';

export function registerAirflowCommands(program: Command): void {
  const airflow = program.command('airflow').description('Author DAGs and manage a local airflow');

  registerAirflowSetupCommand(airflow);
  registerAirflowStartCommand(airflow);
  registerAirflowStopCommand(airflow);
  registerAirflowRunCommand(airflow);
  registerAirflowNewCommand(airflow);
  registerAirflowEditCommand(airflow);
  registerAirflowPushCommand(airflow);
}
