import { Command } from 'commander';
import { SERVICE_URLS, airflowCmd, airflowDown, airflowUp } from '../../lib/airflow';
import { AppConfig } from '../../lib/appConfig';

export function registerAirflowStartCommand(airflow: Command): void {
  airflow
    .command('start')
    .description('Start the airflow services in the background')
    .action(async () => {
      await airflowUp(await AppConfig.load());
      console.log('Airflow services are starting:');
      for (const url of SERVICE_URLS) {
        console.log(`  • ${url}`);
      }
    });
}

export function registerAirflowStopCommand(airflow: Command): void {
  airflow
    .command('stop')
    .description('Stop the airflow services')
    .action(async () => {
      await airflowDown(await AppConfig.load());
    });
}

export function registerAirflowRunCommand(airflow: Command): void {
  airflow
    .command('run <subcommand...>')
    .description('Run an airflow command in a service container (put airflow options after --)')
    .option('-s, --service <service>', 'docker-compose service to run in', 'webserver')
    .action(async (subcommand: string[], options: Record<string, unknown>) => {
      const service = typeof options.service === 'string' ? options.service : 'webserver';
      await airflowCmd(await AppConfig.load(), service, subcommand);
    });
}
