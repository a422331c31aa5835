import { Command, Option } from 'commander';
import { airflowSetup } from '../../lib/airflow';
import { AppConfig } from '../../lib/appConfig';

export function registerAirflowSetupCommand(airflow: Command): void {
  airflow
    .command('setup <workspace...>')
    .description('Configure the airflow home and the workspaces mounted in its containers, then build its image')
    .option('-d, --config-home <dir>', 'Directory holding the airflow configuration (default: the labflow home)')
    .addOption(new Option('--append', 'Add the workspaces to the configured ones').conflicts('replace'))
    .addOption(new Option('--replace', 'Replace the configured workspaces (default)'))
    .action(async (workspaces: string[], options: Record<string, unknown>) => {
      const app = await AppConfig.load();
      const configHome = typeof options.configHome === 'string' ? options.configHome : undefined;
      const result = await airflowSetup(app, configHome, workspaces, { append: options.append === true });
      console.log(`Airflow home: ${result.home}`);
      console.log('Workspaces:');
      for (const workspace of result.workspaces) {
        console.log(`  • ${workspace}`);
      }
      console.log(`Image: ${result.imageId}`);
    });
}
