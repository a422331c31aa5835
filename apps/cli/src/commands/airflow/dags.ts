import path from 'node:path';
import { Command, Option } from 'commander';
import { airflowEdit, airflowNew, airflowPush } from '../../lib/airflow';
import { AppConfig } from '../../lib/appConfig';
import { UsageError } from '../../lib/errors';
import { JobConfig } from '../../lib/jobConfig';
import { confirmPrompt, textPrompt } from '../../lib/prompt';
import { CONFIG_FORMATS, findExistingJobConfig } from '../../lib/scaffold';
import { browserOption, formatOption, requireConfigFile, singleName } from '../options';

export function registerAirflowNewCommand(airflow: Command): void {
  airflow
    .command('new <path>')
    .description('Create a new DAG in <path>/<name> and open it in jupyter lab')
    .option('--name <name>', 'Name of the new DAG')
    .addOption(new Option('-f, --format <format>', 'Format of the DAG configuration file').choices(CONFIG_FORMATS).default('yaml'))
    .option('--no-browser', 'Do not open the lab url in a browser')
    .action(async (directory: string, options: Record<string, unknown>) => {
      const name = typeof options.name === 'string' ? options.name : await textPrompt('What is the name of your DAG?', '--name');
      const openBrowser = browserOption(options);
      const app = await AppConfig.load();

      const existing = await findExistingJobConfig(directory, name);
      if (existing) {
        const relative = path.relative(process.cwd(), existing);
        const edit = await confirmPrompt(
          `${relative} already exists. Did you mean to run:\nlabflow airflow edit ${relative} ${name}?`
        );
        if (!edit) {
          throw new UsageError('Aborted!');
        }
        const conf = await JobConfig.load(existing, { dag: name }, app);
        console.log(await airflowEdit(conf, { openBrowser }));
        return;
      }

      console.log(await airflowNew(name, directory, { format: formatOption(options), openBrowser, app }));
    });
}

export function registerAirflowEditCommand(airflow: Command): void {
  airflow
    .command('edit <conf> [dag...]')
    .description('Open the notebook of a DAG in jupyter lab inside the airflow image')
    .option('--no-browser', 'Do not open the lab url in a browser')
    .action(async (conf: string, dags: string[], options: Record<string, unknown>) => {
      const dag = singleName(dags, 'dag');
      const config = await JobConfig.load(await requireConfigFile(conf), { dag });
      console.log(await airflowEdit(config, { openBrowser: browserOption(options) }));
    });
}

export function registerAirflowPushCommand(airflow: Command): void {
  airflow
    .command('push <conf> [dag...]')
    .description('Link DAG sources into the airflow dags folder')
    .action(async (conf: string, dags: string[]) => {
      const file = await requireConfigFile(conf);
      const app = await AppConfig.load();
      const selections = dags.length > 0 ? dags : [undefined];
      for (const dag of selections) {
        const config = await JobConfig.load(file, { dag }, app);
        console.log(await airflowPush(config));
      }
    });
}
