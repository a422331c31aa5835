import path from 'node:path';
import { Command, Option } from 'commander';
import { AppConfig } from '../../lib/appConfig';
import { UsageError } from '../../lib/errors';
import { JobConfig } from '../../lib/jobConfig';
import { jupyterEdit, jupyterNew } from '../../lib/jupyter';
import { confirmPrompt, textPrompt } from '../../lib/prompt';
import { CONFIG_FORMATS, findExistingJobConfig } from '../../lib/scaffold';
import { browserOption, formatOption } from '../options';

export function registerJupyterNewCommand(jupyter: Command): void {
  jupyter
    .command('new <path>')
    .description('Create a new step in <path>/<name> and open it in jupyter lab')
    .option('--name <name>', 'Name of the new step')
    .addOption(new Option('-f, --format <format>', 'Format of the step configuration file').choices(CONFIG_FORMATS).default('yaml'))
    .option('--no-browser', 'Do not open the lab url in a browser')
    .action(async (directory: string, options: Record<string, unknown>) => {
      const name = typeof options.name === 'string' ? options.name : await textPrompt('What is the name of your step?', '--name');
      const openBrowser = browserOption(options);
      const app = await AppConfig.load();

      const existing = await findExistingJobConfig(directory, name);
      if (existing) {
        const relative = path.relative(process.cwd(), existing);
        const edit = await confirmPrompt(
          `${relative} already exists. Did you mean to run:\nlabflow jupyter edit ${relative} ${name}?`
        );
        if (!edit) {
          throw new UsageError('Aborted!');
        }
        const conf = await JobConfig.load(existing, { step: name }, app);
        console.log(await jupyterEdit(conf, { openBrowser }));
        return;
      }

      console.log(await jupyterNew(name, directory, { format: formatOption(options), openBrowser, app }));
    });
}
