import { Command } from 'commander';
import { JobConfig } from '../../lib/jobConfig';
import { jupyterEdit } from '../../lib/jupyter';
import { browserOption, collectParameter, parameterOption, requireConfigFile, singleName } from '../options';

export function registerJupyterEditCommand(jupyter: Command): void {
  jupyter
    .command('edit <conf> [notebook...]')
    .description('Open the notebook of a step in jupyter lab')
    .option('-p, --param <name=value>', 'Papermill parameter (repeatable)', collectParameter, [])
    .option('-r, --param-raw <name=value>', 'Papermill raw parameter (repeatable)', collectParameter, [])
    .option('--no-browser', 'Do not open the lab url in a browser')
    .action(async (conf: string, notebooks: string[], options: Record<string, unknown>) => {
      const step = singleName(notebooks, 'notebook');
      const config = await JobConfig.load(await requireConfigFile(conf), { step });
      const url = await jupyterEdit(config, {
        param: parameterOption(options, 'param'),
        paramRaw: parameterOption(options, 'paramRaw'),
        openBrowser: browserOption(options)
      });
      console.log(url);
    });
}
