import { Command } from 'commander';
import { AppConfig } from '../../lib/appConfig';
import { JobConfig } from '../../lib/jobConfig';
import { jupyterRun } from '../../lib/jupyter';
import { collectParameter, parameterOption, requireConfigFile } from '../options';

export function registerJupyterRunCommand(jupyter: Command): void {
  jupyter
    .command('run <conf> [notebook...]')
    .description('Run step notebooks with papermill and print the output notebooks')
    .option('-p, --param <name=value>', 'Papermill parameter (repeatable)', collectParameter, [])
    .option('-r, --param-raw <name=value>', 'Papermill raw parameter (repeatable)', collectParameter, [])
    .action(async (conf: string, notebooks: string[], options: Record<string, unknown>) => {
      const file = await requireConfigFile(conf);
      const app = await AppConfig.load();
      const param = parameterOption(options, 'param');
      const paramRaw = parameterOption(options, 'paramRaw');
      const steps = notebooks.length > 0 ? notebooks : [undefined];
      for (const step of steps) {
        const config = await JobConfig.load(file, { step }, app);
        console.log(await jupyterRun(config, { param, paramRaw }));
      }
    });
}
