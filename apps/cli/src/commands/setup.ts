import { Command } from 'commander';
import { setupAppConfig } from '../lib/appConfig';

export function registerSetupCommand(program: Command): void {
  program
    .command('setup')
    .description('Create the labflow configuration in the user home')
    .option('-d, --config-home <dir>', 'Record another labflow home directory')
    .option('--force', 'Regenerate the configuration file even when it exists')
    .action(async (options: Record<string, unknown>) => {
      const result = await setupAppConfig({
        configHome: typeof options.configHome === 'string' ? options.configHome : undefined,
        force: options.force === true
      });
      console.log(result.created ? `Created ${result.file}` : `Using existing ${result.file}`);
    });
}
