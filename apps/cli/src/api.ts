import { JobConfig } from './lib/jobConfig';
import { jupyterRun as runStep, type JupyterRunOptions } from './lib/jupyter';

export type { JupyterRunOptions, NotebookParameter } from './lib/jupyter';
export { ConfigMissingError, ConfigTypeError, ProcessError, UsageError } from './lib/errors';

/**
 * Runs a step notebook the way `labflow jupyter run` does, for use from
 * scripts such as a DAG task. `config` is a configuration file or document.
 */
export async function jupyterRun(config: string, notebook?: string, options: JupyterRunOptions = {}): Promise<string> {
  const conf = await JobConfig.load(config, { step: notebook });
  return runStep(conf, options);
}
