export {
  EnvConfigError,
  loadEnvConfig,
  booleanVar,
  integerVar,
  stringVar,
  pathVar
} from './envConfig';
export type {
  EnvSource,
  LoadEnvConfigOptions,
  BooleanVarOptions,
  IntegerVarOptions,
  StringVarOptions
} from './envConfig';
