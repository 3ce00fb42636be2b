export { expandEnv, readPositiveInt } from './env.js';
export {
  applyEnvOverrides,
  CONFIG_FILE_NAME,
  loadConfig,
  parseConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from './loader.js';
