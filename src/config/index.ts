/**
 * Configuration Module
 *
 * Receiver configuration file, snapshot store, receiver routing and
 * process options.
 */

export {
  type Config,
  type ConfigError,
  type ConfigFile,
  configFileSchema,
  loadConfigFile,
  parseConfig,
} from './receiverConfig.js';

export { type ConfigStore, createConfigStore } from './configStore.js';

export { type ReceiverNotFound, type ReceiverRouter, createReceiverRouter } from './router.js';

export {
  type CliOptions,
  type ListenAddress,
  type ServerConfig,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LISTEN_ADDRESS,
  createCli,
  parseListenAddress,
  resolveServerConfig,
} from './serverConfig.js';
