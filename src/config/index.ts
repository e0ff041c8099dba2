/**
 * Configuration Module - Public API
 */

export {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  type ConfigManagerOptions,
} from './manager.js';

export * from './schemas/index.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  isSecretProvider,
  type ISecretProvider,
  type SecretResolverConfig,
} from './secrets/index.js';
