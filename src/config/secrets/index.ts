/**
 * Secret resolution for configuration files: `{"$secret": "NAME"}`
 * descriptors are replaced by values from a provider chain.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
