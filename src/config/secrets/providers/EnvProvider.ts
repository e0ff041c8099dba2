/**
 * Resolves secrets from environment variables. Meant as the fallback after
 * FileSecretProvider; values in the environment leak more easily.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value.trim();
  }
}
