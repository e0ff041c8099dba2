/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}`, the layout of Docker and Kubernetes
 * secret mounts. Names that would leave secretDir resolve to undefined.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null) {
    const code = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class FileSecretProvider implements ISecretProvider {
  constructor(private readonly secretDir: string = '/run/secrets') {}

  async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      // Mounted secrets usually end with a newline
      return (await fs.readFile(filePath, 'utf-8')).trim();
    } catch (error) {
      if (NOT_FOUND_CODES.has(errorCode(error) ?? '')) {
        return undefined;
      }
      throw error;
    }
  }

  getSecretDir(): string {
    return this.secretDir;
  }
}
