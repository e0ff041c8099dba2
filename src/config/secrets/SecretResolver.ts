/**
 * Secret Resolver
 *
 * Walks a parsed configuration object and replaces every
 * `{"$secret": "NAME"}` descriptor, in place, with the first value a
 * provider returns for NAME. Providers are asked in the order they were
 * added.
 *
 * @example
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const raw: unknown = JSON.parse(await readFile('config/auth-core.json', 'utf-8'));
 * await resolver.resolveSecrets(raw);
 * ```
 */

import { type ISecretProvider, isSecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';
import { AuthErrors } from '../../utils/errors.js';

export interface SecretResolverConfig {
  /** Records which provider answered for which name (never the value) */
  auditService?: AuditService;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * @throws {AuthError} CONFIGURATION_ERROR when failFast and a name is unresolved
   */
  async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  private async resolveNode(node: unknown, nodePath: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const item: unknown = node[i];
        if (isSecretDescriptor(item)) {
          const value = await this.resolveDescriptor(item, `${nodePath}[${i}]`);
          if (value !== undefined) {
            node[i] = value;
          }
        } else {
          await this.resolveNode(item, `${nodePath}[${i}]`);
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const child = node[key];
      const childPath = `${nodePath}.${key}`;

      if (isSecretDescriptor(child)) {
        const value = await this.resolveDescriptor(child, childPath);
        if (value !== undefined) {
          node[key] = value;
        }
      } else {
        await this.resolveNode(child, childPath);
      }
    }
  }

  private async resolveDescriptor(
    descriptor: SecretDescriptor,
    configPath: string
  ): Promise<string | undefined> {
    const value = await this.resolveSecret(descriptor.$secret, configPath);
    if (value !== undefined) {
      return value;
    }

    const message = `Secret "${descriptor.$secret}" at path "${configPath}" could not be resolved by any provider`;
    if (this.failFast) {
      throw AuthErrors.CONFIGURATION_ERROR(message);
    }
    console.warn(`[SecretResolver] ${message}`);
    return undefined;
  }

  private async resolveSecret(logicalName: string, configPath: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      let value: string | undefined;
      try {
        value = await provider.resolve(logicalName);
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
        continue;
      }

      if (value !== undefined) {
        await this.auditService?.log({
          source: 'secret:resolution',
          timestamp: new Date(),
          userId: 'system',
          action: `resolve:${logicalName}`,
          success: true,
          metadata: { provider: provider.constructor.name, configPath },
        });
        return value;
      }
    }

    await this.auditService?.log({
      source: 'secret:resolution',
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${logicalName}`,
      success: false,
      reason: 'unresolved',
      metadata: { provider: 'none', configPath },
    });

    return undefined;
  }

  getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  clearProviders(): void {
    this.providers = [];
  }
}
