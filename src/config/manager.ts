import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { AuthCoreConfigSchema, type AuthCoreConfig } from './schemas/index.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';
import { AuthErrors } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATH = './config/auth-core.json';

export interface ConfigManagerOptions {
  /** Receives secret:resolution entries */
  auditService?: AuditService;
  /** Directory for file-based secrets (default: /run/secrets) */
  secretsDir?: string;
  /** Environment to read CONFIG_PATH, NODE_ENV and env secrets from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class ConfigManager {
  private config: AuthCoreConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options?.auditService,
      failFast: true,
    });

    // File mounts first, environment as fallback
    const secretsDir = options?.secretsDir ?? '/run/secrets';
    this.secretResolver.addProvider(new FileSecretProvider(secretsDir));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  /**
   * Read, resolve secrets, validate. Cached after the first success.
   *
   * @throws {AuthError} CONFIGURATION_ERROR
   */
  async loadConfig(configPath?: string): Promise<AuthCoreConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw AuthErrors.CONFIGURATION_ERROR(
        `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.loadFromObject(raw);
  }

  /**
   * Same pipeline as loadConfig() for an already-parsed object. The object
   * is modified in place when secrets are resolved.
   */
  async loadFromObject(raw: unknown): Promise<AuthCoreConfig> {
    console.log('[ConfigManager] Resolving secrets...');
    await this.secretResolver.resolveSecrets(raw);

    let config: AuthCoreConfig;
    try {
      config = AuthCoreConfigSchema.parse(raw);
    } catch (error) {
      if (error instanceof ZodError) {
        throw AuthErrors.CONFIGURATION_ERROR(describeZodError(error));
      }
      throw error;
    }

    this.validateSecurityRequirements(config);

    this.config = config;
    console.log('[ConfigManager] Configuration loaded and validated successfully');
    return config;
  }

  getConfig(): AuthCoreConfig {
    if (!this.config) {
      throw AuthErrors.CONFIGURATION_ERROR('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  async reloadConfig(configPath?: string): Promise<AuthCoreConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private validateSecurityRequirements(config: AuthCoreConfig): void {
    const { tokens } = config;

    if (tokens.refreshTokenTtlSeconds <= tokens.accessTokenTtlSeconds) {
      throw AuthErrors.CONFIGURATION_ERROR(
        'tokens.refreshTokenTtlSeconds must be greater than tokens.accessTokenTtlSeconds'
      );
    }

    if (!this.isSecureEnvironment()) {
      return;
    }

    if (!config.audit.enabled) {
      console.warn('[ConfigManager] Audit logging should be enabled in production environments');
    }

    if (tokens.algorithm.startsWith('HS')) {
      console.warn(
        `[ConfigManager] ${tokens.algorithm} shares the signing secret with every verifier; consider RS256 or ES256`
      );
    }
  }
}
