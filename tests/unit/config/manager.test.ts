/**
 * Unit Tests for Configuration Manager
 *
 * Loading, secret resolution, validation and the security checks applied
 * after validation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager } from '../../../src/config/manager.js';
import * as configModule from '../../../src/config/index.js';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';

const SECRET = 'test-secret-for-config-manager-tests';
const EXAMPLE_CONFIG = fileURLToPath(
  new URL('../../../config/auth-core.example.json', import.meta.url)
);

function rawConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    tokens: {
      issuer: 'https://auth.test.local',
      audience: 'tenant-api',
      signingKey: { secret: { $secret: 'JWT_SIGNING_SECRET' } },
    },
    ...overrides,
  };
}

describe('ConfigManager', () => {
  let secretsDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    secretsDir = await mkdtemp(join(tmpdir(), 'auth-core-secrets-'));
  });

  afterEach(async () => {
    await rm(secretsDir, { recursive: true, force: true });
  });

  function manager(env: NodeJS.ProcessEnv = { JWT_SIGNING_SECRET: SECRET }): ConfigManager {
    return new ConfigManager({ env, secretsDir });
  }

  describe('loadFromObject', () => {
    it('should resolve secrets from the environment and apply defaults', async () => {
      const config = await manager().loadFromObject(rawConfig());

      expect(config.tokens.signingKey.secret).toBe(SECRET);
      expect(config.tokens.algorithm).toBe('HS256');
      expect(config.tenancy.explicitHeader).toBe('x-company-id');
    });

    it('should prefer a mounted secret file over the environment', async () => {
      const mounted = 'test-secret-from-a-mounted-file-000';
      await writeFile(join(secretsDir, 'JWT_SIGNING_SECRET'), `${mounted}\n`);

      const config = await manager().loadFromObject(rawConfig());

      expect(config.tokens.signingKey.secret).toBe(mounted);
    });

    it('should fail when a secret cannot be resolved', async () => {
      await expect(manager({}).loadFromObject(rawConfig())).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
        message:
          'Configuration error: Secret "JWT_SIGNING_SECRET" at path "config.tokens.signingKey.secret" could not be resolved by any provider',
      });
    });

    it('should report schema violations with their paths', async () => {
      await expect(
        manager({ JWT_SIGNING_SECRET: 'short' }).loadFromObject(rawConfig())
      ).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
        message:
          'Configuration error: tokens.signingKey.secret: HS256 requires a secret of at least 32 characters',
      });
    });

    it('should require refresh tokens to outlive access tokens', async () => {
      const raw = rawConfig();
      raw.tokens = {
        issuer: 'https://auth.test.local',
        audience: 'tenant-api',
        accessTokenTtlSeconds: 3600,
        refreshTokenTtlSeconds: 3600,
        signingKey: { secret: SECRET },
      };

      await expect(manager().loadFromObject(raw)).rejects.toMatchObject({
        message:
          'Configuration error: tokens.refreshTokenTtlSeconds must be greater than tokens.accessTokenTtlSeconds',
      });
    });

    it('should warn about weak production settings', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      await manager({ JWT_SIGNING_SECRET: SECRET, NODE_ENV: 'production' }).loadFromObject(
        rawConfig()
      );

      expect(warn).toHaveBeenCalledWith(
        '[ConfigManager] Audit logging should be enabled in production environments'
      );
      expect(warn).toHaveBeenCalledWith(
        '[ConfigManager] HS256 shares the signing secret with every verifier; consider RS256 or ES256'
      );
    });

    it('should audit secret resolution without the value', async () => {
      const storage = new InMemoryAuditStorage();
      const configManager = new ConfigManager({
        env: { JWT_SIGNING_SECRET: SECRET },
        secretsDir,
        auditService: new AuditService({ enabled: true, storage }),
      });

      await configManager.loadFromObject(rawConfig());

      expect(storage.getEntries()).toEqual([
        expect.objectContaining({
          source: 'secret:resolution',
          action: 'resolve:JWT_SIGNING_SECRET',
          success: true,
          metadata: { provider: 'EnvProvider', configPath: 'config.tokens.signingKey.secret' },
        }),
      ]);
      expect(JSON.stringify(storage.getEntries())).not.toContain(SECRET);
    });
  });

  describe('loadConfig', () => {
    it('should load and validate the example configuration', async () => {
      const config = await manager().loadConfig(EXAMPLE_CONFIG);

      expect(config.tokens.issuer).toBe('https://erp.example.com');
      expect(config.tokens.signingKey).toEqual({ secret: SECRET, keyId: 'primary' });
      expect(Object.keys(config.permissions.roles)).toEqual([
        'admin',
        'manager',
        'accountant',
        'employee',
        'viewer',
      ]);
    });

    it('should read the path from CONFIG_PATH', async () => {
      const path = join(secretsDir, 'auth-core.json');
      await writeFile(
        path,
        JSON.stringify(rawConfig({ audit: { enabled: true } }))
      );

      const config = await manager({ JWT_SIGNING_SECRET: SECRET, CONFIG_PATH: path }).loadConfig();

      expect(config.audit.enabled).toBe(true);
    });

    it('should cache the first successful load', async () => {
      const configManager = manager();
      const first = await configManager.loadConfig(EXAMPLE_CONFIG);

      await expect(configManager.loadConfig('/does/not/exist.json')).resolves.toBe(first);
      expect(configManager.getConfig()).toBe(first);
    });

    it('should re-read on reloadConfig', async () => {
      const configManager = manager();
      await configManager.loadConfig(EXAMPLE_CONFIG);

      await expect(configManager.reloadConfig('/does/not/exist.json')).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
      });
    });

    it('should report unreadable files', async () => {
      const path = join(secretsDir, 'missing.json');

      await expect(manager().loadConfig(path)).rejects.toThrow(
        `Configuration error: Failed to read ${path}:`
      );
    });

    it('should report invalid JSON', async () => {
      const path = join(secretsDir, 'broken.json');
      await writeFile(path, '{ "tokens": ');

      await expect(manager().loadConfig(path)).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
      });
    });
  });

  describe('getConfig', () => {
    it('should throw before a configuration is loaded', () => {
      expect(() => manager().getConfig()).toThrow(
        'Configuration error: Configuration not loaded. Call loadConfig() first.'
      );
    });
  });

  it('should order providers file first, environment second', () => {
    const names = manager()
      .getSecretResolver()
      .getProviders()
      .map((provider) => provider.constructor.name);

    expect(names).toEqual(['FileSecretProvider', 'EnvProvider']);
  });

  it('should not build a manager when the module is imported', () => {
    expect(Object.keys(configModule)).not.toContain('configManager');
    expect(Object.values(configModule).some((value) => value instanceof ConfigManager)).toBe(
      false
    );
  });

  it('should report a production environment as secure', () => {
    expect(manager({ NODE_ENV: 'production' }).isSecureEnvironment()).toBe(true);
    expect(manager({ NODE_ENV: 'test' }).isSecureEnvironment()).toBe(false);
  });
});
