/**
 * Unit Tests for EnvProvider
 */

import { describe, it, expect } from 'vitest';
import { EnvProvider } from '../../../../src/config/secrets/providers/EnvProvider.js';

describe('EnvProvider', () => {
  it('should resolve a variable from the injected environment', async () => {
    const provider = new EnvProvider({ JWT_SIGNING_SECRET: 'test-secret' });

    await expect(provider.resolve('JWT_SIGNING_SECRET')).resolves.toBe('test-secret');
  });

  it('should trim surrounding whitespace', async () => {
    const provider = new EnvProvider({ DB_PASSWORD: '  test-password\n' });

    await expect(provider.resolve('DB_PASSWORD')).resolves.toBe('test-password');
  });

  it('should return undefined for missing variables', async () => {
    await expect(new EnvProvider({}).resolve('MISSING')).resolves.toBeUndefined();
  });

  it('should treat blank values as missing', async () => {
    const provider = new EnvProvider({ EMPTY: '', BLANK: '   ' });

    await expect(provider.resolve('EMPTY')).resolves.toBeUndefined();
    await expect(provider.resolve('BLANK')).resolves.toBeUndefined();
  });

  it('should be case sensitive', async () => {
    const provider = new EnvProvider({ API_KEY: 'test-key' });

    await expect(provider.resolve('api_key')).resolves.toBeUndefined();
  });
});
