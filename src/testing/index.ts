/**
 * Testing Utilities
 *
 * Fixtures for exercising the auth core without a database: a controllable
 * clock, a plain-text secret verifier, in-memory stores and a fully wired
 * AuthenticationService.
 *
 * Usage:
 *   import { createTestAuthCore, createTestPrincipal } from 'tenant-auth-core/testing';
 *
 *   const core = createTestAuthCore();
 *   core.principals.add(createTestPrincipal({ email: 'ana@example.com' }));
 */

import type {
  AuditEntry,
  AuthCoreContext,
  Principal,
  TenantMembership,
} from '../core/types.js';
import type { Clock } from '../core/clock.js';
import type { SecretVerifier } from '../core/secret-verifier.js';
import { InMemoryAuditStorage } from '../core/audit-service.js';
import {
  AuthenticationService,
  createAuthCoreContext,
} from '../core/authentication-service.js';
import {
  AuthCoreConfigSchema,
  type AuthCoreConfig,
  type AuthCoreConfigInput,
} from '../config/schemas/index.js';
import {
  InMemoryPrincipalStore,
  InMemoryMembershipStore,
  InMemoryRefreshTokenStore,
} from '../storage/in-memory.js';
import type { AuthError } from '../utils/errors.js';
import type { AuthResult } from '../utils/result.js';

export const TEST_SIGNING_SECRET = 'test-secret-for-signing-access-tokens-only';
export const TEST_ISSUER = 'https://auth.test.local';
export const TEST_AUDIENCE = 'tenant-api';

/** Prefix understood by PlainSecretVerifier */
const PLAIN_PREFIX = 'plain:';

/**
 * Clock that only moves when told to.
 *
 * @example
 * const clock = new TestClock(new Date('2026-01-01T00:00:00Z'));
 * clock.advance(901);
 */
export class TestClock implements Clock {
  private current: Date;

  constructor(start: Date = new Date('2026-01-01T00:00:00.000Z')) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

/**
 * Compares against `plain:<secret>` hashes. Only for tests: scrypt is too
 * slow to run on every login in a suite.
 */
export class PlainSecretVerifier implements SecretVerifier {
  async verify(secret: string, credentialHash: string): Promise<boolean> {
    return credentialHash === plainHash(secret);
  }
}

export function plainHash(secret: string): string {
  return `${PLAIN_PREFIX}${secret}`;
}

/**
 * Configuration with HS256, short TTLs and a small role table.
 * Sections in `overrides` replace the defaults wholesale.
 */
export function createTestConfig(overrides: Partial<AuthCoreConfigInput> = {}): AuthCoreConfig {
  return AuthCoreConfigSchema.parse({
    tokens: {
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
      algorithm: 'HS256',
      accessTokenTtlSeconds: 900,
      refreshTokenTtlSeconds: 604800,
      signingKey: { secret: TEST_SIGNING_SECRET, keyId: 'test-key' },
    },
    permissions: {
      roles: {
        admin: ['users.view', 'users.manage', 'reports.view', 'transactions.delete'],
        manager: ['users.view', 'reports.view', 'reports.export', 'transactions.create'],
        viewer: ['reports.view'],
      },
    },
    audit: { enabled: true, logAllAttempts: true },
    ...overrides,
  });
}

/**
 * @example
 * const principal = createTestPrincipal({ id: 'p-2', email: 'bo@example.com' });
 */
export function createTestPrincipal(overrides: Partial<Principal> = {}): Principal {
  return {
    id: 'principal-1',
    username: 'ana',
    email: 'ana@example.com',
    credentialHash: plainHash('correct-secret'),
    isActive: true,
    firstName: 'Ana',
    lastName: 'Tester',
    ...overrides,
  };
}

export function createTestMembership(overrides: Partial<TenantMembership> = {}): TenantMembership {
  return {
    id: 'membership-1',
    principalId: 'principal-1',
    tenantId: 'tenant-a',
    role: 'manager',
    isActive: true,
    isDefault: true,
    ...overrides,
  };
}

/**
 * Create a mock audit entry for testing
 */
export function createMockAuditEntry(overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    timestamp: new Date('2026-01-01T00:00:00.000Z'),
    source: 'test',
    userId: 'test-user',
    action: 'test-action',
    success: true,
    ...overrides,
  };
}

export interface TestAuthCoreOptions {
  config?: AuthCoreConfig;
  clock?: TestClock;
  principals?: Principal[];
  memberships?: TenantMembership[];
}

export interface TestAuthCore {
  service: AuthenticationService;
  context: AuthCoreContext;
  config: AuthCoreConfig;
  clock: TestClock;
  principals: InMemoryPrincipalStore;
  memberships: InMemoryMembershipStore;
  refreshTokens: InMemoryRefreshTokenStore;
  auditStorage: InMemoryAuditStorage;
}

/**
 * Wire the whole core over in-memory stores. Call `service.initialize()`
 * before use.
 */
export function createTestAuthCore(options: TestAuthCoreOptions = {}): TestAuthCore {
  const config = options.config ?? createTestConfig();
  const clock = options.clock ?? new TestClock();
  const principals = new InMemoryPrincipalStore(options.principals ?? []);
  const memberships = new InMemoryMembershipStore(options.memberships ?? []);
  const refreshTokens = new InMemoryRefreshTokenStore();
  const auditStorage = new InMemoryAuditStorage();

  const context = createAuthCoreContext(config, {
    principals,
    memberships,
    refreshTokens,
    secretVerifier: new PlainSecretVerifier(),
    timingHash: plainHash('timing-equaliser'),
    auditStorage,
    clock,
  });

  return {
    service: new AuthenticationService(context, clock),
    context,
    config,
    clock,
    principals,
    memberships,
    refreshTokens,
    auditStorage,
  };
}

/**
 * Assert that an AuthResult is a success and narrow it.
 */
export function assertAuthSuccess<T>(
  result: AuthResult<T>
): asserts result is { ok: true; value: T } {
  if (!result.ok) {
    throw new Error(`Expected success, but got ${result.error.code}: ${result.error.message}`);
  }
}

/**
 * Assert that an AuthResult is a failure and narrow it.
 */
export function assertAuthFailure<T>(
  result: AuthResult<T>
): asserts result is { ok: false; error: AuthError } {
  if (result.ok) {
    throw new Error('Expected failure, but the operation succeeded');
  }
}
