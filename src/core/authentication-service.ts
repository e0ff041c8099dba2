/**
 * Authentication Service - the core's external interface
 *
 * Orchestrates the components:
 * - login:   CredentialVerifier -> TokenIssuer
 * - refresh: RefreshCoordinator (rotation-on-use)
 * - request: TokenValidator -> TenantResolver -> PermissionResolver -> AuthorizationGuard
 *
 * Components throw AuthError; this facade returns AuthResult values and
 * never lets a fault escape. It never retries: retry-after-refresh is the
 * caller's policy.
 */

import type {
  AccessTokenClaims,
  AuthCoreContext,
  PrincipalSummary,
  Principal,
  TenantRequest,
} from './types.js';
import type {
  PrincipalStore,
  MembershipStore,
  RefreshTokenStore,
  PermissionGrantSource,
} from '../storage/types.js';
import type { AuthCoreConfig } from '../config/schemas/core.js';
import { CredentialVerifier } from './credential-verifier.js';
import { ScryptSecretVerifier, type SecretVerifier } from './secret-verifier.js';
import { StaticSigningKeyProvider, type SigningKeyProvider } from './signing-keys.js';
import { TokenIssuer } from './token-issuer.js';
import { TokenValidator } from './token-validator.js';
import { RefreshCoordinator } from './refresh-coordinator.js';
import { RefreshTokenSweeper } from './refresh-token-sweeper.js';
import { TenantResolver } from './tenant-resolver.js';
import {
  PermissionResolver,
  grantsFromConfig,
  combineGrantSources,
} from './permission-resolver.js';
import {
  AuthorizationGuard,
  type AccessPolicy,
  type AuthorizedContext,
} from './authorization-guard.js';
import { AuditService, type AuditStorage } from './audit-service.js';
import { AuthCoreContextValidator } from './validators.js';
import { type Clock, systemClock } from './clock.js';
import { StaticPermissionGrantSource } from '../storage/in-memory.js';
import { AuthErrors, sanitizeError } from '../utils/errors.js';
import { type AuthResult, toResult } from '../utils/result.js';

// ============================================================================
// Types
// ============================================================================

export interface LoginOptions {
  /** Logical session (device). A new one is generated when absent. */
  sessionId?: string;
}

export interface LogoutOptions {
  /** Revoke only this session; all sessions when absent */
  sessionId?: string;
}

export interface RefreshResult {
  accessToken: string;
  refreshToken: string;
  accessTokenExpiresAt: Date;
  refreshTokenExpiresAt: Date;
}

export interface LoginResult extends RefreshResult {
  principal: PrincipalSummary;
}

// ============================================================================
// Helpers
// ============================================================================

const BEARER_PREFIX = /^Bearer(\s+|$)/i;

/**
 * Accepts a raw token or an Authorization header value.
 */
export function extractBearerToken(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const token = value.trim().replace(BEARER_PREFIX, '').trim();
  return token.length > 0 ? token : null;
}

/**
 * What the caller learns about the principal at login: the same tenant view
 * the issued access token carries.
 */
export function summarizePrincipal(
  principal: Principal,
  claims: Pick<AccessTokenClaims, 'default_tenant_id' | 'tenant_roles'>
): PrincipalSummary {
  return {
    id: principal.id,
    username: principal.username,
    email: principal.email,
    firstName: principal.firstName ?? null,
    lastName: principal.lastName ?? null,
    defaultTenantId: claims.default_tenant_id,
    tenants: claims.tenant_roles.map((entry) => ({ tenantId: entry.tenant_id, role: entry.role })),
  };
}

// ============================================================================
// Authentication Service
// ============================================================================

/**
 * @example
 * ```typescript
 * const auth = createAuthenticationService(config, { principals, memberships, refreshTokens });
 * await auth.initialize();
 *
 * const login = await auth.login('ana@example.com', password);
 * if (!login.ok) return reply(login.error);
 *
 * const access = await auth.authorizeRequest(req.headers.authorization, req, {
 *   tenant: 'required',
 *   permission: 'reports.view',
 * });
 * ```
 */
export class AuthenticationService {
  private initialized = false;

  constructor(
    private readonly context: AuthCoreContext,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Check the wiring and load the role -> permission table.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    AuthCoreContextValidator.validate(this.context);
    await this.context.permissionResolver.initialize();
    this.initialized = true;
  }

  async login(
    identifier: string,
    secret: string,
    options: LoginOptions = {}
  ): Promise<AuthResult<LoginResult>> {
    const result = await toResult(
      async () => {
        const principal = await this.context.credentialVerifier.verify(identifier, secret);
        const memberships = await this.context.memberships.listForPrincipal(principal.id);
        const minted = await this.context.tokenIssuer.issue(principal, memberships, options);

        return {
          ...minted.pair,
          principal: summarizePrincipal(principal, minted.claims),
        };
      },
      (error) => {
        console.error(
          '[AuthenticationService] Login failed unexpectedly:',
          sanitizeError(error)
        );
        return AuthErrors.AUTHENTICATION_FAILED();
      }
    );

    await this.context.auditService.log({
      timestamp: this.clock.now(),
      source: 'auth:login',
      userId: result.ok ? result.value.principal.id : undefined,
      action: 'login',
      success: result.ok,
      reason: result.ok ? undefined : result.error.code,
    });

    return result;
  }

  async refresh(accessToken: string, refreshToken: string): Promise<AuthResult<RefreshResult>> {
    return toResult(
      async () => {
        const minted = await this.context.refreshCoordinator.redeem(accessToken, refreshToken);
        return { ...minted.pair };
      },
      (error) => {
        console.error(
          '[AuthenticationService] Refresh failed unexpectedly:',
          sanitizeError(error)
        );
        return AuthErrors.TOKEN_REFRESH_FAILED();
      }
    );
  }

  async logout(
    principalId: string,
    options: LogoutOptions = {}
  ): Promise<AuthResult<{ revoked: number }>> {
    return toResult(
      async () => ({
        revoked: await this.context.refreshCoordinator.revoke(principalId, options.sessionId),
      }),
      (error) => {
        console.error(
          '[AuthenticationService] Logout failed unexpectedly:',
          sanitizeError(error)
        );
        return AuthErrors.TOKEN_REFRESH_FAILED({ operation: 'logout' });
      }
    );
  }

  async validate(accessToken: string): Promise<AuthResult<AccessTokenClaims>> {
    return toResult(
      () => this.context.tokenValidator.validate(accessToken),
      (error) => {
        console.error(
          '[AuthenticationService] Validation failed unexpectedly:',
          sanitizeError(error)
        );
        return AuthErrors.TOKEN_INVALID();
      }
    );
  }

  currentTenant(request: TenantRequest, claims: AccessTokenClaims | null): string | null {
    const resolution = this.context.tenantResolver.resolveTenant(request, claims);
    return resolution.resolved ? resolution.tenantId : null;
  }

  /**
   * Always re-derived from the membership store.
   */
  async permissionsFor(principalId: string, tenantId: string): Promise<Set<string>> {
    return this.context.permissionResolver.effectivePermissions(principalId, tenantId);
  }

  /**
   * Validate the bearer token, resolve the tenant and run the policy's checks.
   * Fails closed: an unexpected fault is a denial.
   */
  async authorizeRequest(
    bearer: string | null | undefined,
    request: TenantRequest,
    policy: AccessPolicy
  ): Promise<AuthResult<AuthorizedContext>> {
    return toResult(
      async () => {
        const token = extractBearerToken(bearer);
        if (!token) {
          throw AuthErrors.TOKEN_INVALID({ reason: 'missing' });
        }

        const claims = await this.context.tokenValidator.validate(token);
        return this.context.authorizationGuard.authorize(claims, request, policy);
      },
      (error) => {
        console.error(
          '[AuthenticationService] Authorization failed unexpectedly:',
          sanitizeError(error)
        );
        return AuthErrors.FORBIDDEN('authorization_error');
      }
    );
  }

  getContext(): AuthCoreContext {
    return this.context;
  }

  /**
   * Stop background housekeeping.
   */
  destroy(): void {
    this.context.sweeper?.stop();
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface AuthCoreCollaborators {
  principals: PrincipalStore;
  memberships: MembershipStore;
  refreshTokens: RefreshTokenStore;
  /** Persistence-backed grants, merged with the ones in configuration */
  permissionGrants?: PermissionGrantSource;
  /** Default: ScryptSecretVerifier */
  secretVerifier?: SecretVerifier;
  /** Hash checked for unknown identifiers so they cost as much as a wrong secret */
  timingHash?: string;
  /** Default: keys from config.tokens */
  signingKeys?: SigningKeyProvider;
  auditStorage?: AuditStorage;
  clock?: Clock;
}

export function createAuthCoreContext(
  config: AuthCoreConfig,
  collaborators: AuthCoreCollaborators
): AuthCoreContext {
  const clock = collaborators.clock ?? systemClock;
  const signingKeys = collaborators.signingKeys ?? new StaticSigningKeyProvider(config.tokens);

  const auditService = new AuditService({
    enabled: config.audit.enabled,
    logAllAttempts: config.audit.logAllAttempts,
    storage: collaborators.auditStorage,
  });

  const tokenOptions = {
    issuer: config.tokens.issuer,
    audience: config.tokens.audience,
  };

  const tokenIssuer = new TokenIssuer(
    signingKeys,
    collaborators.refreshTokens,
    {
      ...tokenOptions,
      accessTokenTtlSeconds: config.tokens.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.tokens.refreshTokenTtlSeconds,
    },
    clock
  );
  const tokenValidator = new TokenValidator(signingKeys, tokenOptions, clock);

  const grantSources: PermissionGrantSource[] = [
    new StaticPermissionGrantSource(grantsFromConfig(config.permissions)),
  ];
  if (collaborators.permissionGrants) {
    grantSources.push(collaborators.permissionGrants);
  }
  const permissionResolver = new PermissionResolver(
    combineGrantSources(...grantSources),
    collaborators.memberships
  );

  const tenantResolver = new TenantResolver(config.tenancy);

  return {
    credentialVerifier: new CredentialVerifier(
      collaborators.principals,
      collaborators.secretVerifier ?? new ScryptSecretVerifier(),
      { timingHash: collaborators.timingHash }
    ),
    tokenIssuer,
    tokenValidator,
    refreshCoordinator: new RefreshCoordinator(
      {
        validator: tokenValidator,
        issuer: tokenIssuer,
        store: collaborators.refreshTokens,
        principals: collaborators.principals,
        memberships: collaborators.memberships,
        auditService,
        clock,
      },
      { revokeSessionOnReplay: config.refresh.revokeSessionOnReplay }
    ),
    tenantResolver,
    permissionResolver,
    authorizationGuard: new AuthorizationGuard({
      tenantResolver,
      permissionResolver,
      memberships: collaborators.memberships,
      auditService,
      clock,
    }),
    auditService,
    memberships: collaborators.memberships,
    sweeper: new RefreshTokenSweeper(collaborators.refreshTokens, {
      intervalMs: config.refresh.sweepIntervalMs,
      retentionSeconds: config.refresh.retentionSeconds,
      clock,
    }),
  };
}

export function createAuthenticationService(
  config: AuthCoreConfig,
  collaborators: AuthCoreCollaborators
): AuthenticationService {
  return new AuthenticationService(
    createAuthCoreContext(config, collaborators),
    collaborators.clock
  );
}
