/**
 * Core Types
 *
 * Domain model shared by every component of the auth core. Nothing in this
 * file performs I/O; persistence contracts live in src/storage/types.ts.
 */

import type { CredentialVerifier } from './credential-verifier.js';
import type { TokenIssuer } from './token-issuer.js';
import type { TokenValidator } from './token-validator.js';
import type { RefreshCoordinator } from './refresh-coordinator.js';
import type { RefreshTokenSweeper } from './refresh-token-sweeper.js';
import type { TenantResolver } from './tenant-resolver.js';
import type { PermissionResolver } from './permission-resolver.js';
import type { AuthorizationGuard } from './authorization-guard.js';
import type { AuditService } from './audit-service.js';
import type { MembershipStore } from '../storage/types.js';

// ============================================================================
// Principals and Memberships
// ============================================================================

/**
 * A user identity. Principals are soft-disabled (isActive=false), never deleted.
 */
export interface Principal {
  id: string;
  username: string;
  email: string;
  /** Opaque reference understood only by the SecretVerifier */
  credentialHash: string;
  isActive: boolean;
  firstName?: string | null;
  lastName?: string | null;
}

/**
 * Link between a principal and a tenant ("company").
 *
 * Memberships are the only authority for role-per-tenant. A principal has at
 * most one membership flagged as default.
 */
export interface TenantMembership {
  id: string;
  principalId: string;
  tenantId: string;
  role: string;
  isActive: boolean;
  isDefault: boolean;
  /** Extra permissions granted to this membership on top of its role */
  grantedPermissions?: string[];
  /** Permissions withheld from this membership even if its role grants them */
  revokedPermissions?: string[];
}

/**
 * Role to permission mapping. `tenantId: null` is the global default;
 * a tenant-scoped grant for the same role overrides it in that tenant.
 */
export interface PermissionGrant {
  role: string;
  tenantId: string | null;
  permissions: string[];
}

// ============================================================================
// Tokens
// ============================================================================

export interface TenantRoleClaim {
  tenant_id: string;
  role: string;
  /** Per-membership overrides, present only when non-empty */
  granted?: string[];
  revoked?: string[];
}

/**
 * Decoded payload of an access token.
 *
 * The tenant_roles snapshot is advisory: sensitive checks re-read memberships.
 */
export interface AccessTokenClaims {
  sub: string;
  jti: string;
  iat: number;
  exp: number;
  iss: string;
  aud: string | string[];
  sid: string;
  username?: string;
  default_tenant_id: string | null;
  tenant_roles: TenantRoleClaim[];
}

export type RefreshTokenState = 'active' | 'consumed' | 'revoked';

/**
 * Persisted refresh token. Only the SHA-256 hash of the value is stored.
 */
export interface RefreshTokenRecord {
  id: string;
  tokenHash: string;
  principalId: string;
  /** Logical session (device); rotation keeps it, a new login starts one */
  sessionId: string;
  issuedAt: Date;
  expiresAt: Date;
  state: RefreshTokenState;
  replacedById: string | null;
  consumedAt: Date | null;
  revokedAt: Date | null;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  accessTokenExpiresAt: Date;
  refreshTokenExpiresAt: Date;
}

// ============================================================================
// Summaries returned to callers
// ============================================================================

export interface PrincipalSummary {
  id: string;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  defaultTenantId: string | null;
  tenants: Array<{ tenantId: string; role: string }>;
}

// ============================================================================
// Request context
// ============================================================================

/**
 * Minimal view of an inbound request: enough to find tenant signals.
 * Header names are matched case-insensitively.
 */
export interface TenantRequest {
  headers?: Record<string, string | string[] | undefined>;
  params?: Record<string, string | undefined>;
}

export interface TenantSignals {
  explicitTenantId?: string | null;
  routeTenantId?: string | null;
}

export type TenantSource = 'explicit' | 'route' | 'token-default';

export type TenantResolution =
  | { resolved: true; tenantId: string; source: TenantSource }
  | { resolved: false };

// ============================================================================
// Audit
// ============================================================================

/**
 * A single audit log entry. `source` names the component that wrote it
 * (e.g. 'auth:login', 'auth:refresh').
 */
export interface AuditEntry {
  timestamp: Date;
  source: string;
  userId?: string;
  action: string;
  success: boolean;
  reason?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Core context
// ============================================================================

/**
 * Every component of the core, wired. Built by createAuthCoreContext() and
 * checked by AuthCoreContextValidator before the facade uses it.
 */
export interface AuthCoreContext {
  credentialVerifier: CredentialVerifier;
  tokenIssuer: TokenIssuer;
  tokenValidator: TokenValidator;
  refreshCoordinator: RefreshCoordinator;
  tenantResolver: TenantResolver;
  permissionResolver: PermissionResolver;
  authorizationGuard: AuthorizationGuard;
  auditService: AuditService;
  memberships: MembershipStore;
  sweeper?: RefreshTokenSweeper;
}
