/**
 * Authorization Guard
 *
 * A protected operation declares an AccessPolicy once. The guard turns the
 * policy into an ordered list of checks and runs them, stopping at the
 * first denial:
 *
 * 1. tenant context is consistent (explicit tenant may not contradict the route)
 * 2. tenant access: an active membership in the resolved tenant
 * 3. role: the caller's role there is in the allowed set
 * 4. permission: the caller's effective permissions contain the required one
 *
 * Operations with `tenant: 'none'` only need a valid access token.
 *
 * Non-sensitive checks read the role snapshot in the token, including its
 * per-membership grants and revocations. Sensitive checks
 * (and by default any `*.delete` / `*.manage` permission) re-read the
 * membership store, since a snapshot may be up to one access-token TTL old.
 *
 * @example
 * ```typescript
 * const deleteInvoice = guard.protect(
 *   { tenant: 'required', permission: 'transactions.delete' },
 *   async (ctx, invoiceId: string) => invoices.delete(ctx.tenantId, invoiceId)
 * );
 * await deleteInvoice(claims, request, 'inv-42');
 * ```
 */

import type {
  AccessTokenClaims,
  TenantRequest,
  TenantSignals,
  TenantSource,
} from './types.js';
import type { MembershipStore } from '../storage/types.js';
import type { TenantResolver } from './tenant-resolver.js';
import type { PermissionResolver } from './permission-resolver.js';
import { AuditService } from './audit-service.js';
import { type Clock, systemClock } from './clock.js';
import { AuthError, AuthErrors } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface AccessPolicy {
  /** 'none' skips the tenant, role and permission checks */
  tenant: 'required' | 'none';
  /** Allowed roles in the resolved tenant (case-insensitive) */
  roles?: string[];
  /** Permission the caller must hold in the resolved tenant */
  permission?: string;
  /** Re-read memberships instead of trusting the token snapshot */
  sensitive?: boolean;
}

/** Role and permissions of the caller in one tenant */
export interface TenantAccess {
  tenantId: string;
  role: string;
  permissions: ReadonlySet<string>;
  source: 'store' | 'token';
}

export interface GuardContext {
  claims: AccessTokenClaims;
  signals: TenantSignals;
  tenantId: string | null;
  /** Memoized; null when the caller has no active membership in tenantId */
  access(): Promise<TenantAccess | null>;
}

/** Resolves on allow, throws AuthError on deny */
export type GuardCheck = (context: GuardContext) => Promise<void>;

export interface AuthorizedContext {
  principalId: string;
  claims: AccessTokenClaims;
  tenantId: string | null;
  tenantSource: TenantSource | null;
  role: string | null;
  permissions: ReadonlySet<string>;
}

export const SENSITIVE_ACTIONS: readonly string[] = ['delete', 'manage'];

export function isSensitivePermission(permission: string): boolean {
  const action = permission.slice(permission.lastIndexOf('.') + 1).toLowerCase();
  return SENSITIVE_ACTIONS.includes(action);
}

// ============================================================================
// Checks
// ============================================================================

export const tenantContextConsistent: GuardCheck = async ({ signals }) => {
  const explicit = signals.explicitTenantId;
  const route = signals.routeTenantId;
  if (explicit && route && explicit !== route) {
    throw AuthErrors.FORBIDDEN('tenant_context_mismatch');
  }
};

export const tenantAccess: GuardCheck = async (context) => {
  if (context.tenantId === null) {
    throw AuthErrors.TENANT_REQUIRED();
  }
  if (!(await context.access())) {
    throw AuthErrors.FORBIDDEN('no_tenant_access');
  }
};

export function roleIn(roles: string[]): GuardCheck {
  const allowed = roles.map((role) => role.toLowerCase());
  return async (context) => {
    const access = await context.access();
    if (!access || !allowed.includes(access.role.toLowerCase())) {
      throw AuthErrors.FORBIDDEN('role_not_allowed');
    }
  };
}

export function hasPermission(permission: string): GuardCheck {
  return async (context) => {
    const access = await context.access();
    if (!access || !access.permissions.has(permission)) {
      throw AuthErrors.FORBIDDEN('missing_permission', { permission });
    }
  };
}

/**
 * Run checks in order; the first denial wins.
 */
export function composeChecks(...checks: GuardCheck[]): GuardCheck {
  return async (context) => {
    for (const check of checks) {
      await check(context);
    }
  };
}

export function checksForPolicy(policy: AccessPolicy): GuardCheck[] {
  if (policy.tenant === 'none') {
    return [];
  }

  const checks: GuardCheck[] = [tenantContextConsistent, tenantAccess];
  if (policy.roles && policy.roles.length > 0) {
    checks.push(roleIn(policy.roles));
  }
  if (policy.permission) {
    checks.push(hasPermission(policy.permission));
  }
  return checks;
}

// ============================================================================
// Authorization Guard
// ============================================================================

export interface AuthorizationGuardDependencies {
  tenantResolver: TenantResolver;
  permissionResolver: PermissionResolver;
  memberships: MembershipStore;
  auditService?: AuditService;
  clock?: Clock;
}

export class AuthorizationGuard {
  private readonly auditService: AuditService;
  private readonly clock: Clock;

  constructor(private readonly deps: AuthorizationGuardDependencies) {
    this.auditService = deps.auditService ?? new AuditService();
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Evaluate a policy for already-validated claims.
   *
   * @throws {AuthError} FORBIDDEN or TENANT_REQUIRED
   */
  async authorize(
    claims: AccessTokenClaims,
    request: TenantRequest,
    policy: AccessPolicy
  ): Promise<AuthorizedContext> {
    const signals = this.deps.tenantResolver.extractTenantSignals(request);
    const resolution = this.deps.tenantResolver.resolveFromSignals(signals, claims);
    const tenantId = resolution.resolved ? resolution.tenantId : null;

    const sensitive =
      policy.sensitive ?? (policy.permission ? isSensitivePermission(policy.permission) : false);

    let cached: Promise<TenantAccess | null> | undefined;
    const context: GuardContext = {
      claims,
      signals,
      tenantId,
      access: () => {
        cached ??=
          tenantId === null ? Promise.resolve(null) : this.loadAccess(claims, tenantId, sensitive);
        return cached;
      },
    };

    try {
      await composeChecks(...checksForPolicy(policy))(context);
    } catch (error) {
      if (error instanceof AuthError) {
        await this.auditService.log({
          timestamp: this.clock.now(),
          source: 'auth:guard',
          userId: claims.sub,
          action: 'authorize',
          success: false,
          reason: error.code,
          metadata: { tenantId, policy, ...error.details },
        });
      }
      throw error;
    }

    const access = policy.tenant === 'none' ? null : await context.access();

    return {
      principalId: claims.sub,
      claims,
      tenantId,
      tenantSource: resolution.resolved ? resolution.source : null,
      role: access?.role ?? null,
      permissions: access?.permissions ?? new Set<string>(),
    };
  }

  /**
   * Wrap an operation so its policy is declared once and checked before the
   * body runs.
   */
  protect<A extends unknown[], R>(
    policy: AccessPolicy,
    operation: (context: AuthorizedContext, ...args: A) => Promise<R>
  ): (claims: AccessTokenClaims, request: TenantRequest, ...args: A) => Promise<R> {
    return async (claims, request, ...args) => {
      const context = await this.authorize(claims, request, policy);
      return operation(context, ...args);
    };
  }

  private async loadAccess(
    claims: AccessTokenClaims,
    tenantId: string,
    sensitive: boolean
  ): Promise<TenantAccess | null> {
    if (sensitive) {
      const membership = await this.deps.memberships.find(claims.sub, tenantId);
      if (!membership || !membership.isActive) {
        return null;
      }
      return {
        tenantId,
        role: membership.role,
        permissions: this.deps.permissionResolver.permissionsForMembership(membership),
        source: 'store',
      };
    }

    const snapshot = claims.tenant_roles.find((entry) => entry.tenant_id === tenantId);
    if (!snapshot) {
      return null;
    }
    return {
      tenantId,
      role: snapshot.role,
      permissions: this.deps.permissionResolver.permissionsForClaim(snapshot),
      source: 'token',
    };
  }
}

// ============================================================================
// Authorization helpers for operation bodies
// ============================================================================

/**
 * Soft (boolean) and hard (throwing) checks over an AuthorizedContext, for
 * decisions an operation makes after the guard has let it in.
 */
export class Authorization {
  hasRole(context: AuthorizedContext, role: string): boolean {
    return context.role !== null && context.role.toLowerCase() === role.toLowerCase();
  }

  hasAnyRole(context: AuthorizedContext, roles: string[]): boolean {
    return roles.some((role) => this.hasRole(context, role));
  }

  hasPermission(context: AuthorizedContext, permission: string): boolean {
    return context.permissions.has(permission);
  }

  hasAnyPermission(context: AuthorizedContext, permissions: string[]): boolean {
    return permissions.some((permission) => context.permissions.has(permission));
  }

  hasAllPermissions(context: AuthorizedContext, permissions: string[]): boolean {
    return permissions.every((permission) => context.permissions.has(permission));
  }

  /** @throws {AuthError} TENANT_REQUIRED */
  requireTenant(context: AuthorizedContext): string {
    if (context.tenantId === null) {
      throw AuthErrors.TENANT_REQUIRED();
    }
    return context.tenantId;
  }

  /** @throws {AuthError} FORBIDDEN */
  requireAnyRole(context: AuthorizedContext, roles: string[]): void {
    if (!this.hasAnyRole(context, roles)) {
      throw AuthErrors.FORBIDDEN('role_not_allowed');
    }
  }

  /** @throws {AuthError} FORBIDDEN */
  requirePermission(context: AuthorizedContext, permission: string): void {
    if (!this.hasPermission(context, permission)) {
      throw AuthErrors.FORBIDDEN('missing_permission', { permission });
    }
  }

  /** @throws {AuthError} FORBIDDEN */
  requireAllPermissions(context: AuthorizedContext, permissions: string[]): void {
    const missing = permissions.filter((permission) => !context.permissions.has(permission));
    if (missing.length > 0) {
      throw AuthErrors.FORBIDDEN('missing_permission', { permissions: missing });
    }
  }
}
