/**
 * Permission Resolver - role to permission mapping per tenant
 *
 * Owns the one role -> permission table of the process. The table is loaded
 * from a PermissionGrantSource by initialize() and replaced wholesale by
 * reload(); checks never re-derive it inline.
 *
 * Lookup for (tenant, role):
 * 1. a grant scoped to that tenant, if one exists (authoritative)
 * 2. otherwise the global grant for the role
 * 3. otherwise nothing
 *
 * Role names compare case-insensitively.
 */

import type { PermissionGrant, TenantMembership, TenantRoleClaim } from './types.js';
import type { MembershipStore, PermissionGrantSource } from '../storage/types.js';
import type { PermissionConfig } from '../config/schemas/core.js';
import { AuthErrors } from '../utils/errors.js';

// ============================================================================
// Grant sources
// ============================================================================

export function grantsFromConfig(config: PermissionConfig): PermissionGrant[] {
  const grants: PermissionGrant[] = Object.entries(config.roles).map(([role, permissions]) => ({
    role,
    tenantId: null,
    permissions,
  }));

  for (const [tenantId, roles] of Object.entries(config.tenantOverrides)) {
    for (const [role, permissions] of Object.entries(roles)) {
      grants.push({ role, tenantId, permissions });
    }
  }

  return grants;
}

/**
 * Concatenate several sources. Grants for the same (tenant, role) are merged.
 */
export function combineGrantSources(...sources: PermissionGrantSource[]): PermissionGrantSource {
  return {
    async loadGrants(): Promise<PermissionGrant[]> {
      const loaded = await Promise.all(sources.map((source) => source.loadGrants()));
      return loaded.flat();
    },
  };
}

// ============================================================================
// Permission table
// ============================================================================

const EMPTY: ReadonlySet<string> = new Set<string>();

function roleKey(role: string): string {
  return role.trim().toLowerCase();
}

/**
 * Immutable snapshot of the grants.
 */
export class PermissionTable {
  private readonly global = new Map<string, Set<string>>();
  private readonly perTenant = new Map<string, Map<string, Set<string>>>();

  constructor(grants: PermissionGrant[]) {
    for (const grant of grants) {
      let byRole = this.global;
      if (grant.tenantId !== null) {
        byRole = this.perTenant.get(grant.tenantId) ?? new Map<string, Set<string>>();
        this.perTenant.set(grant.tenantId, byRole);
      }

      const key = roleKey(grant.role);
      const permissions = byRole.get(key) ?? new Set<string>();
      for (const permission of grant.permissions) {
        permissions.add(permission);
      }
      byRole.set(key, permissions);
    }
  }

  permissionsForRole(tenantId: string, role: string): ReadonlySet<string> {
    const key = roleKey(role);
    return this.perTenant.get(tenantId)?.get(key) ?? this.global.get(key) ?? EMPTY;
  }

  get size(): number {
    let size = this.global.size;
    for (const byRole of this.perTenant.values()) {
      size += byRole.size;
    }
    return size;
  }
}

// ============================================================================
// Permission Resolver
// ============================================================================

export class PermissionResolver {
  private table: PermissionTable | null = null;

  constructor(
    private readonly source: PermissionGrantSource,
    private readonly memberships: MembershipStore
  ) {}

  async initialize(): Promise<void> {
    if (this.table) {
      return;
    }
    await this.reload();
  }

  /**
   * Load a fresh table and swap it in. Checks in flight keep the old one.
   */
  async reload(): Promise<void> {
    const grants = await this.source.loadGrants();
    this.table = new PermissionTable(grants);
    console.log(`[PermissionResolver] Loaded ${this.table.size} role grant(s)`);
  }

  isInitialized(): boolean {
    return this.table !== null;
  }

  /**
   * Permissions the role carries in the tenant. Snapshot path: no storage access.
   */
  permissionsForRole(tenantId: string, role: string): Set<string> {
    return new Set(this.getTable().permissionsForRole(tenantId, role));
  }

  /**
   * (role permissions + granted) - revoked, or empty for an inactive membership.
   */
  permissionsForMembership(membership: TenantMembership): Set<string> {
    if (!membership.isActive) {
      return new Set<string>();
    }

    return this.permissionsWithOverrides(
      membership.tenantId,
      membership.role,
      membership.grantedPermissions,
      membership.revokedPermissions
    );
  }

  /**
   * Same derivation from the role snapshot an access token carries.
   */
  permissionsForClaim(claim: TenantRoleClaim): Set<string> {
    return this.permissionsWithOverrides(claim.tenant_id, claim.role, claim.granted, claim.revoked);
  }

  private permissionsWithOverrides(
    tenantId: string,
    role: string,
    granted: string[] = [],
    revoked: string[] = []
  ): Set<string> {
    const permissions = this.permissionsForRole(tenantId, role);
    for (const permission of granted) {
      permissions.add(permission);
    }
    for (const permission of revoked) {
      permissions.delete(permission);
    }
    return permissions;
  }

  /**
   * Re-derives from the current membership row. Empty when the principal has
   * no active membership in the tenant.
   */
  async effectivePermissions(principalId: string, tenantId: string): Promise<Set<string>> {
    const membership = await this.memberships.find(principalId, tenantId);
    if (!membership) {
      return new Set<string>();
    }
    return this.permissionsForMembership(membership);
  }

  private getTable(): PermissionTable {
    if (!this.table) {
      throw AuthErrors.CONFIGURATION_ERROR(
        'PermissionResolver not initialized. Call initialize() first.'
      );
    }
    return this.table;
  }
}
