/**
 * In-memory stores
 *
 * For tests and single-process deployments. The refresh token store
 * performs its compare-and-set without yielding to the event loop.
 */

import type {
  Principal,
  TenantMembership,
  PermissionGrant,
  RefreshTokenRecord,
} from '../core/types.js';
import type {
  PrincipalStore,
  MembershipStore,
  RefreshTokenStore,
  PermissionGrantSource,
} from './types.js';

export class InMemoryPrincipalStore implements PrincipalStore {
  private readonly principals = new Map<string, Principal>();

  constructor(principals: Principal[] = []) {
    for (const principal of principals) {
      this.add(principal);
    }
  }

  add(principal: Principal): void {
    this.principals.set(principal.id, { ...principal });
  }

  /** Soft-disable; principals are never deleted */
  deactivate(id: string): void {
    const principal = this.principals.get(id);
    if (principal) {
      this.principals.set(id, { ...principal, isActive: false });
    }
  }

  async findByEmail(email: string): Promise<Principal | null> {
    const wanted = email.toLowerCase();
    for (const principal of this.principals.values()) {
      if (principal.email.toLowerCase() === wanted) {
        return { ...principal };
      }
    }
    return null;
  }

  async findByUsername(username: string): Promise<Principal | null> {
    for (const principal of this.principals.values()) {
      if (principal.username === username) {
        return { ...principal };
      }
    }
    return null;
  }

  async findById(id: string): Promise<Principal | null> {
    const principal = this.principals.get(id);
    return principal ? { ...principal } : null;
  }
}

export class InMemoryMembershipStore implements MembershipStore {
  private memberships: TenantMembership[] = [];

  constructor(memberships: TenantMembership[] = []) {
    for (const membership of memberships) {
      this.add(membership);
    }
  }

  add(membership: TenantMembership): void {
    this.memberships.push({ ...membership });
  }

  /** Replace fields of an existing membership (role change, deactivation) */
  update(id: string, changes: Partial<Omit<TenantMembership, 'id'>>): void {
    this.memberships = this.memberships.map((membership) =>
      membership.id === id ? { ...membership, ...changes } : membership
    );
  }

  async listForPrincipal(principalId: string): Promise<TenantMembership[]> {
    return this.memberships
      .filter((membership) => membership.principalId === principalId)
      .map((membership) => ({ ...membership }));
  }

  async find(principalId: string, tenantId: string): Promise<TenantMembership | null> {
    const membership = this.memberships.find(
      (m) => m.principalId === principalId && m.tenantId === tenantId
    );
    return membership ? { ...membership } : null;
  }
}

export class InMemoryRefreshTokenStore implements RefreshTokenStore {
  private readonly records = new Map<string, RefreshTokenRecord>();

  async create(record: RefreshTokenRecord): Promise<void> {
    this.records.set(record.id, { ...record });
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    for (const record of this.records.values()) {
      if (record.tokenHash === tokenHash) {
        return { ...record };
      }
    }
    return null;
  }

  async redeemAndReplace(
    presentedId: string,
    successor: RefreshTokenRecord,
    now: Date
  ): Promise<boolean> {
    // No await below this line: compare and set run in one turn.
    const current = this.records.get(presentedId);
    if (!current || current.state !== 'active' || current.expiresAt <= now) {
      return false;
    }

    this.records.set(presentedId, {
      ...current,
      state: 'consumed',
      consumedAt: now,
      replacedById: successor.id,
    });
    this.records.set(successor.id, { ...successor });
    return true;
  }

  async revokeActive(principalId: string, now: Date, sessionId?: string): Promise<number> {
    let revoked = 0;
    for (const [id, record] of this.records) {
      if (
        record.principalId === principalId &&
        record.state === 'active' &&
        (sessionId === undefined || record.sessionId === sessionId)
      ) {
        this.records.set(id, { ...record, state: 'revoked', revokedAt: now });
        revoked++;
      }
    }
    return revoked;
  }

  async purge(cutoff: Date): Promise<number> {
    let purged = 0;
    for (const [id, record] of this.records) {
      if (deadSinceOf(record) < cutoff) {
        this.records.delete(id);
        purged++;
      }
    }
    return purged;
  }

  /** @internal test access */
  getRecords(): RefreshTokenRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }
}

/** When a record stopped being usable */
function deadSinceOf(record: RefreshTokenRecord): Date {
  if (record.state === 'consumed') {
    return record.consumedAt ?? record.expiresAt;
  }
  if (record.state === 'revoked') {
    return record.revokedAt ?? record.expiresAt;
  }
  return record.expiresAt;
}

export class StaticPermissionGrantSource implements PermissionGrantSource {
  constructor(private grants: PermissionGrant[] = []) {}

  setGrants(grants: PermissionGrant[]): void {
    this.grants = grants;
  }

  async loadGrants(): Promise<PermissionGrant[]> {
    return this.grants.map((grant) => ({ ...grant, permissions: [...grant.permissions] }));
  }
}
