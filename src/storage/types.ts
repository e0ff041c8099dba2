/**
 * Persistence contracts consumed by the core.
 *
 * Two implementations ship with the package: in-memory (tests, single
 * process) and PostgreSQL on the `pg` driver.
 */

import type {
  Principal,
  TenantMembership,
  PermissionGrant,
  RefreshTokenRecord,
} from '../core/types.js';

export interface PrincipalStore {
  /** Lookup is case-insensitive; callers pass the normalised address */
  findByEmail(email: string): Promise<Principal | null>;
  findByUsername(username: string): Promise<Principal | null>;
  findById(id: string): Promise<Principal | null>;
}

export interface MembershipStore {
  /** Every membership of the principal, active or not */
  listForPrincipal(principalId: string): Promise<TenantMembership[]>;
  find(principalId: string, tenantId: string): Promise<TenantMembership | null>;
}

/**
 * Refresh token persistence.
 *
 * `redeemAndReplace` is the only state transition that may race. It must
 * flip the presented record from active to consumed and insert the successor
 * as one indivisible step, returning false when the record was no longer
 * active (or had expired) at the moment of the write.
 */
export interface RefreshTokenStore {
  create(record: RefreshTokenRecord): Promise<void>;
  findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  redeemAndReplace(
    presentedId: string,
    successor: RefreshTokenRecord,
    now: Date
  ): Promise<boolean>;
  /**
   * Revoke active records of a principal, optionally only one session.
   * Returns the number of records revoked.
   */
  revokeActive(principalId: string, now: Date, sessionId?: string): Promise<number>;
  /**
   * Delete consumed, revoked and expired records whose last transition
   * happened before `cutoff`. Returns the number deleted.
   */
  purge(cutoff: Date): Promise<number>;
}

export interface PermissionGrantSource {
  loadGrants(): Promise<PermissionGrant[]>;
}
