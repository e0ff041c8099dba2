/**
 * Refresh Coordinator - rotation-on-use for refresh tokens
 *
 * Record lifecycle:
 *
 *   active --redeem--> consumed (replacedById -> successor)
 *   active --logout / principal disabled--> revoked
 *   active --expiresAt <= now--> expired (derived, detected on next use)
 *
 * A refresh token is redeemable exactly once. Two concurrent redemptions of
 * the same value race on RefreshTokenStore.redeemAndReplace; the loser gets
 * REFRESH_TOKEN_INVALID. Presenting a consumed value again is the classic
 * stolen-token signal and is logged and audited as a replay.
 */

import type { AccessTokenClaims, RefreshTokenRecord } from './types.js';
import type {
  RefreshTokenStore,
  PrincipalStore,
  MembershipStore,
} from '../storage/types.js';
import type { TokenValidator } from './token-validator.js';
import { type TokenIssuer, type MintedTokens, hashRefreshToken } from './token-issuer.js';
import { AuditService } from './audit-service.js';
import { type Clock, systemClock } from './clock.js';
import { type AuthError, AuthErrors } from '../utils/errors.js';

export type RefreshRejectionReason =
  | 'not_found'
  | 'consumed'
  | 'revoked'
  | 'expired'
  | 'owner_mismatch'
  | 'principal_inactive'
  | 'concurrent_redemption';

export interface RefreshCoordinatorDependencies {
  validator: TokenValidator;
  issuer: TokenIssuer;
  store: RefreshTokenStore;
  principals: PrincipalStore;
  memberships: MembershipStore;
  auditService?: AuditService;
  clock?: Clock;
}

export interface RefreshCoordinatorOptions {
  /** Revoke the session's active token when a consumed one is replayed (default: false) */
  revokeSessionOnReplay?: boolean;
}

export class RefreshCoordinator {
  private readonly auditService: AuditService;
  private readonly clock: Clock;

  constructor(
    private readonly deps: RefreshCoordinatorDependencies,
    private readonly options: RefreshCoordinatorOptions = {}
  ) {
    this.auditService = deps.auditService ?? new AuditService();
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Redeem a refresh token for a new pair in the same session.
   *
   * The access token only has to carry a valid signature, issuer and
   * audience; it is normally expired by the time a client refreshes.
   *
   * @throws {AuthError} REFRESH_TOKEN_INVALID or TOKEN_INVALID
   */
  async redeem(accessToken: string, refreshToken: string): Promise<MintedTokens> {
    if (typeof refreshToken !== 'string' || refreshToken.trim().length === 0) {
      throw AuthErrors.REFRESH_TOKEN_INVALID('missing');
    }

    const claims = await this.deps.validator.verifySignature(accessToken);
    const now = this.clock.now();

    const record = await this.deps.store.findByHash(hashRefreshToken(refreshToken));
    if (!record) {
      throw await this.rejection('not_found', claims);
    }

    await this.checkRecord(record, claims, now);

    const principal = await this.deps.principals.findById(claims.sub);
    if (!principal || !principal.isActive) {
      await this.deps.store.revokeActive(claims.sub, now, record.sessionId);
      throw await this.rejection('principal_inactive', claims, record);
    }

    const memberships = await this.deps.memberships.listForPrincipal(principal.id);
    const minted = await this.deps.issuer.mint(principal, memberships, {
      sessionId: record.sessionId,
    });

    const rotated = await this.deps.store.redeemAndReplace(record.id, minted.record, now);
    if (!rotated) {
      throw await this.rejection('concurrent_redemption', claims, record);
    }

    console.log('[RefreshCoordinator] Rotated refresh token', {
      principalId: principal.id,
      sessionId: record.sessionId,
      jti: minted.claims.jti,
    });

    await this.auditService.log({
      timestamp: now,
      source: 'auth:refresh',
      userId: principal.id,
      action: 'refresh',
      success: true,
      metadata: { sessionId: record.sessionId, replacedBy: minted.record.id },
    });

    return minted;
  }

  /**
   * Revoke the principal's active refresh tokens, optionally only in one
   * session. Already-issued access tokens stay valid until they expire.
   */
  async revoke(principalId: string, sessionId?: string): Promise<number> {
    const now = this.clock.now();
    const revoked = await this.deps.store.revokeActive(principalId, now, sessionId);

    console.log('[RefreshCoordinator] Revoked refresh tokens', {
      principalId,
      sessionId: sessionId ?? 'all',
      revoked,
    });

    await this.auditService.log({
      timestamp: now,
      source: 'auth:logout',
      userId: principalId,
      action: 'logout',
      success: true,
      metadata: { sessionId: sessionId ?? null, revoked },
    });

    return revoked;
  }

  private async checkRecord(
    record: RefreshTokenRecord,
    claims: AccessTokenClaims,
    now: Date
  ): Promise<void> {
    if (record.state === 'consumed') {
      throw await this.replay(record, claims, now);
    }

    if (record.state === 'revoked') {
      throw await this.rejection('revoked', claims, record);
    }

    if (record.expiresAt <= now) {
      throw await this.rejection('expired', claims, record);
    }

    if (record.principalId !== claims.sub) {
      throw await this.rejection('owner_mismatch', claims, record);
    }
  }

  /**
   * Log and audit a replayed token; returns the error to throw.
   */
  private async replay(
    record: RefreshTokenRecord,
    claims: AccessTokenClaims,
    now: Date
  ): Promise<AuthError> {
    console.warn('[RefreshCoordinator] Consumed refresh token presented again', {
      recordId: record.id,
      ownerId: record.principalId,
      presentedBy: claims.sub,
      sessionId: record.sessionId,
      replacedBy: record.replacedById,
    });

    await this.auditService.log({
      timestamp: now,
      source: 'auth:refresh',
      userId: record.principalId,
      action: 'refresh:replay',
      success: false,
      reason: 'consumed',
      metadata: { recordId: record.id, sessionId: record.sessionId, presentedBy: claims.sub },
    });

    if (this.options.revokeSessionOnReplay) {
      const revoked = await this.deps.store.revokeActive(
        record.principalId,
        now,
        record.sessionId
      );
      console.warn('[RefreshCoordinator] Revoked session after replay', {
        principalId: record.principalId,
        sessionId: record.sessionId,
        revoked,
      });
    }

    return AuthErrors.REFRESH_TOKEN_INVALID('consumed');
  }

  private async rejection(
    reason: RefreshRejectionReason,
    claims: AccessTokenClaims,
    record?: RefreshTokenRecord
  ): Promise<AuthError> {
    console.warn(`[RefreshCoordinator] Refresh rejected: ${reason}`, {
      presentedBy: claims.sub,
      recordId: record?.id,
      sessionId: record?.sessionId,
    });

    await this.auditService.log({
      timestamp: this.clock.now(),
      source: 'auth:refresh',
      userId: claims.sub,
      action: 'refresh:rejected',
      success: false,
      reason,
      metadata: record ? { recordId: record.id, sessionId: record.sessionId } : undefined,
    });

    return AuthErrors.REFRESH_TOKEN_INVALID(reason);
  }
}
