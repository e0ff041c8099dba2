/**
 * Token Issuer - mints access/refresh token pairs
 *
 * The access token is a signed JWT carrying the principal id, a snapshot of
 * the principal's active tenant roles and the default tenant. The refresh
 * token is an opaque random value; only its SHA-256 hash is persisted.
 */

import { createHash, randomBytes, randomUUID } from 'node:crypto';
import { SignJWT } from 'jose';
import type {
  Principal,
  TenantMembership,
  TenantRoleClaim,
  AccessTokenClaims,
  RefreshTokenRecord,
  TokenPair,
} from './types.js';
import type { RefreshTokenStore } from '../storage/types.js';
import type { SigningKeyProvider } from './signing-keys.js';
import { type Clock, systemClock, toEpochSeconds, addSeconds } from './clock.js';

// ============================================================================
// Types
// ============================================================================

export interface TokenIssuerOptions {
  issuer: string;
  audience: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

export interface MintOptions {
  /** Session (device) the pair belongs to; a fresh one is generated if absent */
  sessionId?: string;
}

/**
 * Result of minting: the pair handed to the caller plus what the rest of the
 * core needs to persist or inspect. `record` is not yet stored.
 */
export interface MintedTokens {
  pair: TokenPair;
  claims: AccessTokenClaims;
  record: RefreshTokenRecord;
}

export const REFRESH_TOKEN_BYTES = 48;

// ============================================================================
// Helpers
// ============================================================================

export function generateRefreshToken(): string {
  return randomBytes(REFRESH_TOKEN_BYTES).toString('base64url');
}

export function hashRefreshToken(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * The default tenant is the first active membership flagged as default.
 */
export function defaultTenantOf(memberships: TenantMembership[]): string | null {
  const defaults = memberships.filter((m) => m.isActive && m.isDefault);

  if (defaults.length > 1) {
    console.warn('[TokenIssuer] Principal has more than one default membership; using the first', {
      principalId: defaults[0].principalId,
      tenants: defaults.map((m) => m.tenantId),
    });
  }

  return defaults.length > 0 ? defaults[0].tenantId : null;
}

export function tenantRolesOf(memberships: TenantMembership[]): TenantRoleClaim[] {
  return memberships
    .filter((m) => m.isActive)
    .map((m) => {
      const claim: TenantRoleClaim = { tenant_id: m.tenantId, role: m.role };
      if (m.grantedPermissions && m.grantedPermissions.length > 0) {
        claim.granted = [...m.grantedPermissions];
      }
      if (m.revokedPermissions && m.revokedPermissions.length > 0) {
        claim.revoked = [...m.revokedPermissions];
      }
      return claim;
    });
}

// ============================================================================
// Token Issuer
// ============================================================================

export class TokenIssuer {
  constructor(
    private readonly keys: SigningKeyProvider,
    private readonly store: RefreshTokenStore,
    private readonly options: TokenIssuerOptions,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Build a new pair without touching storage.
   */
  async mint(
    principal: Principal,
    memberships: TenantMembership[],
    options: MintOptions = {}
  ): Promise<MintedTokens> {
    const now = this.clock.now();
    const sessionId = options.sessionId ?? randomUUID();

    const iat = toEpochSeconds(now);
    const exp = iat + this.options.accessTokenTtlSeconds;

    const claims: AccessTokenClaims = {
      sub: principal.id,
      jti: randomUUID(),
      iat,
      exp,
      iss: this.options.issuer,
      aud: this.options.audience,
      sid: sessionId,
      username: principal.username,
      default_tenant_id: defaultTenantOf(memberships),
      tenant_roles: tenantRolesOf(memberships),
    };

    const accessToken = await new SignJWT({
      sid: claims.sid,
      username: claims.username,
      default_tenant_id: claims.default_tenant_id,
      tenant_roles: claims.tenant_roles,
    })
      .setProtectedHeader({
        alg: this.keys.algorithm,
        typ: 'JWT',
        ...(this.keys.keyId !== undefined && { kid: this.keys.keyId }),
      })
      .setSubject(claims.sub)
      .setJti(claims.jti)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .setIssuer(claims.iss)
      .setAudience(this.options.audience)
      .sign(await this.keys.getSigningKey());

    const refreshToken = generateRefreshToken();
    const refreshExpiresAt = addSeconds(now, this.options.refreshTokenTtlSeconds);

    const record: RefreshTokenRecord = {
      id: randomUUID(),
      tokenHash: hashRefreshToken(refreshToken),
      principalId: principal.id,
      sessionId,
      issuedAt: now,
      expiresAt: refreshExpiresAt,
      state: 'active',
      replacedById: null,
      consumedAt: null,
      revokedAt: null,
    };

    return {
      pair: {
        accessToken,
        refreshToken,
        accessTokenExpiresAt: new Date(exp * 1000),
        refreshTokenExpiresAt: refreshExpiresAt,
      },
      claims,
      record,
    };
  }

  /**
   * Mint a pair for a new login and persist its refresh record. Any token
   * still active in the same session is revoked first.
   */
  async issue(
    principal: Principal,
    memberships: TenantMembership[],
    options: MintOptions = {}
  ): Promise<MintedTokens> {
    const minted = await this.mint(principal, memberships, options);

    if (options.sessionId !== undefined) {
      await this.store.revokeActive(principal.id, this.clock.now(), options.sessionId);
    }
    await this.store.create(minted.record);

    console.log('[TokenIssuer] Issued token pair', {
      principalId: principal.id,
      sessionId: minted.record.sessionId,
      jti: minted.claims.jti,
    });

    return minted;
  }
}
