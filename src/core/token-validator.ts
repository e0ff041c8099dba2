/**
 * Token Validator - access token verification and claim extraction
 *
 * Pure and storage-free: everything needed to accept or reject a token is in
 * the token itself plus the verification key. Checks run in this order:
 *
 * 1. format and size
 * 2. signature (algorithm allow-list of one: the configured algorithm)
 * 3. expiry, with zero clock tolerance
 * 4. issuer and audience
 * 5. claim shape
 *
 * Expired tokens fail with TOKEN_EXPIRED so callers know to refresh; every
 * other failure is TOKEN_INVALID.
 */

import { compactVerify, jwtVerify, errors } from 'jose';
import { z } from 'zod';
import type { AccessTokenClaims } from './types.js';
import type { SigningKeyProvider } from './signing-keys.js';
import { type Clock, systemClock } from './clock.js';
import { AuthError, AuthErrors } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface TokenValidatorOptions {
  issuer: string;
  audience: string;
}

/** Upper bound on the compact serialization */
export const MAX_TOKEN_LENGTH = 8192;

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

export const AccessTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  iss: z.string().min(1),
  aud: z.union([z.string(), z.array(z.string())]),
  sid: z.string().min(1),
  username: z.string().optional(),
  default_tenant_id: z.string().min(1).nullable(),
  tenant_roles: z.array(
    z.object({
      tenant_id: z.string().min(1),
      role: z.string().min(1),
      granted: z.array(z.string().min(1)).optional(),
      revoked: z.array(z.string().min(1)).optional(),
    })
  ),
});

// ============================================================================
// Token Validator
// ============================================================================

export class TokenValidator {
  constructor(
    private readonly keys: SigningKeyProvider,
    private readonly options: TokenValidatorOptions,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Validate a bearer access token.
   *
   * @throws {AuthError} TOKEN_EXPIRED or TOKEN_INVALID
   */
  async validate(token: string): Promise<AccessTokenClaims> {
    this.validateTokenFormat(token);

    let payload: unknown;
    try {
      const verified = await jwtVerify(token, await this.keys.getVerificationKey(), {
        algorithms: [this.keys.algorithm],
        clockTolerance: 0,
        currentDate: this.clock.now(),
      });
      payload = verified.payload;
    } catch (error) {
      throw this.mapVerificationError(error);
    }

    return this.checkClaims(payload);
  }

  /**
   * Verify signature, issuer and audience but not expiry.
   *
   * The refresh path needs the identity in an access token that has usually
   * already expired.
   *
   * @throws {AuthError} TOKEN_INVALID
   */
  async verifySignature(token: string): Promise<AccessTokenClaims> {
    this.validateTokenFormat(token);

    let payload: unknown;
    try {
      const verified = await compactVerify(token, await this.keys.getVerificationKey(), {
        algorithms: [this.keys.algorithm],
      });
      payload = JSON.parse(new TextDecoder().decode(verified.payload));
    } catch (error) {
      throw this.mapVerificationError(error);
    }

    return this.checkClaims(payload);
  }

  /**
   * Three non-empty base64url segments, bounded length.
   */
  private validateTokenFormat(token: string): void {
    if (typeof token !== 'string' || token.length === 0) {
      throw AuthErrors.TOKEN_INVALID({ reason: 'missing' });
    }

    if (token.length > MAX_TOKEN_LENGTH) {
      throw AuthErrors.TOKEN_INVALID({ reason: 'too_large' });
    }

    const parts = token.split('.');
    if (parts.length !== 3 || !parts.every((part) => BASE64URL_SEGMENT.test(part))) {
      throw AuthErrors.TOKEN_INVALID({ reason: 'malformed' });
    }
  }

  private checkClaims(payload: unknown): AccessTokenClaims {
    const parsed = AccessTokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw AuthErrors.TOKEN_INVALID({ reason: 'invalid_claims' });
    }

    const claims = parsed.data;

    if (claims.iss !== this.options.issuer) {
      throw AuthErrors.TOKEN_INVALID({ reason: 'issuer_mismatch' });
    }

    const audiences = Array.isArray(claims.aud) ? claims.aud : [claims.aud];
    if (!audiences.includes(this.options.audience)) {
      throw AuthErrors.TOKEN_INVALID({ reason: 'audience_mismatch' });
    }

    return claims;
  }

  private mapVerificationError(error: unknown): AuthError {
    if (error instanceof AuthError) {
      return error;
    }

    if (error instanceof errors.JWTExpired) {
      return AuthErrors.TOKEN_EXPIRED();
    }

    if (error instanceof errors.JOSEError) {
      return AuthErrors.TOKEN_INVALID({ reason: error.code });
    }

    // JSON.parse of a verified but non-JSON payload
    return AuthErrors.TOKEN_INVALID({ reason: 'invalid_payload' });
  }
}
