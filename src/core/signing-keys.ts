/**
 * Signing key provider
 *
 * The algorithm and key material are configuration. HMAC algorithms share a
 * secret between signer and verifier; RS256/ES256 sign with a PKCS#8 private
 * key and verify with the matching SPKI public key.
 */

import { importPKCS8, importSPKI, type KeyLike } from 'jose';
import {
  HMAC_ALGORITHMS,
  type SigningAlgorithm,
  type TokenConfig,
} from '../config/schemas/core.js';
import { AuthErrors } from '../utils/errors.js';

export type TokenKey = KeyLike | Uint8Array;

export interface SigningKeyProvider {
  readonly algorithm: SigningAlgorithm;
  readonly keyId?: string;
  getSigningKey(): Promise<TokenKey>;
  getVerificationKey(): Promise<TokenKey>;
}

export function isHmacAlgorithm(algorithm: SigningAlgorithm): boolean {
  return HMAC_ALGORITHMS.some((hmac) => hmac === algorithm);
}

/**
 * Keys taken once from configuration. Imported keys are cached.
 */
export class StaticSigningKeyProvider implements SigningKeyProvider {
  readonly algorithm: SigningAlgorithm;
  readonly keyId?: string;
  private signingKey?: Promise<TokenKey>;
  private verificationKey?: Promise<TokenKey>;

  constructor(private readonly tokens: Pick<TokenConfig, 'algorithm' | 'signingKey'>) {
    this.algorithm = tokens.algorithm;
    this.keyId = tokens.signingKey.keyId;
  }

  getSigningKey(): Promise<TokenKey> {
    this.signingKey ??= this.load('private');
    return this.signingKey;
  }

  getVerificationKey(): Promise<TokenKey> {
    this.verificationKey ??= this.load('public');
    return this.verificationKey;
  }

  private async load(use: 'private' | 'public'): Promise<TokenKey> {
    const { signingKey } = this.tokens;

    if (isHmacAlgorithm(this.algorithm)) {
      if (!signingKey.secret) {
        throw AuthErrors.CONFIGURATION_ERROR(`${this.algorithm} requires signingKey.secret`);
      }
      return new TextEncoder().encode(signingKey.secret);
    }

    const pem = use === 'private' ? signingKey.privateKeyPem : signingKey.publicKeyPem;
    if (!pem) {
      throw AuthErrors.CONFIGURATION_ERROR(
        `${this.algorithm} requires signingKey.${use === 'private' ? 'privateKeyPem' : 'publicKeyPem'}`
      );
    }

    try {
      return use === 'private'
        ? await importPKCS8(pem, this.algorithm)
        : await importSPKI(pem, this.algorithm);
    } catch (error) {
      throw AuthErrors.CONFIGURATION_ERROR(
        `Unable to import ${use} key for ${this.algorithm}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
