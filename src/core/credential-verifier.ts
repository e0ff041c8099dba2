/**
 * Credential Verifier - identifier + secret against the principal store
 *
 * Every rejection is the same AUTHENTICATION_FAILED error so a caller cannot
 * tell an unknown identifier from a wrong secret or a disabled account.
 */

import type { Principal } from './types.js';
import type { PrincipalStore } from '../storage/types.js';
import type { SecretVerifier } from './secret-verifier.js';
import { AuthErrors } from '../utils/errors.js';

export interface CredentialVerifierOptions {
  /**
   * Hash verified when the identifier is unknown, so that path costs about
   * as much as a wrong secret.
   */
  timingHash?: string;
}

export class CredentialVerifier {
  constructor(
    private readonly principals: PrincipalStore,
    private readonly secrets: SecretVerifier,
    private readonly options: CredentialVerifierOptions = {}
  ) {}

  /**
   * Identifier is an email address (case-insensitive) or a username.
   *
   * @throws {AuthError} AUTHENTICATION_FAILED
   */
  async verify(identifier: string, secret: string): Promise<Principal> {
    const normalized = identifier.trim();
    if (normalized.length === 0 || secret.length === 0) {
      throw AuthErrors.AUTHENTICATION_FAILED();
    }

    const principal =
      (await this.principals.findByEmail(normalized.toLowerCase())) ??
      (await this.principals.findByUsername(normalized));

    if (!principal) {
      await this.secrets.verify(secret, this.options.timingHash ?? '');
      throw AuthErrors.AUTHENTICATION_FAILED();
    }

    const matches = await this.secrets.verify(secret, principal.credentialHash);
    if (!matches || !principal.isActive) {
      throw AuthErrors.AUTHENTICATION_FAILED();
    }

    return principal;
  }
}
