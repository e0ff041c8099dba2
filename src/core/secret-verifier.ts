/**
 * Secret verification
 *
 * The hashing scheme is a collaborator. ScryptSecretVerifier is the default:
 * encoded as `scrypt$1$N$r$p$salt$hash` (base64url salt and hash).
 */

import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

export interface SecretVerifier {
  verify(secret: string, credentialHash: string): Promise<boolean>;
}

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
  keylen: number;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = {
  N: 16384,
  r: 8,
  p: 1,
  keylen: 64,
};

function scryptAsync(
  secret: string,
  salt: Buffer,
  keylen: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(secret, salt, keylen, options, (err, derivedKey) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(derivedKey);
    });
  });
}

interface ParsedHash {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
}

function parseScryptHash(encoded: string): ParsedHash | null {
  const parts = encoded.split('$');
  if (parts.length !== 7) {
    return null;
  }

  const [kind, version, rawN, rawR, rawP, salt64, hash64] = parts;
  if (kind !== 'scrypt' || version !== '1') {
    return null;
  }

  const N = Number(rawN);
  const r = Number(rawR);
  const p = Number(rawP);
  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p)) {
    return null;
  }
  if (N <= 1 || r <= 0 || p <= 0) {
    return null;
  }

  const salt = Buffer.from(salt64, 'base64url');
  const hash = Buffer.from(hash64, 'base64url');
  if (salt.length < 8 || hash.length < 32) {
    return null;
  }

  return { params: { N, r, p, keylen: hash.length }, salt, hash };
}

export async function hashSecret(
  secret: string,
  params: Partial<ScryptParams> = {}
): Promise<string> {
  const p: ScryptParams = { ...DEFAULT_SCRYPT_PARAMS, ...params };
  const salt = randomBytes(16);
  const derived = await scryptAsync(secret, salt, p.keylen, { N: p.N, r: p.r, p: p.p });
  return `scrypt$1$${p.N}$${p.r}$${p.p}$${salt.toString('base64url')}$${derived.toString('base64url')}`;
}

export class ScryptSecretVerifier implements SecretVerifier {
  async verify(secret: string, credentialHash: string): Promise<boolean> {
    const parsed = parseScryptHash(credentialHash);
    if (!parsed) {
      return false;
    }

    const derived = await scryptAsync(secret, parsed.salt, parsed.params.keylen, {
      N: parsed.params.N,
      r: parsed.params.r,
      p: parsed.params.p,
    });

    return derived.length === parsed.hash.length && timingSafeEqual(derived, parsed.hash);
  }
}
