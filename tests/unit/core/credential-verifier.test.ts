import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CredentialVerifier } from '../../../src/core/credential-verifier.js';
import { InMemoryPrincipalStore } from '../../../src/storage/in-memory.js';
import {
  PlainSecretVerifier,
  createTestPrincipal,
  plainHash,
} from '../../../src/testing/index.js';

describe('CredentialVerifier', () => {
  let principals: InMemoryPrincipalStore;
  let secrets: PlainSecretVerifier;
  let verifier: CredentialVerifier;

  beforeEach(() => {
    principals = new InMemoryPrincipalStore([createTestPrincipal()]);
    secrets = new PlainSecretVerifier();
    verifier = new CredentialVerifier(principals, secrets, {
      timingHash: plainHash('timing-equaliser'),
    });
  });

  it('should accept an email address with the right secret', async () => {
    await expect(verifier.verify('ana@example.com', 'correct-secret')).resolves.toMatchObject({
      id: 'principal-1',
    });
  });

  it('should match email addresses case-insensitively', async () => {
    await expect(verifier.verify('  ANA@Example.com ', 'correct-secret')).resolves.toMatchObject({
      id: 'principal-1',
    });
  });

  it('should accept a username', async () => {
    await expect(verifier.verify('ana', 'correct-secret')).resolves.toMatchObject({
      id: 'principal-1',
    });
  });

  it('should reject a wrong secret', async () => {
    await expect(verifier.verify('ana', 'wrong-secret')).rejects.toMatchObject({
      code: 'AUTHENTICATION_FAILED',
    });
  });

  it('should reject a disabled principal with the same error', async () => {
    principals.deactivate('principal-1');

    await expect(verifier.verify('ana', 'correct-secret')).rejects.toMatchObject({
      code: 'AUTHENTICATION_FAILED',
      message: 'Invalid identifier or secret',
    });
  });

  it('should not distinguish an unknown identifier from a wrong secret', async () => {
    const unknown = await verifier.verify('nobody@example.com', 'x').catch((e: unknown) => e);
    const wrong = await verifier.verify('ana@example.com', 'x').catch((e: unknown) => e);

    expect(unknown).toEqual(wrong);
  });

  it('should still run the secret verifier for an unknown identifier', async () => {
    const verify = vi.spyOn(secrets, 'verify');

    await expect(verifier.verify('nobody', 'some-secret')).rejects.toMatchObject({
      code: 'AUTHENTICATION_FAILED',
    });
    expect(verify).toHaveBeenCalledWith('some-secret', 'plain:timing-equaliser');
  });

  it.each([
    ['', 'correct-secret'],
    ['   ', 'correct-secret'],
    ['ana', ''],
  ])('should reject blank input (%j, %j) without a lookup', async (identifier, secret) => {
    const lookup = vi.spyOn(principals, 'findByEmail');

    await expect(verifier.verify(identifier, secret)).rejects.toMatchObject({
      code: 'AUTHENTICATION_FAILED',
    });
    expect(lookup).not.toHaveBeenCalled();
  });
});
