import { AuthError } from './errors.js';

/**
 * Outcome of a core operation. Failures are values, never uncaught faults.
 */
export type AuthResult<T> = { ok: true; value: T } | { ok: false; error: AuthError };

export function success<T>(value: T): AuthResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: AuthError): AuthResult<T> {
  return { ok: false, error };
}

/**
 * Run an operation and capture a thrown AuthError as a failure result.
 *
 * Anything that is not an AuthError is handed to `onUnexpected`, which must
 * map it to the AuthError the caller should see.
 */
export async function toResult<T>(
  operation: () => Promise<T>,
  onUnexpected: (error: unknown) => AuthError
): Promise<AuthResult<T>> {
  try {
    return success(await operation());
  } catch (error) {
    if (error instanceof AuthError) {
      return failure(error);
    }
    return failure(onUnexpected(error));
  }
}
