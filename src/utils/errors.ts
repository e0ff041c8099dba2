/**
 * Auth error taxonomy
 *
 * Every failure that crosses the core boundary is an AuthError with one of
 * the codes below. Components throw; the AuthenticationService facade turns
 * thrown AuthErrors into AuthResult values.
 */

export type AuthErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'TOKEN_INVALID'
  | 'TOKEN_EXPIRED'
  | 'REFRESH_TOKEN_INVALID'
  | 'FORBIDDEN'
  | 'TENANT_REQUIRED'
  | 'TOKEN_REFRESH_FAILED'
  | 'CONFIGURATION_ERROR';

export class AuthError extends Error {
  constructor(
    public readonly code: AuthErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createAuthError(
  code: AuthErrorCode,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): AuthError {
  return new AuthError(code, message, statusCode, details);
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

/**
 * Predefined errors.
 *
 * AUTHENTICATION_FAILED and FORBIDDEN carry fixed messages: the first must not
 * reveal whether the identifier exists, the second must not reveal whether
 * the tenant or resource exists. The reason goes into details, which
 * createErrorResponse only exposes in development.
 */
export const AuthErrors = {
  AUTHENTICATION_FAILED: () =>
    createAuthError('AUTHENTICATION_FAILED', 'Invalid identifier or secret', 401),

  TOKEN_INVALID: (details?: Record<string, unknown>) =>
    createAuthError('TOKEN_INVALID', 'Unauthorized: Invalid access token', 401, details),

  TOKEN_EXPIRED: (details?: Record<string, unknown>) =>
    createAuthError('TOKEN_EXPIRED', 'Unauthorized: Access token has expired', 401, details),

  REFRESH_TOKEN_INVALID: (reason: string) =>
    createAuthError('REFRESH_TOKEN_INVALID', 'Unauthorized: Invalid refresh token', 401, {
      reason,
    }),

  FORBIDDEN: (reason: string, details?: Record<string, unknown>) =>
    createAuthError('FORBIDDEN', 'Forbidden: Access denied', 403, { reason, ...details }),

  TENANT_REQUIRED: () =>
    createAuthError(
      'TENANT_REQUIRED',
      'Unauthorized: Tenant context is required for this operation',
      401
    ),

  TOKEN_REFRESH_FAILED: (details?: Record<string, unknown>) =>
    createAuthError('TOKEN_REFRESH_FAILED', 'Token refresh failed', 500, details),

  CONFIGURATION_ERROR: (message: string) =>
    createAuthError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthError) {
    return {
      type: 'AuthError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: AuthError): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
