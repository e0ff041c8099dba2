/**
 * Core Validators
 *
 * Runtime check that an AuthCoreContext is fully wired before the facade
 * starts serving requests.
 */

import type { AuthCoreContext } from './types.js';
import { AuthErrors } from '../utils/errors.js';

const REQUIRED_COMPONENTS = [
  'credentialVerifier',
  'tokenIssuer',
  'tokenValidator',
  'refreshCoordinator',
  'tenantResolver',
  'permissionResolver',
  'authorizationGuard',
  'auditService',
  'memberships',
] as const;

export class AuthCoreContextValidator {
  /**
   * @throws {AuthError} CONFIGURATION_ERROR naming the first missing component
   */
  static validate(context: unknown): asserts context is AuthCoreContext {
    if (!context || typeof context !== 'object') {
      throw AuthErrors.CONFIGURATION_ERROR('AuthCoreContext must be an object');
    }

    for (const component of REQUIRED_COMPONENTS) {
      if (!(component in context) || !Reflect.get(context, component)) {
        throw AuthErrors.CONFIGURATION_ERROR(
          `AuthCoreContext missing required component: ${component}`
        );
      }
    }
  }

  static isValid(context: unknown): context is AuthCoreContext {
    return (
      typeof context === 'object' &&
      context !== null &&
      REQUIRED_COMPONENTS.every((component) => Boolean(Reflect.get(context, component)))
    );
  }
}
