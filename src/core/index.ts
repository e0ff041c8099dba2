/**
 * Core Module Public API
 */

// ============================================================================
// Services
// ============================================================================

export {
  AuthenticationService,
  createAuthenticationService,
  createAuthCoreContext,
  extractBearerToken,
  summarizePrincipal,
} from './authentication-service.js';
export type {
  AuthCoreCollaborators,
  LoginOptions,
  LogoutOptions,
  LoginResult,
  RefreshResult,
} from './authentication-service.js';

export { CredentialVerifier } from './credential-verifier.js';
export type { CredentialVerifierOptions } from './credential-verifier.js';

export {
  ScryptSecretVerifier,
  hashSecret,
  DEFAULT_SCRYPT_PARAMS,
} from './secret-verifier.js';
export type { SecretVerifier, ScryptParams } from './secret-verifier.js';

export { StaticSigningKeyProvider, isHmacAlgorithm } from './signing-keys.js';
export type { SigningKeyProvider, TokenKey } from './signing-keys.js';

export {
  TokenIssuer,
  generateRefreshToken,
  hashRefreshToken,
  defaultTenantOf,
  tenantRolesOf,
  REFRESH_TOKEN_BYTES,
} from './token-issuer.js';
export type { TokenIssuerOptions, MintOptions, MintedTokens } from './token-issuer.js';

export { TokenValidator, AccessTokenClaimsSchema, MAX_TOKEN_LENGTH } from './token-validator.js';
export type { TokenValidatorOptions } from './token-validator.js';

export { RefreshCoordinator } from './refresh-coordinator.js';
export type {
  RefreshCoordinatorDependencies,
  RefreshCoordinatorOptions,
  RefreshRejectionReason,
} from './refresh-coordinator.js';

export { RefreshTokenSweeper } from './refresh-token-sweeper.js';
export type { RefreshTokenSweeperOptions } from './refresh-token-sweeper.js';

export {
  TenantResolver,
  DEFAULT_TENANT_HEADER,
  DEFAULT_TENANT_ROUTE_PARAM,
} from './tenant-resolver.js';
export type { TenantResolverOptions } from './tenant-resolver.js';

export {
  PermissionResolver,
  PermissionTable,
  grantsFromConfig,
  combineGrantSources,
} from './permission-resolver.js';

export {
  AuthorizationGuard,
  Authorization,
  composeChecks,
  checksForPolicy,
  tenantContextConsistent,
  tenantAccess,
  roleIn,
  hasPermission,
  isSensitivePermission,
  SENSITIVE_ACTIONS,
} from './authorization-guard.js';
export type {
  AccessPolicy,
  AuthorizedContext,
  GuardCheck,
  GuardContext,
  TenantAccess,
  AuthorizationGuardDependencies,
} from './authorization-guard.js';

export { AuditService, InMemoryAuditStorage, DEFAULT_AUDIT_CAPACITY } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { AuthCoreContextValidator } from './validators.js';

export { systemClock, toEpochSeconds, addSeconds } from './clock.js';
export type { Clock } from './clock.js';

// ============================================================================
// Types
// ============================================================================

export type {
  AuthCoreContext,
  Principal,
  TenantMembership,
  PermissionGrant,
  TenantRoleClaim,
  AccessTokenClaims,
  RefreshTokenState,
  RefreshTokenRecord,
  TokenPair,
  PrincipalSummary,
  TenantRequest,
  TenantSignals,
  TenantSource,
  TenantResolution,
  AuditEntry,
} from './types.js';
