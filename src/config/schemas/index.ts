/**
 * Configuration Schemas
 *
 * @example
 * ```json
 * {
 *   "tokens": {
 *     "issuer": "https://erp.example.com",
 *     "audience": "erp-api",
 *     "algorithm": "HS256",
 *     "signingKey": { "secret": { "$secret": "JWT_SECRET" } }
 *   },
 *   "tenancy": { "explicitHeader": "x-company-id", "routeParam": "companyId" },
 *   "permissions": { "roles": { "Manager": ["reports.view"] } }
 * }
 * ```
 */

export {
  HMAC_ALGORITHMS,
  ASYMMETRIC_ALGORITHMS,
  MIN_HMAC_SECRET_LENGTH,
  SigningAlgorithmSchema,
  SigningKeySchema,
  TokenConfigSchema,
  RefreshConfigSchema,
  TenancyConfigSchema,
  PermissionConfigSchema,
  AuditConfigSchema,
  AuthCoreConfigSchema,
  type SigningAlgorithm,
  type SigningKeyConfig,
  type TokenConfig,
  type RefreshConfig,
  type TenancyConfig,
  type PermissionConfig,
  type AuditConfig,
  type AuthCoreConfig,
  type AuthCoreConfigInput,
} from './core.js';
