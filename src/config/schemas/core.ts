/**
 * Auth Core Configuration Schema
 *
 * Configuration for token issuance/validation, refresh rotation, tenant
 * resolution, the role to permission table and audit logging.
 */

import { z } from 'zod';

// ============================================================================
// Tokens
// ============================================================================

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export const ASYMMETRIC_ALGORITHMS = ['RS256', 'ES256'] as const;

/** Minimum HMAC secret length (characters) */
export const MIN_HMAC_SECRET_LENGTH = 32;

export const SigningAlgorithmSchema = z.enum([...HMAC_ALGORITHMS, ...ASYMMETRIC_ALGORITHMS]);

/**
 * Key material. HS* algorithms use `secret`; RS256/ES256 use the PEM pair
 * (PKCS#8 private key, SPKI public key).
 */
export const SigningKeySchema = z.object({
  secret: z.string().optional().describe('Shared HMAC secret (HS256/HS384/HS512)'),
  privateKeyPem: z.string().optional().describe('PKCS#8 PEM private key (RS256/ES256)'),
  publicKeyPem: z.string().optional().describe('SPKI PEM public key (RS256/ES256)'),
  keyId: z.string().min(1).optional().describe('Key id written to the token header'),
});

export const TokenConfigSchema = z
  .object({
    issuer: z.string().min(1).describe('iss claim written and required'),
    audience: z.string().min(1).describe('aud claim written and required'),
    algorithm: SigningAlgorithmSchema.default('HS256'),
    accessTokenTtlSeconds: z
      .number()
      .int()
      .min(60)
      .max(86400)
      .default(900)
      .describe('Access token lifetime (1 minute to 1 day, default 15 minutes)'),
    refreshTokenTtlSeconds: z
      .number()
      .int()
      .min(60)
      .max(2592000)
      .default(604800)
      .describe('Refresh token lifetime (1 minute to 30 days, default 7 days)'),
    signingKey: SigningKeySchema,
  })
  .superRefine((tokens, ctx) => {
    const isHmac = HMAC_ALGORITHMS.some((hmac) => hmac === tokens.algorithm);

    if (isHmac) {
      const secret = tokens.signingKey.secret ?? '';
      if (secret.length < MIN_HMAC_SECRET_LENGTH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['signingKey', 'secret'],
          message: `${tokens.algorithm} requires a secret of at least ${MIN_HMAC_SECRET_LENGTH} characters`,
        });
      }
      return;
    }

    if (!tokens.signingKey.privateKeyPem || !tokens.signingKey.publicKeyPem) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['signingKey'],
        message: `${tokens.algorithm} requires both privateKeyPem and publicKeyPem`,
      });
    }
  });

// ============================================================================
// Refresh rotation
// ============================================================================

export const RefreshConfigSchema = z.object({
  revokeSessionOnReplay: z
    .boolean()
    .default(false)
    .describe('Revoke the whole session chain when a consumed refresh token is presented again'),
  sweepIntervalMs: z
    .number()
    .int()
    .min(60000)
    .default(3600000)
    .describe('How often the sweeper purges dead refresh tokens'),
  retentionSeconds: z
    .number()
    .int()
    .min(0)
    .default(86400)
    .describe('How long consumed/revoked/expired records are kept before purge'),
});

// ============================================================================
// Tenancy
// ============================================================================

export const TenancyConfigSchema = z.object({
  explicitHeader: z
    .string()
    .min(1)
    .default('x-company-id')
    .transform((name) => name.toLowerCase())
    .describe('Request header carrying an explicit tenant id'),
  routeParam: z.string().min(1).default('companyId').describe('Route parameter naming the tenant'),
});

// ============================================================================
// Permissions
// ============================================================================

const PermissionListSchema = z.array(z.string().min(1));

export const PermissionConfigSchema = z.object({
  roles: z
    .record(PermissionListSchema)
    .default({})
    .describe('Global role -> permissions table (fallback for every tenant)'),
  tenantOverrides: z
    .record(z.record(PermissionListSchema))
    .default({})
    .describe('tenantId -> role -> permissions; authoritative within that tenant'),
});

// ============================================================================
// Audit
// ============================================================================

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false).describe('Enable audit logging'),
  logAllAttempts: z
    .boolean()
    .default(true)
    .describe('Log successful operations too, not only failures'),
});

// ============================================================================
// Auth Core Configuration
// ============================================================================

export const AuthCoreConfigSchema = z.object({
  tokens: TokenConfigSchema,
  refresh: RefreshConfigSchema.default({}),
  tenancy: TenancyConfigSchema.default({}),
  permissions: PermissionConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

// ============================================================================
// TypeScript Types
// ============================================================================

export type SigningAlgorithm = z.infer<typeof SigningAlgorithmSchema>;
export type SigningKeyConfig = z.infer<typeof SigningKeySchema>;
export type TokenConfig = z.infer<typeof TokenConfigSchema>;
export type RefreshConfig = z.infer<typeof RefreshConfigSchema>;
export type TenancyConfig = z.infer<typeof TenancyConfigSchema>;
export type PermissionConfig = z.infer<typeof PermissionConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuthCoreConfig = z.infer<typeof AuthCoreConfigSchema>;
export type AuthCoreConfigInput = z.input<typeof AuthCoreConfigSchema>;
