import { z } from 'zod';

/** Asymmetric JWS algorithms that may be allow-listed. `none` and HMAC are never accepted. */
export const SUPPORTED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

export type SigningAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

// Tenant GUID or verified domain; it becomes a path segment of the authority URL
const TenantIdSchema = z
  .string()
  .min(1, 'tenantId is required')
  .regex(/^[A-Za-z0-9.-]+$/, 'tenantId must be a GUID or domain name');

export const EntraSecurityOptionsSchema = z.object({
  algorithms: z.array(z.enum(SUPPORTED_ALGORITHMS)).min(1).default(['RS256']),
  clockSkewSeconds: z.number().int().nonnegative().default(60),
  scopePolicy: z.enum(['any', 'all']).default('any'),
  allowGuestUsers: z.boolean().default(false),
  tokenVersion: z.union([z.literal(1), z.literal(2)]).default(2),
  audiences: z.array(z.string().min(1)).min(1).optional(),
});

export const EntraMetadataOptionsSchema = z.object({
  ttlMs: z.number().int().positive().optional(),
  fetchTimeoutMs: z.number().int().positive().default(10_000),
  refreshRetryMs: z.number().int().nonnegative().optional(),
  useAppIdForMetadata: z.boolean().default(false),
});

/**
 * Zod schema for the data part of {@link EntraAuthConfig}. Defaults are applied
 * here so every component reads fully resolved options.
 */
export const EntraAuthOptionsSchema = z.object({
  tenantId: TenantIdSchema,
  appClientId: z.string().min(1, 'appClientId is required'),
  authority: z
    .url()
    .default('https://login.microsoftonline.com')
    .transform((authority) => authority.replace(/\/+$/, '')),
  security: EntraSecurityOptionsSchema.prefault({}),
  metadata: EntraMetadataOptionsSchema.prefault({}),
});

export type EntraAuthOptions = z.infer<typeof EntraAuthOptionsSchema>;
export type EntraSecurityOptions = z.infer<typeof EntraSecurityOptionsSchema>;
export type EntraMetadataOptions = z.infer<typeof EntraMetadataOptionsSchema>;
