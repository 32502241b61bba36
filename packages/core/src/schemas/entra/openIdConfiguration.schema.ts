import * as z from 'zod';

/**
 * Zod schema for the tenant's OpenID Connect discovery document
 * (`/.well-known/openid-configuration`).
 *
 * Only `issuer` and `jwks_uri` are needed to verify access tokens; the rest is
 * accepted when present and any other provider-specific field is kept as-is.
 *
 * @property issuer - Issuer the provider stamps into tokens
 * @property jwks_uri - JSON Web Key Set endpoint for signature verification
 * @property id_token_signing_alg_values_supported - Algorithms the provider signs with
 */
export const OpenIDConfigurationSchema = z
  .object({
    issuer: z.string().min(1),
    jwks_uri: z.url(),
    id_token_signing_alg_values_supported: z.array(z.string()).optional(),
    token_endpoint: z.url().optional(),
    authorization_endpoint: z.url().optional(),
    tenant_region_scope: z.string().nullish(),
  })
  .loose();

export type OpenIDConfiguration = z.infer<typeof OpenIDConfigurationSchema>;
