import * as z from 'zod';

/**
 * Public signing key as published in the tenant's JWKS (RFC 7517).
 * Unknown parameters are dropped; only what verification needs is kept.
 */
export const SigningKeySchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  use: z.string().optional(),
  alg: z.string().optional(),
  // RSA
  n: z.string().optional(),
  e: z.string().optional(),
  // EC
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  x5c: z.array(z.string()).optional(),
  x5t: z.string().optional(),
});

export const SigningKeySetSchema = z.object({
  keys: z.array(SigningKeySchema),
});

export type SigningKey = z.infer<typeof SigningKeySchema>;
export type SigningKeySet = z.infer<typeof SigningKeySetSchema>;
