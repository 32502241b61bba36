import { z } from 'zod';

/**
 * Claims of an Entra ID access token that this library reads.
 *
 * @property scp - Space-delimited delegated permissions (short names, e.g. `user_impersonation`)
 * @property roles - App roles granted to the caller
 * @property tid - Tenant the token was issued in
 * @property oid - Immutable object id of the caller
 * @property azp - Client application id (v2 tokens)
 * @property appid - Client application id (v1 tokens)
 * @property acct - Account type, `1` for guest accounts
 */
export const AccessTokenClaimsSchema = z.object({
  iss: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  sub: z.string(),
  exp: z.number(),
  nbf: z.number().optional(),
  iat: z.number().optional(),
  scp: z.string().optional(),
  roles: z.array(z.string()).optional(),
  tid: z.string().optional(),
  oid: z.string().optional(),
  name: z.string().optional(),
  email: z.string().optional(),
  preferred_username: z.string().optional(),
  upn: z.string().optional(),
  azp: z.string().optional(),
  appid: z.string().optional(),
  ver: z.string().optional(),
  acct: z.number().optional(),
});

/** Typed claim set; claims this library does not model are kept in `extra`. */
export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsSchema> & {
  extra: Record<string, unknown>;
};

/**
 * Parses a verified JWT payload into {@link AccessTokenClaims}.
 *
 * @throws {z.ZodError} When a modelled claim has the wrong type
 */
export function parseAccessTokenClaims(payload: Record<string, unknown>): AccessTokenClaims {
  const claims = AccessTokenClaimsSchema.parse(payload);
  const extra = Object.fromEntries(
    Object.entries(payload).filter(([claim]) => !(claim in AccessTokenClaimsSchema.shape)),
  );
  return { ...claims, extra };
}
