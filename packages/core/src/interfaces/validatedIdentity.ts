import type { AccessTokenClaims } from '../schemas/entra/accessTokenClaims.schema.js';

/**
 * Caller identity produced by a successful token verification.
 * Created per request and discarded when the request ends.
 */
export interface ValidatedIdentity {
  /** Subject claim, pairwise per application */
  subject: string;

  /** Directory (tenant) the caller signed in to */
  tenantId?: string;

  /** Immutable object id of the caller across applications */
  objectId?: string;

  /** Display name */
  name?: string;

  /** Email, falling back to `preferred_username` then `upn` */
  email?: string;

  /** Delegated permissions from the `scp` claim */
  scopes: string[];

  /** App roles from the `roles` claim */
  roles: string[];

  /** Client application that requested the token (`azp` or `appid`) */
  clientId?: string;

  /** Full typed claim set for anything not surfaced above */
  claims: AccessTokenClaims;
}
