import {
  decodeJwt,
  decodeProtectedHeader,
  errors,
  type JWK,
  type JWTHeaderParameters,
  type JWTPayload,
  jwtVerify,
} from 'jose';
import type { Logger } from 'pino';

import {
  DisallowedAlgorithmError,
  EntraAuthError,
  InvalidAudienceError,
  InvalidIssuerError,
  InvalidSignatureError,
  MalformedTokenError,
  TokenExpiredError,
  TokenNotYetValidError,
  UnknownSigningKeyError,
} from '../errors/entraAuthError.js';
import type { ValidatedIdentity } from '../interfaces/validatedIdentity.js';
import {
  type AccessTokenClaims,
  parseAccessTokenClaims,
} from '../schemas/entra/accessTokenClaims.schema.js';
import type { SigningKey } from '../schemas/entra/signingKeySet.schema.js';
import { type TokenHeader, TokenHeaderSchema } from '../schemas/entra/tokenHeader.schema.js';
import type { SigningAlgorithm } from '../schemas/entraAuthOptions.schema.js';
import { formatError } from '../utils/errorFormatting.js';
import { parseScopeClaim } from '../utils/scopes.js';

import type { OpenIdMetadataCache } from './openIdMetadata.service.js';

export interface TokenVerifierOptions {
  /** Allow-listed `alg` values; anything else is rejected before a key is looked up */
  algorithms: readonly SigningAlgorithm[];
  /** Tolerance applied to both `exp` and `nbf` */
  clockSkewSeconds: number;
  clock: () => Date;
  logger: Logger;
}

/**
 * Verifies Entra ID access tokens: structure, algorithm, signature, issuer, audience and
 * validity window, in that order. Claims are only trusted once the signature has verified.
 */
export class TokenVerifier {
  constructor(
    private metadataCache: OpenIdMetadataCache,
    private options: TokenVerifierOptions,
  ) {}

  /**
   * Verifies a raw bearer token and builds the caller's identity from its claims.
   *
   * @param rawToken - Compact JWS from the `Authorization` header
   * @param expectedAudience - Accepted audience value(s); the token must carry at least one
   * @param expectedIssuer - Exact issuer the token must carry
   * @returns Identity built from the verified claims
   * @throws {EntraAuthError} Subclass naming the first check that failed
   */
  async verify(
    rawToken: string,
    expectedAudience: string | readonly string[],
    expectedIssuer: string,
  ): Promise<ValidatedIdentity> {
    const header = decodeHeader(rawToken);

    const allowed: readonly string[] = this.options.algorithms;
    if (!allowed.includes(header.alg)) {
      throw new DisallowedAlgorithmError(header.alg);
    }

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(
        rawToken,
        (protectedHeader) => this.resolveKey(protectedHeader),
        {
          algorithms: [...this.options.algorithms],
          issuer: expectedIssuer,
          audience: typeof expectedAudience === 'string' ? expectedAudience : [...expectedAudience],
          clockTolerance: this.options.clockSkewSeconds,
          currentDate: this.options.clock(),
          requiredClaims: ['exp'],
        },
      ));
    } catch (error) {
      throw toVerificationError(error);
    }

    let claims: AccessTokenClaims;
    try {
      claims = parseAccessTokenClaims(payload);
    } catch (error) {
      throw new MalformedTokenError('Token claims have unexpected types', { cause: error });
    }

    this.options.logger.debug({ sub: claims.sub, tid: claims.tid }, 'Access token verified');
    return toValidatedIdentity(claims);
  }

  private async resolveKey(header: JWTHeaderParameters): Promise<JWK> {
    if (!header.kid) {
      throw new UnknownSigningKeyError(undefined);
    }
    const key = await this.metadataCache.getSigningKey(header.kid);
    if (!keyAllowsAlgorithm(key, header.alg)) {
      throw new DisallowedAlgorithmError(header.alg);
    }
    return key;
  }
}

/**
 * Builds the application-facing identity from a verified claim set.
 */
export function toValidatedIdentity(claims: AccessTokenClaims): ValidatedIdentity {
  return {
    subject: claims.sub,
    tenantId: claims.tid,
    objectId: claims.oid,
    name: claims.name,
    email: claims.email ?? claims.preferred_username ?? claims.upn,
    scopes: parseScopeClaim(claims.scp),
    roles: claims.roles ?? [],
    clientId: claims.azp ?? claims.appid,
    claims,
  };
}

function decodeHeader(rawToken: string): TokenHeader {
  let header: unknown;
  try {
    header = decodeProtectedHeader(rawToken);
    // also rejects anything that is not exactly three segments with a JSON object payload
    decodeJwt(rawToken);
  } catch (error) {
    throw new MalformedTokenError(`Token is not a decodable JWT: ${formatError(error)}`, {
      cause: error,
    });
  }

  const result = TokenHeaderSchema.safeParse(header);
  if (!result.success) {
    throw new MalformedTokenError('Token header is invalid', { cause: result.error });
  }
  return result.data;
}

// RSA keys sign RS*/PS*, EC keys sign ES*; a key that declares its alg is bound to it
function keyAllowsAlgorithm(key: SigningKey, alg: string | undefined): boolean {
  if (!alg || (key.alg && key.alg !== alg)) {
    return false;
  }
  switch (key.kty) {
    case 'RSA':
      return alg.startsWith('RS') || alg.startsWith('PS');
    case 'EC':
      return alg.startsWith('ES');
    default:
      return false;
  }
}

function toVerificationError(error: unknown): EntraAuthError {
  if (error instanceof EntraAuthError) {
    return error;
  }
  if (error instanceof errors.JWTExpired) {
    return new TokenExpiredError({ cause: error });
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    switch (error.claim) {
      case 'iss':
        return new InvalidIssuerError(error.payload.iss, { cause: error });
      case 'aud':
        return new InvalidAudienceError({ cause: error });
      case 'nbf':
        return new TokenNotYetValidError({ cause: error });
      default:
        return new MalformedTokenError(
          `Token claim "${error.claim}" failed validation (${error.reason})`,
          { cause: error },
        );
    }
  }
  if (error instanceof errors.JWSInvalid || error instanceof errors.JWTInvalid) {
    return new MalformedTokenError(`Token is malformed: ${error.message}`, { cause: error });
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return new InvalidSignatureError(undefined, { cause: error });
  }
  return new InvalidSignatureError(`Token could not be verified: ${formatError(error)}`, {
    cause: error,
  });
}
