/**
 * How a failure is surfaced to the client. Everything about a missing or bad
 * credential is `unauthorized` (401); a good credential lacking permission is
 * `forbidden` (403).
 */
export type AuthOutcome = 'unauthorized' | 'forbidden';

export type EntraAuthErrorCode =
  | 'METADATA_UNAVAILABLE'
  | 'UNKNOWN_SIGNING_KEY'
  | 'MALFORMED_TOKEN'
  | 'INVALID_SIGNATURE'
  | 'DISALLOWED_ALGORITHM'
  | 'INVALID_ISSUER'
  | 'INVALID_AUDIENCE'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_NOT_YET_VALID'
  | 'INSUFFICIENT_SCOPE'
  | 'GUEST_USER_NOT_ALLOWED'
  | 'MISSING_CREDENTIALS';

/**
 * Base class for every failure raised while authenticating or authorizing a bearer token.
 * The message is meant for server-side logs; clients only ever see the {@link AuthOutcome}.
 */
export class EntraAuthError extends Error {
  constructor(
    message: string,
    public readonly code: EntraAuthErrorCode,
    public readonly outcome: AuthOutcome = 'unauthorized',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EntraAuthError';
  }
}

/** Discovery document or key set could not be fetched and nothing is cached. */
export class MetadataUnavailableError extends EntraAuthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'METADATA_UNAVAILABLE', 'unauthorized', options);
    this.name = 'MetadataUnavailableError';
  }
}

export class UnknownSigningKeyError extends EntraAuthError {
  constructor(public readonly keyId: string | undefined) {
    super(
      keyId ? `No signing key found for kid '${keyId}'` : 'Token header has no kid',
      'UNKNOWN_SIGNING_KEY',
    );
    this.name = 'UnknownSigningKeyError';
  }
}

export class MalformedTokenError extends EntraAuthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MALFORMED_TOKEN', 'unauthorized', options);
    this.name = 'MalformedTokenError';
  }
}

export class InvalidSignatureError extends EntraAuthError {
  constructor(
    message = 'Token signature verification failed',
    options?: { cause?: unknown },
    code: EntraAuthErrorCode = 'INVALID_SIGNATURE',
  ) {
    super(message, code, 'unauthorized', options);
    this.name = 'InvalidSignatureError';
  }
}

/** The token's `alg` is not allow-listed, or does not suit the resolved key. */
export class DisallowedAlgorithmError extends InvalidSignatureError {
  constructor(public readonly algorithm: string) {
    super(`Algorithm not allowed: ${algorithm}`, undefined, 'DISALLOWED_ALGORITHM');
    this.name = 'DisallowedAlgorithmError';
  }
}

export class InvalidIssuerError extends EntraAuthError {
  constructor(
    public readonly issuer: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(
      `Token issuer ${issuer ?? '(none)'} does not match the configured tenant`,
      'INVALID_ISSUER',
      'unauthorized',
      options,
    );
    this.name = 'InvalidIssuerError';
  }
}

export class InvalidAudienceError extends EntraAuthError {
  constructor(options?: { cause?: unknown }) {
    super('Token audience does not match this application', 'INVALID_AUDIENCE', 'unauthorized', options);
    this.name = 'InvalidAudienceError';
  }
}

export class TokenExpiredError extends EntraAuthError {
  constructor(options?: { cause?: unknown }) {
    super('Token expired', 'TOKEN_EXPIRED', 'unauthorized', options);
    this.name = 'TokenExpiredError';
  }
}

export class TokenNotYetValidError extends EntraAuthError {
  constructor(options?: { cause?: unknown }) {
    super('Token not yet valid', 'TOKEN_NOT_YET_VALID', 'unauthorized', options);
    this.name = 'TokenNotYetValidError';
  }
}

export class InsufficientScopeError extends EntraAuthError {
  constructor(
    public readonly requiredScopes: readonly string[],
    public readonly missingScopes: readonly string[],
  ) {
    super(
      `Required scope missing: ${missingScopes.join(', ')}`,
      'INSUFFICIENT_SCOPE',
      'forbidden',
    );
    this.name = 'InsufficientScopeError';
  }
}

export class GuestUserNotAllowedError extends EntraAuthError {
  constructor() {
    super('Guest users are not allowed', 'GUEST_USER_NOT_ALLOWED', 'forbidden');
    this.name = 'GuestUserNotAllowedError';
  }
}

export class MissingCredentialsError extends EntraAuthError {
  constructor(message = 'Missing bearer token') {
    super(message, 'MISSING_CREDENTIALS');
    this.name = 'MissingCredentialsError';
  }
}
