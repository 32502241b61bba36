import { MissingCredentialsError } from '../errors/entraAuthError.js';
import type { AuthRequest } from '../interfaces/authRequest.js';

const BEARER_SCHEME = /^Bearer\s+(\S+)$/i;

/**
 * Reads the token from an `Authorization: Bearer <token>` header.
 *
 * @throws {MissingCredentialsError} When the header is absent, empty or uses another scheme
 */
export function extractBearerToken(request: AuthRequest): string {
  const authorization = readAuthorizationHeader(request)?.trim();
  if (!authorization) {
    throw new MissingCredentialsError('Missing Authorization header');
  }

  const token = BEARER_SCHEME.exec(authorization)?.[1];
  if (!token) {
    throw new MissingCredentialsError('Authorization header does not carry a Bearer token');
  }
  return token;
}

function readAuthorizationHeader(request: AuthRequest): string | undefined {
  const headers = request instanceof Headers ? request : request.headers;
  if (headers instanceof Headers) {
    return headers.get('authorization') ?? undefined;
  }

  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'authorization') {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}
