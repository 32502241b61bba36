import type { Logger } from 'pino';

import {
  EntraAuthError,
  GuestUserNotAllowedError,
  MetadataUnavailableError,
  MissingCredentialsError,
} from '../errors/entraAuthError.js';
import type { AuthRequest } from '../interfaces/authRequest.js';
import type { ValidatedIdentity } from '../interfaces/validatedIdentity.js';
import { extractBearerToken } from '../utils/bearerToken.js';

import type { ScopeEnforcer, ScopePolicy } from './scopeEnforcer.service.js';
import type { TokenVerifier } from './tokenVerifier.service.js';

export interface AuthorizationGuardOptions {
  expectedAudience: readonly string[];
  expectedIssuer: string;
  /** Accept tokens of guest accounts (`acct` claim of 1) */
  allowGuestUsers: boolean;
  logger: Logger;
}

// guest accounts invited from another directory
const GUEST_ACCOUNT = 1;

/**
 * Boundary between an inbound request and token verification: pulls the bearer token out
 * of the request, verifies it, then checks the route's scopes.
 *
 * Every rejection is an {@link EntraAuthError}; its `outcome` is all a client should be told.
 * The specific cause is logged here.
 */
export class AuthorizationGuard {
  constructor(
    private verifier: TokenVerifier,
    private enforcer: ScopeEnforcer,
    private options: AuthorizationGuardOptions,
  ) {}

  /**
   * @param request - Inbound request, or its headers
   * @param requiredScopes - Scopes the route requires; empty for authentication only
   * @param policy - Scope policy for this route, defaulting to the enforcer's
   * @returns The caller's identity, for the duration of this request
   * @throws {EntraAuthError} With outcome `unauthorized` or `forbidden`
   */
  async authenticateAndAuthorize(
    request: AuthRequest,
    requiredScopes: readonly string[] = [],
    policy?: ScopePolicy,
  ): Promise<ValidatedIdentity> {
    try {
      const token = extractBearerToken(request);
      const identity = await this.verifier.verify(
        token,
        this.options.expectedAudience,
        this.options.expectedIssuer,
      );

      if (!this.options.allowGuestUsers && identity.claims.acct === GUEST_ACCOUNT) {
        throw new GuestUserNotAllowedError();
      }

      this.enforcer.authorize(identity, requiredScopes, policy);
      return identity;
    } catch (error) {
      if (error instanceof EntraAuthError) {
        this.logRejection(error, requiredScopes);
      }
      throw error;
    }
  }

  private logRejection(error: EntraAuthError, requiredScopes: readonly string[]): void {
    const details = { code: error.code, outcome: error.outcome, requiredScopes, err: error };
    if (error instanceof MetadataUnavailableError) {
      this.options.logger.error(details, 'Bearer token could not be checked');
    } else if (error instanceof MissingCredentialsError) {
      this.options.logger.debug(details, 'Request without bearer token rejected');
    } else {
      this.options.logger.warn(details, 'Bearer token rejected');
    }
  }
}
