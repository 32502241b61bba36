import { InsufficientScopeError } from '../errors/entraAuthError.js';
import type { ValidatedIdentity } from '../interfaces/validatedIdentity.js';
import { toShortScope } from '../utils/scopes.js';

/**
 * `any`: one of the required scopes is enough. `all`: every required scope must be granted.
 */
export type ScopePolicy = 'any' | 'all';

/**
 * Decides whether a verified caller holds the delegated permissions a route requires.
 */
export class ScopeEnforcer {
  /**
   * @param defaultPolicy - Policy applied when a call names none
   * @param resourceIds - Resources whose `<resource>/<scope>` URIs may be required, usually
   *   the API's audiences; a required URI naming any other resource is never granted
   */
  constructor(
    private defaultPolicy: ScopePolicy = 'any',
    private resourceIds?: readonly string[],
  ) {}

  /**
   * @param identity - Verified caller
   * @param requiredScopes - Short names or `api://<app-id>/<scope>` URIs; empty means authentication only
   * @param policy - Overrides the enforcer's default policy for this call
   * @throws {InsufficientScopeError} Listing the required scopes the caller lacks
   */
  authorize(
    identity: ValidatedIdentity,
    requiredScopes: readonly string[],
    policy: ScopePolicy = this.defaultPolicy,
  ): void {
    if (requiredScopes.length === 0) {
      return;
    }

    const granted = new Set(identity.scopes);
    const missing = requiredScopes.filter((scope) => {
      const shortScope = toShortScope(scope, this.resourceIds);
      return shortScope === undefined || !granted.has(shortScope);
    });
    const satisfied =
      policy === 'all' ? missing.length === 0 : missing.length < requiredScopes.length;

    if (!satisfied) {
      throw new InsufficientScopeError(requiredScopes, missing);
    }
  }
}
