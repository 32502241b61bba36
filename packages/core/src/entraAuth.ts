import { type Logger, pino } from 'pino';

import type { AuthRequest } from './interfaces/authRequest.js';
import type { EntraAuthConfig } from './interfaces/entraAuthConfig.js';
import type { ValidatedIdentity } from './interfaces/validatedIdentity.js';
import type { OpenIDConfiguration } from './schemas/entra/openIdConfiguration.schema.js';
import { type EntraAuthOptions, EntraAuthOptionsSchema } from './schemas/entraAuthOptions.schema.js';
import { RequiredScopesSchema } from './schemas/common.schema.js';
import { AuthorizationGuard } from './services/authorizationGuard.service.js';
import { OpenIdMetadataCache } from './services/openIdMetadata.service.js';
import { ScopeEnforcer, type ScopePolicy } from './services/scopeEnforcer.service.js';
import { TokenVerifier } from './services/tokenVerifier.service.js';
import {
  buildDiscoveryUrl,
  buildExpectedAudiences,
  buildExpectedIssuer,
} from './utils/authority.js';
import { buildScopeName } from './utils/environment.js';

/**
 * Resource-server protection for an API registered in a single Entra ID tenant.
 * Wires the metadata cache, token verifier, scope enforcer and request guard together.
 *
 * @example
 * ```typescript
 * const entraAuth = new EntraAuth({
 *   tenantId: settings.tenantId,
 *   appClientId: settings.appClientId,
 *   logger: pino(),
 * });
 *
 * // optional: load signing keys before the first request
 * await entraAuth.warmUp();
 *
 * const user = await entraAuth.authenticateAndAuthorize(request, ['user_impersonation']);
 * ```
 */
export class EntraAuth {
  /** Issuer every accepted token must carry */
  readonly expectedIssuer: string;
  /** Audiences of which an accepted token must carry at least one */
  readonly expectedAudience: readonly string[];
  readonly discoveryUrl: string;

  private options: EntraAuthOptions;
  private logger: Logger;
  private metadataCache: OpenIdMetadataCache;
  private verifier: TokenVerifier;
  private enforcer: ScopeEnforcer;
  private guard: AuthorizationGuard;

  /**
   * Creates a new EntraAuth instance. No network call is made until the first
   * verification or an explicit {@link EntraAuth.warmUp}.
   *
   * @param config - Tenant, application and security settings
   * @throws {z.ZodError} When the configuration is invalid
   */
  constructor(config: EntraAuthConfig) {
    const { logger, clock, ...settings } = config;
    this.options = EntraAuthOptionsSchema.parse(settings);
    this.logger = logger ?? pino({ enabled: false });

    this.expectedIssuer = buildExpectedIssuer(this.options);
    this.expectedAudience = buildExpectedAudiences(this.options);
    this.discoveryUrl = buildDiscoveryUrl(this.options);

    const now = clock ?? (() => new Date());
    this.metadataCache = new OpenIdMetadataCache({
      discoveryUrl: this.discoveryUrl,
      ttlMs: this.options.metadata.ttlMs,
      fetchTimeoutMs: this.options.metadata.fetchTimeoutMs,
      refreshRetryMs: this.options.metadata.refreshRetryMs,
      expectedIssuer: this.options.security.tokenVersion === 2 ? this.expectedIssuer : undefined,
      logger: this.logger,
      now: () => now().getTime(),
    });
    this.verifier = new TokenVerifier(this.metadataCache, {
      algorithms: this.options.security.algorithms,
      clockSkewSeconds: this.options.security.clockSkewSeconds,
      clock: now,
      logger: this.logger,
    });
    this.enforcer = new ScopeEnforcer(this.options.security.scopePolicy, this.expectedAudience);
    this.guard = new AuthorizationGuard(this.verifier, this.enforcer, {
      expectedAudience: this.expectedAudience,
      expectedIssuer: this.expectedIssuer,
      allowGuestUsers: this.options.security.allowGuestUsers,
      logger: this.logger,
    });
  }

  /**
   * Fetches the discovery document and signing keys ahead of the first request.
   * Optional: the first verification loads them otherwise.
   *
   * @throws {MetadataUnavailableError} When the tenant's endpoints cannot be reached
   */
  async warmUp(): Promise<OpenIDConfiguration> {
    const metadata = await this.metadataCache.warmUp();
    this.logger.info(
      { tenantId: this.options.tenantId, issuer: metadata.issuer },
      'Entra ID metadata loaded',
    );
    return metadata;
  }

  /**
   * Returns the tenant's discovery document from cache, fetching it when needed.
   */
  async getMetadata(): Promise<OpenIDConfiguration> {
    return await this.metadataCache.getMetadata();
  }

  /**
   * Forces the next call to refetch metadata and keys.
   */
  invalidateMetadata(): void {
    this.metadataCache.invalidate();
  }

  /**
   * Verifies a raw access token against this tenant and application.
   *
   * @param token - Compact JWS access token
   * @returns Identity built from the verified claims
   * @throws {EntraAuthError} When any check fails
   */
  async verify(token: string): Promise<ValidatedIdentity> {
    return await this.verifier.verify(token, this.expectedAudience, this.expectedIssuer);
  }

  /**
   * Checks an already verified identity against a set of required scopes.
   *
   * @throws {InsufficientScopeError} When the scopes are not granted
   */
  authorize(
    identity: ValidatedIdentity,
    requiredScopes: readonly string[],
    policy?: ScopePolicy,
  ): void {
    this.enforcer.authorize(identity, requiredScopes, policy);
  }

  /**
   * Authenticates the bearer token of an inbound request and checks the route's scopes.
   *
   * @param request - A fetch `Request`, `Headers`, or an object with a `headers` record
   * @param requiredScopes - Short scope names or `api://` URIs; empty for authentication only
   * @param policy - `any` or `all`, overriding the configured scope policy
   * @returns Identity of the caller
   * @throws {EntraAuthError} `unauthorized` for missing/invalid tokens, `forbidden` for missing scopes
   */
  async authenticateAndAuthorize(
    request: AuthRequest,
    requiredScopes: readonly string[] = [],
    policy?: ScopePolicy,
  ): Promise<ValidatedIdentity> {
    const scopes = RequiredScopesSchema.parse(requiredScopes);
    return await this.guard.authenticateAndAuthorize(request, scopes, policy);
  }

  /**
   * Delegated-permission identifier of one of this API's scopes, as clients request it.
   *
   * @example
   * ```typescript
   * entraAuth.scopeName('user_impersonation'); // 'api://<app-client-id>/user_impersonation'
   * ```
   */
  scopeName(scope: string): string {
    return buildScopeName(this.options.appClientId, scope);
  }
}
