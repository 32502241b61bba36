export { EntraAuth } from './entraAuth.js';
export * from './errors/entraAuthError.js';
export * from './interfaces/index.js';
export * from './schemas/index.js';
export {
  AuthorizationGuard,
  type AuthorizationGuardOptions,
} from './services/authorizationGuard.service.js';
export {
  DEFAULT_REFRESH_RETRY_MS,
  type MetadataSnapshot,
  OpenIdMetadataCache,
  type OpenIdMetadataCacheOptions,
} from './services/openIdMetadata.service.js';
export { ScopeEnforcer, type ScopePolicy } from './services/scopeEnforcer.service.js';
export {
  TokenVerifier,
  type TokenVerifierOptions,
  toValidatedIdentity,
} from './services/tokenVerifier.service.js';
export { extractBearerToken } from './utils/bearerToken.js';
export { buildScopeName, type EntraSettings, readEntraSettings } from './utils/environment.js';
export { formatError } from './utils/errorFormatting.js';
export { parseScopeClaim, toShortScope } from './utils/scopes.js';
