export {
  AccessTokenClaimsSchema,
  parseAccessTokenClaims,
  type AccessTokenClaims,
} from './entra/accessTokenClaims.schema.js';
export {
  OpenIDConfigurationSchema,
  type OpenIDConfiguration,
} from './entra/openIdConfiguration.schema.js';
export {
  SigningKeySchema,
  SigningKeySetSchema,
  type SigningKey,
  type SigningKeySet,
} from './entra/signingKeySet.schema.js';
export { TokenHeaderSchema, type TokenHeader } from './entra/tokenHeader.schema.js';
export {
  EntraAuthOptionsSchema,
  EntraMetadataOptionsSchema,
  EntraSecurityOptionsSchema,
  SUPPORTED_ALGORITHMS,
  type EntraAuthOptions,
  type EntraMetadataOptions,
  type EntraSecurityOptions,
  type SigningAlgorithm,
} from './entraAuthOptions.schema.js';
export { EntraSettingsEnvSchema, type EntraSettingsEnv } from './entraSettings.schema.js';
export { RequiredScopesSchema } from './common.schema.js';
