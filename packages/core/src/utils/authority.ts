import type { EntraAuthOptions } from '../schemas/entraAuthOptions.schema.js';

/**
 * Issuer Entra ID stamps into access tokens for the configured tenant and token version.
 * v1.0 tokens are always issued by `sts.windows.net`, whatever the authority host.
 */
export function buildExpectedIssuer(options: EntraAuthOptions): string {
  return options.security.tokenVersion === 1
    ? `https://sts.windows.net/${options.tenantId}/`
    : `${options.authority}/${options.tenantId}/v2.0`;
}

export function buildDiscoveryUrl(options: EntraAuthOptions): string {
  const base =
    options.security.tokenVersion === 1
      ? `${options.authority}/${options.tenantId}`
      : `${options.authority}/${options.tenantId}/v2.0`;
  const url = new URL(`${base}/.well-known/openid-configuration`);
  // apps with custom signing keys only get theirs when the discovery request names the app
  if (options.metadata.useAppIdForMetadata) {
    url.searchParams.set('appid', options.appClientId);
  }
  return url.toString();
}

/**
 * Audiences accepted by default: the bare application id (v2.0 tokens) and its
 * Application ID URI `api://<application-id>` (v1.0 tokens).
 */
export function buildExpectedAudiences(options: EntraAuthOptions): string[] {
  return options.security.audiences ?? [options.appClientId, `api://${options.appClientId}`];
}
