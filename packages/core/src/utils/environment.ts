import { EntraSettingsEnvSchema } from '../schemas/entraSettings.schema.js';

/**
 * Settings for a protected API, derived from environment variables.
 */
export interface EntraSettings {
  tenantId: string;
  appClientId: string;
  /** Client id of the interactive docs / SPA that requests tokens for this API */
  openApiClientId: string;
  /** Short scope name, e.g. `user_impersonation` */
  scopeDescription: string;
  /** Delegated-permission URI, e.g. `api://<app-client-id>/user_impersonation` */
  scopeName: string;
  /** Scope URI to description map, in the shape OAuth2 UI tooling expects */
  scopes: Record<string, string>;
}

/**
 * Reads {@link EntraSettings} from environment variables:
 * `TENANT_ID`, `APP_CLIENT_ID`, `OPENAPI_CLIENT_ID` and `SCOPE_DESCRIPTION`.
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @throws {z.ZodError} When a required variable is missing
 */
export function readEntraSettings(
  env: Record<string, string | undefined> = process.env,
): EntraSettings {
  const parsed = EntraSettingsEnvSchema.parse(env);
  const scopeName = buildScopeName(parsed.APP_CLIENT_ID, parsed.SCOPE_DESCRIPTION);

  return {
    tenantId: parsed.TENANT_ID,
    appClientId: parsed.APP_CLIENT_ID,
    openApiClientId: parsed.OPENAPI_CLIENT_ID,
    scopeDescription: parsed.SCOPE_DESCRIPTION,
    scopeName,
    scopes: { [scopeName]: parsed.SCOPE_DESCRIPTION },
  };
}

/**
 * Builds the delegated-permission identifier `api://<application-id>/<scope>`.
 */
export function buildScopeName(appClientId: string, scope: string): string {
  return `api://${appClientId}/${scope}`;
}
