import {
  EntraAuthError,
  type EntraAuthConfig,
  MissingCredentialsError,
  type ValidatedIdentity,
} from '@entra-guard/core';
import type { Context, MiddlewareHandler, Next } from 'hono';

import { getEntraAuth } from '../entraAuth';
import {
  type EntraProtectionOptions,
  EntraProtectionOptionsSchema,
} from '../schemas/entraProtectionOptions.schema';

/**
 * Context variables available when using Entra ID protection middleware.
 */
export interface EntraContextVariables {
  entraIdentity: ValidatedIdentity;
}

/**
 * Creates middleware that authenticates the request's bearer token and checks the route's scopes.
 *
 * Rejected requests get a bare `401 Unauthorized` or `403 Forbidden`; the reason is only logged.
 *
 * @param config - The Entra ID configuration object
 * @param options - Scopes the route requires and the policy to apply to them
 * @returns Hono middleware handler that stores the caller's identity as `entraIdentity`
 *
 * @example
 * ```typescript
 * app.get('/protected', requireEntraAuth(config, { scopes: [settings.scopeName] }), (c) =>
 *   c.json({ user: c.get('entraIdentity') }),
 * );
 * ```
 */
export function requireEntraAuth(
  config: EntraAuthConfig,
  options: EntraProtectionOptions = {},
): MiddlewareHandler<{ Variables: EntraContextVariables }> {
  const { scopes, policy } = EntraProtectionOptionsSchema.parse(options);

  return async (c: Context<{ Variables: EntraContextVariables }>, next: Next) => {
    let identity: ValidatedIdentity;
    try {
      identity = await getEntraAuth(config).authenticateAndAuthorize(c.req.raw, scopes, policy);
    } catch (error) {
      if (!(error instanceof EntraAuthError)) {
        config.logger?.error({ err: error, path: c.req.path }, 'Entra ID protection error');
        return c.json({ error: 'Internal server error' }, 500);
      }
      if (error.outcome === 'forbidden') {
        c.header('WWW-Authenticate', 'Bearer error="insufficient_scope"');
        return c.json({ error: 'Forbidden' }, 403);
      }
      c.header(
        'WWW-Authenticate',
        error instanceof MissingCredentialsError ? 'Bearer' : 'Bearer error="invalid_token"',
      );
      return c.json({ error: 'Unauthorized' }, 401);
    }

    c.set('entraIdentity', identity);
    await next();
  };
}
