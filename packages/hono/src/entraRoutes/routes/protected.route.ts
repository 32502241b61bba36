import { type Handler } from 'hono';

import type { EntraContextVariables } from '../../entraProtection';

/**
 * Creates a route handler that echoes the authenticated caller.
 * Mount it behind {@link requireEntraAuth}.
 * @returns Route handler for the protected endpoint
 */
export function protectedRouteHandler(): Handler<{ Variables: EntraContextVariables }> {
  return (c) =>
    c.json({
      message: 'You are authenticated!',
      user: c.get('entraIdentity'),
    });
}
