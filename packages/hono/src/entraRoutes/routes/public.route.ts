import { type Handler } from 'hono';

/**
 * Creates a route handler for an endpoint that needs no token.
 * @returns Route handler for the public endpoint
 */
export function publicRouteHandler(): Handler {
  return (c) => c.json({ message: 'Hello, this is a public endpoint.' });
}
