import type { Logger } from 'pino';
import type * as z from 'zod';

import type { EntraAuthOptionsSchema } from '../schemas/entraAuthOptions.schema.js';

/**
 * Configuration object for an {@link EntraAuth} instance protecting a single-tenant API.
 *
 * @example
 * ```typescript
 * const config: EntraAuthConfig = {
 *   tenantId: '00000000-0000-0000-0000-000000000001',
 *   appClientId: '00000000-0000-0000-0000-000000000002',
 *   security: { clockSkewSeconds: 30 },
 * };
 * ```
 */
export type EntraAuthConfig = z.input<typeof EntraAuthOptionsSchema> & {
  /** Optional pino logger; verification failures are logged here, never sent to clients */
  logger?: Logger;

  /** Source of the current time for expiry checks (defaults to `new Date()`) */
  clock?: () => Date;
};
