import { z } from 'zod';

/**
 * Zod schema for validating route protection options.
 */
export const EntraProtectionOptionsSchema = z.object({
  scopes: z.array(z.string().min(1)).default([]),
  policy: z.enum(['any', 'all']).optional(),
});

/**
 * Options accepted by {@link requireEntraAuth}.
 */
export type EntraProtectionOptions = z.input<typeof EntraProtectionOptionsSchema>;
