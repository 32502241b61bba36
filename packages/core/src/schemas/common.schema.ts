import { z } from 'zod';

/**
 * Common validation schemas used across the library
 */

export const RequiredScopesSchema = z.array(z.string().min(1, 'scope must not be empty'));
