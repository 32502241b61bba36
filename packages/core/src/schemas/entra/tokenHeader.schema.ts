import { z } from 'zod';

export const TokenHeaderSchema = z
  .object({
    alg: z.string().min(1),
    kid: z.string().min(1).optional(),
    typ: z.string().optional(),
  })
  .loose();

export type TokenHeader = z.infer<typeof TokenHeaderSchema>;
