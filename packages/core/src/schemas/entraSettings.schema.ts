import { z } from 'zod';

/**
 * Zod schema for the environment variables a protected API is configured from.
 */
export const EntraSettingsEnvSchema = z.object({
  TENANT_ID: z.string().min(1, 'TENANT_ID is required'),
  APP_CLIENT_ID: z.string().min(1, 'APP_CLIENT_ID is required'),
  OPENAPI_CLIENT_ID: z.string().default(''),
  SCOPE_DESCRIPTION: z.string().min(1).default('user_impersonation'),
});

export type EntraSettingsEnv = z.infer<typeof EntraSettingsEnvSchema>;
