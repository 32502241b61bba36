export type { AuthRequest, HeaderRecord } from './authRequest.js';
export type { EntraAuthConfig } from './entraAuthConfig.js';
export type { ValidatedIdentity } from './validatedIdentity.js';
