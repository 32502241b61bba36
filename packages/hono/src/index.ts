export { getEntraAuth } from './entraAuth';
export { type EntraContextVariables, requireEntraAuth } from './entraProtection';
export { protectedRouteHandler, publicRouteHandler } from './entraRoutes';
export {
  type EntraProtectionOptions,
  EntraProtectionOptionsSchema,
} from './schemas/entraProtectionOptions.schema';
