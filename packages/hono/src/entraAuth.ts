import { EntraAuth, type EntraAuthConfig } from '@entra-guard/core';

// one instance per config object, so every route protected with it shares a key cache
const instances = new WeakMap<EntraAuthConfig, EntraAuth>();

/**
 * Gets or creates the EntraAuth instance for the provided configuration.
 * @param config - The Entra ID configuration object
 * @returns The EntraAuth instance bound to that configuration
 */
export function getEntraAuth(config: EntraAuthConfig): EntraAuth {
  let entraAuth = instances.get(config);
  if (!entraAuth) {
    entraAuth = new EntraAuth(config);
    instances.set(config, entraAuth);
  }
  return entraAuth;
}
