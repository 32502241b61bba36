/**
 * Reduces a scope to the short name Entra ID puts in the `scp` claim.
 * `api://<app-id>/user_impersonation` and `user_impersonation` both become `user_impersonation`.
 *
 * @param scope - Short name or `<resource>/<name>` URI
 * @param resourceIds - Resources this API answers for; a URI naming another resource
 *   yields `undefined`. Omitted, any resource prefix is accepted.
 */
export function toShortScope(
  scope: string,
  resourceIds?: readonly string[],
): string | undefined {
  const slash = scope.lastIndexOf('/');
  if (slash === -1) {
    return scope;
  }
  if (resourceIds && !resourceIds.includes(scope.slice(0, slash))) {
    return undefined;
  }
  return scope.slice(slash + 1);
}

/**
 * Splits the space-delimited `scp` claim into individual scopes.
 */
export function parseScopeClaim(scp: string | undefined): string[] {
  return scp ? scp.split(' ').filter((scope) => scope.length > 0) : [];
}
