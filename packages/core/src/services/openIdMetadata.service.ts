import type { Logger } from 'pino';
import type { ZodType } from 'zod';

import { MetadataUnavailableError, UnknownSigningKeyError } from '../errors/entraAuthError.js';
import {
  type OpenIDConfiguration,
  OpenIDConfigurationSchema,
} from '../schemas/entra/openIdConfiguration.schema.js';
import {
  type SigningKey,
  type SigningKeySet,
  SigningKeySetSchema,
} from '../schemas/entra/signingKeySet.schema.js';
import { entraServiceFetch } from '../utils/entraServiceFetch.js';
import { formatError } from '../utils/errorFormatting.js';

/** Discovery document and key set fetched together; never mutated once built. */
export interface MetadataSnapshot {
  readonly metadata: OpenIDConfiguration;
  readonly keys: ReadonlyMap<string, SigningKey>;
  readonly fetchedAt: number;
}

export interface OpenIdMetadataCacheOptions {
  /** Tenant's `/.well-known/openid-configuration` URL */
  discoveryUrl: string;
  /** How long a snapshot stays fresh; omitted means until {@link OpenIdMetadataCache.invalidate} */
  ttlMs?: number;
  /** Upper bound for each discovery/JWKS request */
  fetchTimeoutMs: number;
  /** After a failed refresh, how long the previous snapshot is served before fetching again */
  refreshRetryMs?: number;
  /** Issuer the discovery document is expected to announce; a mismatch is logged */
  expectedIssuer?: string;
  logger: Logger;
  /** Millisecond clock used for freshness (defaults to `Date.now`) */
  now?: () => number;
}

/**
 * Time-bounded cache of the tenant's OpenID discovery document and signing keys.
 *
 * The cache holds a single {@link MetadataSnapshot} reference which is swapped on refresh,
 * so concurrent verifications see either the old or the new key set, never a mix.
 * Refreshes are coalesced: however many callers ask at once, one discovery request and one
 * JWKS request are made and everybody awaits the same promise.
 *
 * When a refresh fails and an earlier snapshot exists, the failure is logged and the earlier
 * snapshot keeps being served, without further fetches, for `refreshRetryMs`.
 */
export const DEFAULT_REFRESH_RETRY_MS = 30_000;

export class OpenIdMetadataCache {
  private snapshot?: MetadataSnapshot;
  private refreshing?: Promise<MetadataSnapshot>;
  private invalidated = false;
  // set while a failed refresh is being backed off; the stale snapshot counts as fresh until then
  private retryAfter?: number;
  private now: () => number;

  constructor(private options: OpenIdMetadataCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Loads metadata and keys ahead of the first request.
   *
   * @throws {MetadataUnavailableError} When nothing could be loaded
   */
  async warmUp(): Promise<OpenIDConfiguration> {
    return await this.getMetadata();
  }

  /**
   * Returns the cached discovery document, fetching it first when missing or stale.
   *
   * @throws {MetadataUnavailableError} When the provider is unreachable and nothing is cached
   */
  async getMetadata(): Promise<OpenIDConfiguration> {
    const snapshot = await this.currentSnapshot();
    return snapshot.metadata;
  }

  /**
   * Returns the public key with the given key id.
   *
   * A miss triggers one refresh, to pick up a key the provider has rotated in, and one
   * more lookup. Callers missing on the same snapshot share that refresh. No refresh is
   * attempted while a failed one is being backed off.
   *
   * @param keyId - `kid` from the token header
   * @returns The key as published in the JWKS
   * @throws {UnknownSigningKeyError} When the key is still absent after the refresh
   */
  async getSigningKey(keyId: string): Promise<SigningKey> {
    const seen = await this.currentSnapshot();
    const cached = seen.keys.get(keyId);
    if (cached) {
      return cached;
    }

    this.options.logger.info({ kid: keyId }, 'Signing key not cached, refreshing key set');
    // someone may already have replaced the snapshot this miss was observed on
    const latest = this.snapshot;
    let refreshed: MetadataSnapshot;
    if (latest && latest !== seen) {
      refreshed = latest;
    } else if (this.isBackingOff()) {
      refreshed = seen;
    } else {
      refreshed = await this.refresh();
    }
    const key = refreshed.keys.get(keyId);
    if (!key) {
      throw new UnknownSigningKeyError(keyId);
    }
    return key;
  }

  /**
   * Marks the current snapshot stale; the next call refetches. The old snapshot is kept
   * as the fallback should that fetch fail.
   */
  invalidate(): void {
    this.invalidated = true;
  }

  /**
   * Fetches a new snapshot, or joins the fetch already in flight.
   */
  refresh(): Promise<MetadataSnapshot> {
    if (!this.refreshing) {
      this.refreshing = this.load().finally(() => {
        this.refreshing = undefined;
      });
    }
    return this.refreshing;
  }

  private async currentSnapshot(): Promise<MetadataSnapshot> {
    const snapshot = this.snapshot;
    if (snapshot && this.isFresh(snapshot)) {
      return snapshot;
    }
    return await this.refresh();
  }

  private isFresh(snapshot: MetadataSnapshot): boolean {
    if (this.isBackingOff()) {
      return true;
    }
    if (this.invalidated) {
      return false;
    }
    const { ttlMs } = this.options;
    return ttlMs === undefined || this.now() - snapshot.fetchedAt < ttlMs;
  }

  private isBackingOff(): boolean {
    return this.retryAfter !== undefined && this.now() < this.retryAfter;
  }

  private async load(): Promise<MetadataSnapshot> {
    const { discoveryUrl, expectedIssuer, logger } = this.options;

    try {
      const metadata = await this.fetchDocument(discoveryUrl, OpenIDConfigurationSchema);
      const keySet = await this.fetchDocument(metadata.jwks_uri, SigningKeySetSchema);

      if (expectedIssuer && metadata.issuer !== expectedIssuer) {
        logger.warn(
          { issuer: metadata.issuer, expectedIssuer },
          'Discovery document announces an unexpected issuer',
        );
      }

      const snapshot: MetadataSnapshot = Object.freeze({
        metadata,
        keys: toKeyMap(keySet),
        fetchedAt: this.now(),
      });
      this.snapshot = snapshot;
      this.invalidated = false;
      this.retryAfter = undefined;

      logger.debug(
        { discoveryUrl, jwksUri: metadata.jwks_uri, keyIds: [...snapshot.keys.keys()] },
        'OpenID metadata loaded',
      );
      return snapshot;
    } catch (error) {
      const failure =
        error instanceof MetadataUnavailableError
          ? error
          : new MetadataUnavailableError(
              `Failed to load OpenID metadata: ${formatError(error)}`,
              { cause: error },
            );

      if (this.snapshot) {
        const retryMs = this.options.refreshRetryMs ?? DEFAULT_REFRESH_RETRY_MS;
        this.retryAfter = this.now() + retryMs;
        logger.warn(
          { err: failure, discoveryUrl, retryMs },
          'OpenID metadata refresh failed, serving cached metadata',
        );
        return this.snapshot;
      }

      logger.error({ err: failure, discoveryUrl }, 'OpenID metadata unavailable');
      throw failure;
    }
  }

  private async fetchDocument<T>(url: string, schema: ZodType<T>): Promise<T> {
    const response = await entraServiceFetch(url, this.options.fetchTimeoutMs);

    if (!response.ok) {
      throw new MetadataUnavailableError(
        `Request to ${url} failed: ${response.status} ${response.statusText}`,
      );
    }

    const body: unknown = await response.json();
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new MetadataUnavailableError(`Malformed document from ${url}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

// signature keys only; encryption keys and keys without an id cannot be selected by a token
function toKeyMap(keySet: SigningKeySet): ReadonlyMap<string, SigningKey> {
  const keys = new Map<string, SigningKey>();
  for (const key of keySet.keys) {
    if (key.kid && (key.use === undefined || key.use === 'sig')) {
      keys.set(key.kid, key);
    }
  }
  return keys;
}
