import type { JWK } from 'jose';
import { pino } from 'pino';
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import { MetadataUnavailableError, UnknownSigningKeyError } from '../src/errors/entraAuthError.js';
import {
  OpenIdMetadataCache,
  type OpenIdMetadataCacheOptions,
} from '../src/services/openIdMetadata.service.js';

import {
  countRequests,
  createCapturingLogger,
  createSigningKey,
  DISCOVERY_URL,
  ISSUER,
  JWKS_URI,
  jsonResponse,
  serveIdentityProvider,
  type TestSigningKey,
} from './helpers/fixtures.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

describe('OpenIdMetadataCache', () => {
  let key1: TestSigningKey;
  let key2: TestSigningKey;
  let publishedKeys: JWK[];

  const createCache = (overrides: Partial<OpenIdMetadataCacheOptions> = {}) =>
    new OpenIdMetadataCache({
      discoveryUrl: DISCOVERY_URL,
      fetchTimeoutMs: 1000,
      logger: pino({ enabled: false }),
      ...overrides,
    });

  beforeAll(async () => {
    key1 = await createSigningKey('key-1');
    key2 = await createSigningKey('key-2');
  });

  beforeEach(() => {
    vi.clearAllMocks();
    publishedKeys = [key1.jwk];
    serveIdentityProvider(mockFetch, () => publishedKeys);
  });

  describe('getMetadata', () => {
    it('fetches the discovery document and then its key set', async () => {
      const cache = createCache();

      const metadata = await cache.getMetadata();

      expect(metadata.issuer).toBe(ISSUER);
      expect(metadata.jwks_uri).toBe(JWKS_URI);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(String(mockFetch.mock.calls[0][0])).toBe(DISCOVERY_URL);
      expect(String(mockFetch.mock.calls[1][0])).toBe(JWKS_URI);
    });

    it('keeps provider-specific discovery fields', async () => {
      const metadata = await createCache().getMetadata();

      expect(metadata.tenant_region_scope).toBe('EU');
    });

    it('sends a User-Agent and an abort signal with every request', async () => {
      await createCache().getMetadata();

      const init: RequestInit = mockFetch.mock.calls[0][1];
      expect(new Headers(init.headers).get('User-Agent')).toMatch(/^entra-guard\//);
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('performs one fetch for repeated calls within the freshness window', async () => {
      const cache = createCache();

      await cache.getMetadata();
      await cache.getMetadata();

      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(1);
      expect(countRequests(mockFetch, JWKS_URI)).toBe(1);
    });

    it('coalesces concurrent first loads into one fetch', async () => {
      const cache = createCache();

      const results = await Promise.all(Array.from({ length: 5 }, () => cache.getMetadata()));

      expect(new Set(results).size).toBe(1);
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(1);
    });

    it('refetches once the configured TTL has elapsed', async () => {
      let now = 0;
      const cache = createCache({ ttlMs: 1000, now: () => now });

      await cache.getMetadata();
      now = 999;
      await cache.getMetadata();
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(1);

      now = 1000;
      await cache.getMetadata();
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(2);
    });

    it('refetches after invalidate()', async () => {
      const cache = createCache();

      await cache.getMetadata();
      cache.invalidate();
      await cache.getMetadata();
      await cache.getMetadata();

      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(2);
    });

    it('warmUp() loads eagerly so the first lookup needs no request', async () => {
      const cache = createCache();

      await cache.warmUp();
      mockFetch.mockClear();
      const key = await cache.getSigningKey('key-1');

      expect(key.kid).toBe('key-1');
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('failures', () => {
    it('throws MetadataUnavailableError when the discovery endpoint fails and nothing is cached', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'unavailable' }, 503));

      await expect(createCache().getMetadata()).rejects.toBeInstanceOf(MetadataUnavailableError);
    });

    it('throws MetadataUnavailableError for a discovery document without jwks_uri', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ issuer: ISSUER }));

      await expect(createCache().getMetadata()).rejects.toThrow(
        `Malformed document from ${DISCOVERY_URL}`,
      );
    });

    it('throws MetadataUnavailableError when the network call rejects', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(createCache().getMetadata()).rejects.toThrow(
        'Failed to load OpenID metadata: fetch failed',
      );
    });

    it('treats a request exceeding the timeout as a failed fetch', async () => {
      mockFetch.mockImplementationOnce(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
          }),
      );

      await expect(createCache({ fetchTimeoutMs: 20 }).getMetadata()).rejects.toBeInstanceOf(
        MetadataUnavailableError,
      );
    });

    it('serves the previous snapshot when a refresh fails', async () => {
      const { logger, lines } = createCapturingLogger();
      const cache = createCache({ logger });
      const first = await cache.getMetadata();

      cache.invalidate();
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
      const second = await cache.getMetadata();

      expect(second).toBe(first);
      expect(lines.find((line) => line.level === 40)?.msg).toBe(
        'OpenID metadata refresh failed, serving cached metadata',
      );
    });

    it('logs the cause of a failed load', async () => {
      const { logger, lines } = createCapturingLogger();
      mockFetch.mockRejectedValueOnce(new TypeError('getaddrinfo ENOTFOUND'));

      await expect(createCache({ logger }).getMetadata()).rejects.toBeInstanceOf(
        MetadataUnavailableError,
      );

      expect(lines.find((line) => line.msg === 'OpenID metadata unavailable')).toMatchObject({
        level: 50,
        discoveryUrl: DISCOVERY_URL,
        err: {
          type: 'MetadataUnavailableError',
          message: expect.stringContaining(
            'Failed to load OpenID metadata: getaddrinfo ENOTFOUND',
          ),
        },
      });
    });

    it('stops fetching during an outage until the retry window has passed', async () => {
      let now = 0;
      const cache = createCache({ ttlMs: 1000, refreshRetryMs: 30_000, now: () => now });
      const first = await cache.getMetadata();

      mockFetch.mockRejectedValue(new TypeError('fetch failed'));
      now = 5000;
      for (let call = 0; call < 5; call++) {
        expect(await cache.getMetadata()).toBe(first);
      }
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(2);

      now = 35_000;
      await cache.getMetadata();
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(3);

      serveIdentityProvider(mockFetch, () => publishedKeys);
      now = 65_000;
      const recovered = await cache.getMetadata();
      expect(recovered).not.toBe(first);
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(4);
    });

    it('does not refetch for an unknown key while backing off', async () => {
      let now = 0;
      const cache = createCache({ now: () => now });
      await cache.warmUp();

      cache.invalidate();
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));
      await cache.getMetadata();
      now = 1000;

      await expect(cache.getSigningKey('key-2')).rejects.toBeInstanceOf(UnknownSigningKeyError);
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(2);
    });

    it('lets every waiter of a failed load observe the same error', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 500));
      const cache = createCache();

      const results = await Promise.allSettled([cache.getMetadata(), cache.getMetadata()]);

      expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(1);
    });
  });

  describe('getSigningKey', () => {
    it('returns a cached key without refetching', async () => {
      const cache = createCache();

      await cache.getSigningKey('key-1');
      const key = await cache.getSigningKey('key-1');

      expect(key.n).toBe(key1.jwk.n);
      expect(countRequests(mockFetch, JWKS_URI)).toBe(1);
    });

    it('refreshes once for an unknown key and fails if it is still absent', async () => {
      const cache = createCache();
      await cache.warmUp();
      mockFetch.mockClear();

      await expect(cache.getSigningKey('missing-key')).rejects.toBeInstanceOf(
        UnknownSigningKeyError,
      );
      expect(countRequests(mockFetch, JWKS_URI)).toBe(1);
    });

    it('picks up a key rotated in after the cache was loaded', async () => {
      const cache = createCache();
      await cache.warmUp();

      publishedKeys = [key1.jwk, key2.jwk];
      const key = await cache.getSigningKey('key-2');

      expect(key.kid).toBe('key-2');
    });

    it('refreshes once for many concurrent lookups of a new key', async () => {
      const cache = createCache();
      await cache.warmUp();
      mockFetch.mockClear();

      publishedKeys = [key1.jwk, key2.jwk];
      const keys = await Promise.all(
        Array.from({ length: 10 }, () => cache.getSigningKey('key-2')),
      );

      expect(keys.every((key) => key.kid === 'key-2')).toBe(true);
      expect(countRequests(mockFetch, DISCOVERY_URL)).toBe(1);
      expect(countRequests(mockFetch, JWKS_URI)).toBe(1);
    });

    it('fails every concurrent lookup consistently when the key never appears', async () => {
      const cache = createCache();
      await cache.warmUp();
      mockFetch.mockClear();

      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => cache.getSigningKey('key-2')),
      );

      for (const result of results) {
        expect(result.status).toBe('rejected');
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(UnknownSigningKeyError);
        }
      }
      expect(countRequests(mockFetch, JWKS_URI)).toBe(1);
    });

    it('ignores encryption keys and keys without a kid', async () => {
      publishedKeys = [
        { ...key1.jwk, use: 'enc' },
        { kty: 'RSA', n: 'abc', e: 'AQAB' },
        key2.jwk,
      ];
      const cache = createCache();

      await expect(cache.getSigningKey('key-1')).rejects.toBeInstanceOf(UnknownSigningKeyError);
      await expect(cache.getSigningKey('key-2')).resolves.toMatchObject({ kid: 'key-2' });
    });
  });
});
