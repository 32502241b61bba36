import {
  exportJWK,
  generateKeyPair,
  type JWK,
  type JWTHeaderParameters,
  type JWTPayload,
  SignJWT,
} from 'jose';
import { type Logger, pino } from 'pino';
import type { Mock } from 'vitest';

export const TENANT_ID = '11111111-2222-3333-4444-555555555555';
export const APP_CLIENT_ID = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';
export const AUTHORITY = 'https://login.microsoftonline.com';
export const ISSUER = `${AUTHORITY}/${TENANT_ID}/v2.0`;
export const DISCOVERY_URL = `${ISSUER}/.well-known/openid-configuration`;
export const JWKS_URI = `${AUTHORITY}/${TENANT_ID}/discovery/v2.0/keys`;

/** Fixed "now" for every token and clock in the tests (seconds since epoch) */
export const NOW_SECONDS = 1_700_000_000;
export const fixedClock = (seconds = NOW_SECONDS) => () => new Date(seconds * 1000);

type GeneratedKeyPair = Awaited<ReturnType<typeof generateKeyPair>>;

export interface TestSigningKey {
  kid: string;
  privateKey: GeneratedKeyPair['privateKey'];
  /** Public half as the provider would publish it */
  jwk: JWK;
}

export async function createSigningKey(
  kid: string,
  alg: 'RS256' | 'ES256' = 'RS256',
): Promise<TestSigningKey> {
  const { publicKey, privateKey } = await generateKeyPair(alg);
  const jwk = { ...(await exportJWK(publicKey)), kid, use: 'sig' };
  return { kid, privateKey, jwk };
}

export const createMockAccessTokenClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  iss: ISSUER,
  aud: APP_CLIENT_ID,
  sub: 'subject-123',
  tid: TENANT_ID,
  oid: 'object-123',
  name: 'Jane Smith',
  email: 'jane.smith@contoso.example',
  scp: 'user_impersonation',
  azp: 'client-app-456',
  ver: '2.0',
  iat: NOW_SECONDS - 60,
  nbf: NOW_SECONDS - 60,
  exp: NOW_SECONDS + 3600,
  ...overrides,
});

export async function signAccessToken(
  key: TestSigningKey,
  claims: JWTPayload = createMockAccessTokenClaims(),
  header: Partial<JWTHeaderParameters> = {},
): Promise<string> {
  return await new SignJWT(claims)
    .setProtectedHeader({ alg: 'RS256', kid: key.kid, typ: 'JWT', ...header })
    .sign(key.privateKey);
}

/** Token with `alg: none` and an empty signature segment. */
export function createUnsignedToken(
  claims: JWTPayload = createMockAccessTokenClaims(),
  kid = 'key-1',
): string {
  const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'none', kid, typ: 'JWT' })}.${encode(claims)}.`;
}

export const createDiscoveryDocument = (overrides: Record<string, unknown> = {}) => ({
  issuer: ISSUER,
  jwks_uri: JWKS_URI,
  authorization_endpoint: `${AUTHORITY}/${TENANT_ID}/oauth2/v2.0/authorize`,
  token_endpoint: `${AUTHORITY}/${TENANT_ID}/oauth2/v2.0/token`,
  id_token_signing_alg_values_supported: ['RS256'],
  tenant_region_scope: 'EU',
  ...overrides,
});

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Makes the mocked global fetch answer like the tenant's discovery and JWKS endpoints.
 * `getKeys` is read on every JWKS request so tests can rotate keys between calls.
 */
export function serveIdentityProvider(mockFetch: Mock, getKeys: () => JWK[]): void {
  mockFetch.mockImplementation(async (input: string | URL) => {
    const url = input.toString();
    if (url.startsWith(DISCOVERY_URL)) {
      return jsonResponse(createDiscoveryDocument());
    }
    if (url === JWKS_URI) {
      return jsonResponse({ keys: getKeys() });
    }
    return jsonResponse({ error: 'not_found' }, 404);
  });
}

export function countRequests(mockFetch: Mock, url: string): number {
  return mockFetch.mock.calls.filter(([input]) => String(input).startsWith(url)).length;
}

/** pino logger whose JSON lines are collected in `lines` */
export function createCapturingLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}
