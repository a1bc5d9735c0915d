/**
 * fetch stand-in for the workspace OIDC endpoints
 */

import type { Mock } from 'vitest';

export const WORKSPACE_HOST = 'https://workspace.example.com';
export const AUTHORIZATION_ENDPOINT = `${WORKSPACE_HOST}/oidc/v1/authorize`;
export const TOKEN_ENDPOINT = `${WORKSPACE_HOST}/oidc/v1/token`;
export const DISCOVERY_URL = `${WORKSPACE_HOST}/oidc/.well-known/oauth-authorization-server`;

export const jsonReply = <T>(body: T, init?: { status?: number; statusText?: string }): Response => {
  const payload = typeof body === 'string' ? body : JSON.stringify(body);
  return new Response(payload, {
    status: init?.status ?? 200,
    statusText: init?.statusText,
    headers: { 'Content-Type': 'application/json' }
  });
};

export type TokenHandler = (form: URLSearchParams) => Response | Promise<Response>;

/**
 * Route discovery and token requests; anything else is a test failure
 */
export function createOidcFetchMock(tokenHandler: TokenHandler): Mock<typeof fetch> {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    if (url === DISCOVERY_URL) {
      return jsonReply({
        issuer: `${WORKSPACE_HOST}/oidc`,
        authorization_endpoint: AUTHORIZATION_ENDPOINT,
        token_endpoint: TOKEN_ENDPOINT
      });
    }
    if (url === TOKEN_ENDPOINT) {
      return tokenHandler(new URLSearchParams(String(init?.body ?? '')));
    }
    throw new Error(`Unexpected fetch: ${url}`);
  });
}

export function tokenRequests(fetchMock: Mock<typeof fetch>): URLSearchParams[] {
  return fetchMock.mock.calls
    .filter(([input]) => String(input) === TOKEN_ENDPOINT)
    .map(([, init]) => new URLSearchParams(String(init?.body ?? '')));
}
