/**
 * In-process demo server with a fetch stand-in for the workspace APIs
 */

import type { Mock } from 'vitest';
import type { Response as TestResponse } from 'supertest';
import { z } from 'zod';
import { buildOAuthClientConfig } from '@warehouse-oauth-demo/config';
import { OAuthClient, SessionCredentialStore } from '@warehouse-oauth-demo/auth';
import { BrowserSessionManager, MemorySessionStore } from '@warehouse-oauth-demo/persistence';
import { StatementExecutionClient } from '@warehouse-oauth-demo/sql';
import { WarehouseDemoServer } from '../../src/server/web-server.js';

export const WORKSPACE_HOST = 'https://workspace.example.com';
export const AUTHORIZATION_ENDPOINT = `${WORKSPACE_HOST}/oidc/v1/authorize`;
export const TOKEN_ENDPOINT = `${WORKSPACE_HOST}/oidc/v1/token`;
export const DISCOVERY_URL = `${WORKSPACE_HOST}/oidc/.well-known/oauth-authorization-server`;
export const STATEMENTS_URL = `${WORKSPACE_HOST}/api/2.0/sql/statements`;

export const jsonReply = <T>(body: T, init?: { status?: number; statusText?: string }): Response =>
  new Response(JSON.stringify(body), {
    status: init?.status ?? 200,
    statusText: init?.statusText,
    headers: { 'Content-Type': 'application/json' }
  });

export type TokenHandler = (form: URLSearchParams) => Response;

export interface StatementRequest {
  authorization: string | undefined;
  body: Record<string, unknown>;
}

export type StatementHandler = (request: StatementRequest) => Response;

export const defaultTokenHandler: TokenHandler = () => jsonReply({
  access_token: 'test-access-token',
  refresh_token: 'test-refresh-token',
  token_type: 'Bearer',
  expires_in: 3600,
});

export const selectOneHandler: StatementHandler = () => jsonReply({
  statement_id: 'st-1',
  status: { state: 'SUCCEEDED' },
  manifest: { schema: { column_count: 1, columns: [{ name: '1', position: 0, type_name: 'INT' }] } },
  result: { row_count: 1, data_array: [['1']] },
});

export interface TestServerOptions {
  tokenHandler?: TokenHandler;
  statementHandler?: StatementHandler;
}

export interface TestServer {
  server: WarehouseDemoServer;
  fetchMock: Mock<typeof fetch>;
  sessions: BrowserSessionManager;
}

function toStatementRequest(init: RequestInit | undefined): StatementRequest {
  const parsed: unknown = JSON.parse(String(init?.body ?? '{}'));
  return {
    authorization: new Headers(init?.headers).get('Authorization') ?? undefined,
    body: z.record(z.unknown()).parse(parsed),
  };
}

export function createTestServer(options: TestServerOptions = {}): TestServer {
  const tokenHandler = options.tokenHandler ?? defaultTokenHandler;
  const statementHandler = options.statementHandler ?? selectOneHandler;

  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    switch (url) {
      case DISCOVERY_URL:
        return jsonReply({
          issuer: `${WORKSPACE_HOST}/oidc`,
          authorization_endpoint: AUTHORIZATION_ENDPOINT,
          token_endpoint: TOKEN_ENDPOINT,
        });
      case TOKEN_ENDPOINT:
        return tokenHandler(new URLSearchParams(String(init?.body ?? '')));
      case STATEMENTS_URL:
        return statementHandler(toStatementRequest(init));
      default:
        throw new Error(`Unexpected fetch: ${url}`);
    }
  });

  const sessions = new BrowserSessionManager(new MemorySessionStore());
  const oauthClient = new OAuthClient(
    buildOAuthClientConfig({ host: WORKSPACE_HOST, clientId: 'test-client', clientSecret: 'test-secret', port: 5001 }),
    { fetch: fetchMock }
  );
  const server = new WarehouseDemoServer({
    port: 0,
    host: '127.0.0.1',
    sessionSecret: 'test-secret',
    sessions,
    oauthClient,
    credentialStore: new SessionCredentialStore(oauthClient, sessions),
    statementClient: new StatementExecutionClient({ host: WORKSPACE_HOST, warehouseId: 'wh-test', fetch: fetchMock }),
  });

  return { server, fetchMock, sessions };
}

export function tokenForms(fetchMock: Mock<typeof fetch>): URLSearchParams[] {
  return fetchMock.mock.calls
    .filter(([input]) => String(input) === TOKEN_ENDPOINT)
    .map(([, init]) => new URLSearchParams(String(init?.body ?? '')));
}

export function statementCalls(fetchMock: Mock<typeof fetch>): StatementRequest[] {
  return fetchMock.mock.calls
    .filter(([input]) => String(input) === STATEMENTS_URL)
    .map(([, init]) => toStatementRequest(init));
}

export function locationOf(res: TestResponse): string {
  const location: unknown = res.headers.location;
  if (typeof location !== 'string') {
    throw new Error(`Expected a Location header, got status ${res.status}`);
  }
  return location;
}

export function setCookiesOf(res: TestResponse): string[] {
  const cookies: unknown = res.headers['set-cookie'];
  return Array.isArray(cookies) ? cookies.filter((cookie): cookie is string => typeof cookie === 'string') : [];
}

export function stateOf(authorizationUrl: string): string {
  const state = new URL(authorizationUrl).searchParams.get('state');
  if (!state) {
    throw new Error(`No state in ${authorizationUrl}`);
  }
  return state;
}
