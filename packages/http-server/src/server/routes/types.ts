import type { OAuthClient, SessionCredentialStore } from '@warehouse-oauth-demo/auth';
import type { BrowserSessionManager } from '@warehouse-oauth-demo/persistence';
import type { StatementExecutionClient } from '@warehouse-oauth-demo/sql';
import type { BrowserSessionOptions } from '../../session/browser-session.js';

/**
 * Collaborators shared by the page routes
 */
export interface RouteDependencies {
  sessions: BrowserSessionManager;
  oauthClient: OAuthClient;
  credentialStore: SessionCredentialStore;
  statementClient: StatementExecutionClient;
  sessionOptions: BrowserSessionOptions;
}
