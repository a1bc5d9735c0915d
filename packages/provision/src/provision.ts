/**
 * Registers the demo as a confidential OAuth application on an account
 */

import { DEFAULT_OAUTH_SCOPES, callbackUrlForPort } from '@warehouse-oauth-demo/config';
import { logger } from '@warehouse-oauth-demo/observability';
import type { AccountClient } from './account-client.js';

// Every scope the demo server requests at login
export const APP_SCOPES: string[] = [...DEFAULT_OAUTH_SCOPES];

export interface ProvisionOptions {
  appName: string;
  port: number;
}

export interface ProvisionedApp {
  integrationId: string;
  clientId: string;
  clientSecret?: string;
  redirectUrl: string;
  /** Whether this run enrolled the account into OAuth */
  enrolled: boolean;
}

export async function provisionCustomApp(
  client: Pick<AccountClient, 'isEnrolled' | 'enroll' | 'createCustomAppIntegration'>,
  options: ProvisionOptions
): Promise<ProvisionedApp> {
  let enrolled = false;
  if (!(await client.isEnrolled())) {
    logger.info('Enrolling account into OAuth');
    await client.enroll();
    enrolled = true;
  }

  const redirectUrl = callbackUrlForPort(options.port);
  const integration = await client.createCustomAppIntegration({
    name: options.appName,
    redirectUrls: [redirectUrl],
    confidential: true,
    scopes: APP_SCOPES,
  });

  logger.info('Created custom app integration', { integrationId: integration.integration_id });

  return {
    integrationId: integration.integration_id,
    clientId: integration.client_id,
    clientSecret: integration.client_secret,
    redirectUrl,
    enrolled,
  };
}
