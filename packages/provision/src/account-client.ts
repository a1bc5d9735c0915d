/**
 * Account-level OAuth administration API: published-app enrollment and
 * custom app integrations. Authenticates with the account admin's basic
 * credentials.
 */

import { z } from 'zod';
import { logger } from '@warehouse-oauth-demo/observability';
import { AccountApiError } from './errors.js';

export interface AccountClientOptions {
  /** Account console host, e.g. https://accounts.cloud.databricks.com */
  host: string;
  accountId: string;
  username: string;
  password: string;
  /** fetch implementation (default: global fetch, resolved per call) */
  fetch?: typeof fetch;
}

export interface CustomAppRequest {
  name: string;
  redirectUrls: string[];
  confidential: boolean;
  scopes: string[];
}

export const EnrollmentStatusSchema = z.object({
  is_enabled: z.boolean().optional(),
});

export const CustomAppIntegrationSchema = z.object({
  integration_id: z.string(),
  client_id: z.string(),
  client_secret: z.string().optional(),
});

export type CustomAppIntegration = z.infer<typeof CustomAppIntegrationSchema>;

const ApiErrorSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

export class AccountClient {
  constructor(private readonly options: AccountClientOptions) {}

  private get oauthBase(): string {
    return `${this.options.host}/api/2.0/accounts/${encodeURIComponent(this.options.accountId)}/oauth2`;
  }

  async isEnrolled(): Promise<boolean> {
    const status = EnrollmentStatusSchema.parse(await this.request('GET', '/enrollment'));
    return status.is_enabled ?? false;
  }

  async enroll(): Promise<void> {
    await this.request('POST', '/enrollment', { enable_all_published_apps: true });
  }

  async createCustomAppIntegration(app: CustomAppRequest): Promise<CustomAppIntegration> {
    const body = await this.request('POST', '/custom-app-integrations', {
      name: app.name,
      redirect_urls: app.redirectUrls,
      confidential: app.confidential,
      scopes: app.scopes,
    });

    const parsed = CustomAppIntegrationSchema.safeParse(body);
    if (!parsed.success) {
      throw new AccountApiError('Custom app integration response is missing its client id');
    }
    return parsed.data;
  }

  private async request(method: 'GET' | 'POST', path: string, payload?: Record<string, unknown>): Promise<unknown> {
    const url = `${this.oauthBase}${path}`;
    const fetchImpl = this.options.fetch ?? fetch;
    const credentials = Buffer.from(`${this.options.username}:${this.options.password}`).toString('base64');

    logger.debug('Account API request', { method, url });

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method,
        headers: {
          'Authorization': `Basic ${credentials}`,
          'Accept': 'application/json',
          ...(payload ? { 'Content-Type': 'application/json' } : {}),
        },
        body: payload ? JSON.stringify(payload) : undefined,
      });
    } catch (error) {
      throw new AccountApiError(`Unable to reach ${this.options.host}`, undefined, {
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const apiError = ApiErrorSchema.safeParse(body);
      const detail = apiError.success && apiError.data.message ? `: ${apiError.data.message}` : '';
      throw new AccountApiError(
        `${method} ${path} failed with ${response.status} ${response.statusText}${detail}`,
        response.status,
        { errorCode: apiError.success ? apiError.data.error_code : undefined }
      );
    }

    return body ?? {};
  }
}
