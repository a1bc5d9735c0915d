/**
 * OAuth 2.0 Authorization Code + PKCE client for a workspace host
 *
 * Endpoints come from the host's authorization server metadata. The client
 * keeps no per-user state: consents and credentials live in the caller's
 * browser session.
 */

import type { OAuthClientConfig } from '@warehouse-oauth-demo/config';
import { logger } from '@warehouse-oauth-demo/observability';
import type { Consent, Credentials } from '@warehouse-oauth-demo/persistence';
import { buildAuthorizationUrl } from './authorization-url.js';
import {
  AuthorizationDeniedError,
  OAuthDiscoveryError,
  OAuthError,
  StateMismatchError,
  TokenExchangeError,
  TokenRefreshError
} from './errors.js';
import { generatePkce, type RandomSource } from './pkce.js';
import {
  DiscoveryDocumentSchema,
  TokenErrorResponseSchema,
  TokenResponseSchema,
  type CallbackParams,
  type OAuthEndpoints
} from './types.js';

export interface OAuthClientOptions {
  /** fetch implementation (default: global fetch, resolved per call) */
  fetch?: typeof fetch;
  /** Random source for PKCE and state generation */
  randomSource?: RandomSource;
  /** How long a consent stays valid, in milliseconds (default: 10 minutes) */
  consentTimeoutMs?: number;
}

type TokenErrorFactory = (message: string, details?: Record<string, unknown>) => OAuthError;

export class OAuthClient {
  protected readonly DEFAULT_TOKEN_EXPIRATION_SECONDS = 60 * 60;
  private readonly consentTimeoutMs: number;
  private endpoints?: Promise<OAuthEndpoints>;

  constructor(
    readonly config: OAuthClientConfig,
    private readonly options: OAuthClientOptions = {}
  ) {
    this.consentTimeoutMs = options.consentTimeoutMs ?? 10 * 60 * 1000;
  }

  get discoveryUrl(): string {
    return `${this.config.host}/oidc/.well-known/oauth-authorization-server`;
  }

  /**
   * Resolve authorization and token endpoints once; a failed lookup is retried on next use
   */
  async getEndpoints(): Promise<OAuthEndpoints> {
    if (!this.endpoints) {
      this.endpoints = this.fetchEndpoints().catch((error: unknown) => {
        this.endpoints = undefined;
        throw error;
      });
    }
    return this.endpoints;
  }

  /**
   * Start a login attempt: fresh PKCE pair and state, bound into the authorization URL
   */
  async initiateConsent(): Promise<Consent> {
    const { authorizationEndpoint } = await this.getEndpoints();
    const { verifier, challenge, state } = generatePkce(this.options.randomSource);
    const authUrl = buildAuthorizationUrl(authorizationEndpoint, this.config, challenge, state);

    logger.oauthDebug('Initiated consent', { statePrefix: state.substring(0, 8) });

    return {
      verifier,
      challenge,
      state,
      authUrl,
      expiresAt: Date.now() + this.consentTimeoutMs,
    };
  }

  /**
   * Complete a login attempt: validate the callback against its consent and
   * trade the authorization code plus verifier for credentials.
   * Authorization codes are single-use, so nothing here is retried.
   */
  async exchangeCallback(consent: Consent, params: CallbackParams): Promise<Credentials> {
    if (!params.state || params.state !== consent.state) {
      logger.oauthWarn('Callback state does not match consent', {
        hasState: Boolean(params.state),
        statePrefix: params.state?.substring(0, 8)
      });
      throw new StateMismatchError();
    }

    if (consent.expiresAt <= Date.now()) {
      throw new StateMismatchError('Login attempt expired, please sign in again');
    }

    if (params.error) {
      logger.oauthWarn('Provider returned an authorization error', {
        error: params.error,
        errorDescription: params.error_description
      });
      throw new AuthorizationDeniedError(params.error, params.error_description);
    }

    if (!params.code) {
      throw new AuthorizationDeniedError('invalid_request', 'Missing authorization code');
    }

    const { tokenEndpoint } = await this.getEndpoints();
    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      code: params.code,
      redirect_uri: this.config.redirectUrl,
      code_verifier: consent.verifier,
    });

    const credentials = await this.requestTokens(
      tokenEndpoint,
      form,
      'Token exchange',
      (message, details) => new TokenExchangeError(message, details)
    );

    logger.oauthInfo('Token exchange successful', {
      hasRefreshToken: Boolean(credentials.refreshToken),
      expiresAt: new Date(credentials.expiresAt).toISOString()
    });
    return credentials;
  }

  /**
   * Trade a refresh token for new credentials. The old refresh token is kept
   * when the provider does not rotate it.
   */
  async refresh(credentials: Credentials): Promise<Credentials> {
    if (!credentials.refreshToken) {
      throw new TokenRefreshError('No refresh token available');
    }

    const { tokenEndpoint } = await this.getEndpoints();
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: credentials.refreshToken,
    });

    const refreshed = await this.requestTokens(
      tokenEndpoint,
      form,
      'Token refresh',
      (message, details) => new TokenRefreshError(message, details)
    );

    logger.oauthInfo('Token refresh successful', {
      expiresAt: new Date(refreshed.expiresAt).toISOString()
    });

    return {
      ...refreshed,
      refreshToken: refreshed.refreshToken ?? credentials.refreshToken,
    };
  }

  private doFetch(input: string, init?: RequestInit): Promise<Response> {
    const fetchImpl = this.options.fetch ?? fetch;
    return fetchImpl(input, init);
  }

  private async fetchEndpoints(): Promise<OAuthEndpoints> {
    const url = this.discoveryUrl;
    let response: Response;
    try {
      response = await this.doFetch(url, { headers: { 'Accept': 'application/json' } });
    } catch (error) {
      throw new OAuthDiscoveryError(`Unable to reach ${url}`, {
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    if (!response.ok) {
      throw new OAuthDiscoveryError(`Authorization server metadata request failed: ${response.status} ${response.statusText}`, {
        status: response.status
      });
    }

    const parsed = DiscoveryDocumentSchema.safeParse(await response.json().catch(() => undefined));
    if (!parsed.success) {
      throw new OAuthDiscoveryError('Authorization server metadata is missing required endpoints');
    }

    logger.oauthDebug('Discovered OAuth endpoints', {
      authorizationEndpoint: parsed.data.authorization_endpoint,
      tokenEndpoint: parsed.data.token_endpoint
    });

    return {
      authorizationEndpoint: parsed.data.authorization_endpoint,
      tokenEndpoint: parsed.data.token_endpoint,
    };
  }

  /**
   * POST a token request (RFC 6749 §4.1.3 / §6) with client credentials in the form body
   */
  private async requestTokens(
    tokenEndpoint: string,
    form: URLSearchParams,
    operation: string,
    createError: TokenErrorFactory
  ): Promise<Credentials> {
    form.set('client_id', this.config.clientId);
    if (this.config.clientSecret) {
      form.set('client_secret', this.config.clientSecret);
    }

    let response: Response;
    try {
      response = await this.doFetch(tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
        },
        body: form.toString(),
      });
    } catch (error) {
      logger.oauthError(`${operation} request failed`, error);
      throw createError(`${operation} failed: token endpoint unreachable`);
    }

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const providerError = TokenErrorResponseSchema.safeParse(body);
      const errorCode = providerError.success ? providerError.data.error : undefined;
      logger.oauthError(`${operation} failed`, {
        status: response.status,
        statusText: response.statusText,
        error: errorCode
      });
      throw createError(
        `${operation} failed: ${response.status} ${response.statusText}${errorCode ? ` (${errorCode})` : ''}`,
        { status: response.status, error: errorCode }
      );
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw createError(`${operation} failed: no access token received`);
    }

    const issuedAt = Date.now();
    return {
      tokenType: parsed.data.token_type,
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiresAt: issuedAt + (parsed.data.expires_in ?? this.DEFAULT_TOKEN_EXPIRATION_SECONDS) * 1000,
      issuedAt,
    };
  }
}
