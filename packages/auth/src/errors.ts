/**
 * OAuth error types
 *
 * Every error carries a stable code; route handlers pick the HTTP status and
 * view from the class.
 */

export class OAuthError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OAuthError';
  }
}

/**
 * The system random source failed; no login attempt can be started
 */
export class EntropySourceError extends OAuthError {
  constructor(message: string = 'System random source is unavailable', details?: Record<string, unknown>) {
    super(message, 'entropy_unavailable', details);
    this.name = 'EntropySourceError';
  }
}

/**
 * Callback state does not match an in-flight consent (CSRF, replay or stale login)
 */
export class StateMismatchError extends OAuthError {
  constructor(message: string = 'Invalid or expired state parameter') {
    super(message, 'invalid_state');
    this.name = 'StateMismatchError';
  }
}

/**
 * The provider redirected back with an error instead of an authorization code
 */
export class AuthorizationDeniedError extends OAuthError {
  constructor(public readonly providerError: string, public readonly providerErrorDescription?: string) {
    super(
      providerErrorDescription
        ? `Authorization denied: ${providerError} (${providerErrorDescription})`
        : `Authorization denied: ${providerError}`,
      'access_denied',
      { error: providerError, errorDescription: providerErrorDescription }
    );
    this.name = 'AuthorizationDeniedError';
  }
}

export class TokenExchangeError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'token_exchange_failed', details);
    this.name = 'TokenExchangeError';
  }
}

export class TokenRefreshError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'token_refresh_failed', details);
    this.name = 'TokenRefreshError';
  }
}

export class OAuthDiscoveryError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'discovery_failed', details);
    this.name = 'OAuthDiscoveryError';
  }
}
