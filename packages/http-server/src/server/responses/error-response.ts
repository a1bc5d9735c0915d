/**
 * Map errors reaching the route boundary to an HTTP status and error page.
 * Authentication failures never show internals.
 */

import {
  AuthorizationDeniedError,
  OAuthDiscoveryError,
  StateMismatchError,
  TokenExchangeError
} from '@warehouse-oauth-demo/auth';
import { renderErrorPage } from '../../views/error-page.js';

export interface ErrorView {
  status: number;
  title: string;
  message: string;
  signInAgain: boolean;
}

export function describeError(error: unknown): ErrorView {
  if (error instanceof StateMismatchError) {
    return {
      status: 400,
      title: 'Sign-in failed',
      message: 'The login attempt was invalid or has expired.',
      signInAgain: true,
    };
  }

  if (error instanceof AuthorizationDeniedError) {
    return {
      status: 400,
      title: 'Sign-in failed',
      message: `The workspace did not authorize this application (${error.providerError}).`,
      signInAgain: true,
    };
  }

  if (error instanceof TokenExchangeError) {
    return {
      status: 502,
      title: 'Sign-in failed',
      message: error.message,
      signInAgain: true,
    };
  }

  if (error instanceof OAuthDiscoveryError) {
    return {
      status: 502,
      title: 'Sign-in service unavailable',
      message: 'The workspace sign-in service could not be reached.',
      signInAgain: true,
    };
  }

  return {
    status: 500,
    title: 'Something went wrong',
    message: 'An unexpected error occurred.',
    signInAgain: false,
  };
}

export function renderErrorView(view: ErrorView): string {
  return renderErrorPage({ title: view.title, message: view.message, signInAgain: view.signInAgain });
}
