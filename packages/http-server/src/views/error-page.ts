/**
 * Error page for failed logins and unexpected server errors
 */

import { escapeHtml, renderLayout } from './html.js';

export interface ErrorPageOptions {
  title: string;
  message: string;
  /** Offer a link that starts a new login attempt */
  signInAgain?: boolean;
}

export function renderErrorPage(options: ErrorPageOptions): string {
  const signIn = options.signInAgain
    ? '\n      <a class="btn btn-primary" href="/">Sign in again</a>'
    : '';

  return renderLayout(options.title, `      <h1 class="h3">${escapeHtml(options.title)}</h1>
      <div class="alert alert-danger" role="alert">${escapeHtml(options.message)}</div>${signIn}`);
}
