/**
 * Query page: flash messages, the statement form and an optional result
 */

import type { FlashMessage } from '@warehouse-oauth-demo/persistence';
import type { QueryResult } from '@warehouse-oauth-demo/sql';
import { escapeHtml, renderLayout } from './html.js';
import { renderResultTable } from './result-table.js';

export interface IndexPageOptions {
  flashes: FlashMessage[];
  statement?: string;
  result?: QueryResult;
}

export function renderFlashes(flashes: FlashMessage[]): string {
  return flashes
    .map(flash => `      <div class="alert alert-${flash.category}" role="alert">${escapeHtml(flash.message)}</div>`)
    .join('\n');
}

export function renderIndexPage(options: IndexPageOptions): string {
  const { flashes, statement = '', result } = options;

  return renderLayout('Warehouse query', `      <div class="d-flex justify-content-between align-items-center mb-3">
        <h1 class="h3">Run a SQL statement</h1>
        <a class="btn btn-outline-secondary btn-sm" href="/logout">Sign out</a>
      </div>
${renderFlashes(flashes)}
      <form method="post" action="/" class="mb-4">
        <div class="mb-3">
          <label for="sql" class="form-label">SQL</label>
          <textarea id="sql" name="sql" class="form-control font-monospace" rows="5" required>${escapeHtml(statement)}</textarea>
        </div>
        <button type="submit" class="btn btn-primary">Run query</button>
      </form>
${result ? renderResultTable(result) : ''}`);
}
