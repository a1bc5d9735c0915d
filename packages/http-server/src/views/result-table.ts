/**
 * Query result rendering: a striped, bordered table with a header row and no
 * index column, followed by the result dimensions
 */

import type { QueryResult } from '@warehouse-oauth-demo/sql';
import { escapeHtml } from './html.js';

export const NULL_CELL = 'NULL';

export function formatDimensions(result: QueryResult): string {
  return `${result.rows.length} rows × ${result.columns.length} columns`;
}

function renderCell(value: string | null): string {
  return value === null ? `<td><em>${NULL_CELL}</em></td>` : `<td>${escapeHtml(value)}</td>`;
}

export function renderResultTable(result: QueryResult): string {
  const header = result.columns.map(column => `<th>${escapeHtml(column)}</th>`).join('');
  const body = result.rows
    .map(row => `<tr>${row.map(renderCell).join('')}</tr>`)
    .join('\n');

  return `<table class="table table-striped table-bordered">
  <thead><tr>${header}</tr></thead>
  <tbody>
${body}
  </tbody>
</table>
<p class="text-muted">${escapeHtml(formatDimensions(result))}</p>`;
}
