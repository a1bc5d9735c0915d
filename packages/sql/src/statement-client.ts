/**
 * Statement Execution Client
 *
 * Runs one SQL statement on a warehouse with the caller's delegated
 * credentials and waits inline for the result. A single attempt per call:
 * failures surface to the user, nothing is retried or cached.
 */

import { logger } from '@warehouse-oauth-demo/observability';
import type { Credentials } from '@warehouse-oauth-demo/persistence';
import { QueryExecutionError } from './errors.js';
import {
  ApiErrorResponseSchema,
  StatementResponseSchema,
  type QueryResult,
  type StatementResponse
} from './types.js';

export interface StatementExecutionClientOptions {
  /** Workspace host, e.g. https://workspace.example.com */
  host: string;
  warehouseId: string;
  /** Server-side wait before the statement is cancelled, 5s to 50s (default: 30s) */
  waitTimeout?: string;
  /** fetch implementation (default: global fetch, resolved per call) */
  fetch?: typeof fetch;
}

export class StatementExecutionClient {
  private readonly waitTimeout: string;

  constructor(private readonly options: StatementExecutionClientOptions) {
    this.waitTimeout = options.waitTimeout ?? '30s';
  }

  get statementsUrl(): string {
    return `${this.options.host}/api/2.0/sql/statements`;
  }

  async executeQuery(credentials: Credentials, statement: string): Promise<QueryResult> {
    const started = Date.now();
    const fetchImpl = this.options.fetch ?? fetch;

    let response: Response;
    try {
      response = await fetchImpl(this.statementsUrl, {
        method: 'POST',
        headers: {
          'Authorization': `${credentials.tokenType} ${credentials.accessToken}`,
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: JSON.stringify({
          warehouse_id: this.options.warehouseId,
          statement,
          wait_timeout: this.waitTimeout,
          on_wait_timeout: 'CANCEL',
          format: 'JSON_ARRAY',
          disposition: 'INLINE',
        }),
      });
    } catch (error) {
      logger.sqlError('Statement request failed', error);
      throw new QueryExecutionError('Unable to reach the SQL warehouse', 'network_error');
    }

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const apiError = ApiErrorResponseSchema.safeParse(body);
      const message = apiError.success && apiError.data.message
        ? apiError.data.message
        : `Statement request failed: ${response.status} ${response.statusText}`;
      logger.sqlError('Statement request rejected', {
        status: response.status,
        errorCode: apiError.success ? apiError.data.error_code : undefined
      });
      throw new QueryExecutionError(message, 'request_rejected', {
        status: response.status,
        errorCode: apiError.success ? apiError.data.error_code : undefined
      });
    }

    const parsed = StatementResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new QueryExecutionError('Unexpected response from the SQL Statement Execution API', 'invalid_response');
    }

    const result = this.toQueryResult(parsed.data);
    logger.sqlInfo('Statement succeeded', {
      statementId: parsed.data.statement_id,
      rows: result.rows.length,
      columns: result.columns.length,
      durationMs: Date.now() - started
    });
    return result;
  }

  private toQueryResult(response: StatementResponse): QueryResult {
    const { state, error } = response.status;

    switch (state) {
      case 'SUCCEEDED':
        break;
      case 'FAILED':
      case 'CANCELED':
      case 'CLOSED':
        logger.sqlError(`Statement ${state.toLowerCase()}`, {
          statementId: response.statement_id,
          errorCode: error?.error_code
        });
        throw new QueryExecutionError(error?.message ?? `Statement ${state.toLowerCase()}`, state.toLowerCase(), {
          statementId: response.statement_id,
          errorCode: error?.error_code
        });
      case 'PENDING':
      case 'RUNNING':
        throw new QueryExecutionError(
          `Statement did not finish within ${this.waitTimeout}`,
          'timeout',
          { statementId: response.statement_id }
        );
    }

    const columns = [...(response.manifest?.schema?.columns ?? [])]
      .sort((a, b) => a.position - b.position)
      .map(column => column.name);

    return {
      columns,
      rows: response.result?.data_array ?? [],
    };
  }
}
