/**
 * Statement execution errors
 */

export class QueryExecutionError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'query_failed',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'QueryExecutionError';
  }
}
