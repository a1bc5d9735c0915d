/**
 * SQL Statement Execution API wire types
 */

import { z } from 'zod';

export interface QueryResult {
  columns: string[];
  rows: (string | null)[][];
}

export const StatementStateSchema = z.enum(['PENDING', 'RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELED', 'CLOSED']);

export type StatementState = z.infer<typeof StatementStateSchema>;

const ServiceErrorSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

/**
 * Response of POST /api/2.0/sql/statements (JSON_ARRAY format, INLINE disposition)
 */
export const StatementResponseSchema = z.object({
  statement_id: z.string().optional(),
  status: z.object({
    state: StatementStateSchema,
    error: ServiceErrorSchema.optional(),
  }),
  manifest: z.object({
    schema: z.object({
      column_count: z.number().int().optional(),
      columns: z.array(z.object({
        name: z.string(),
        position: z.number().int(),
        type_name: z.string().optional(),
      })).default([]),
    }).optional(),
    total_row_count: z.number().int().optional(),
  }).optional(),
  result: z.object({
    row_count: z.number().int().optional(),
    data_array: z.array(z.array(z.string().nullable())).optional(),
  }).optional(),
});

export type StatementResponse = z.infer<typeof StatementResponseSchema>;

/**
 * Error body returned with non-2xx statuses
 */
export const ApiErrorResponseSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});
