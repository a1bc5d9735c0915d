/**
 * Session record serialization
 */

import { BrowserSessionSchema, type BrowserSession } from './types.js';

export class SessionDecodeError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'SessionDecodeError';
  }
}

export function serializeSession(session: BrowserSession): string {
  return JSON.stringify(BrowserSessionSchema.parse(session));
}

export function parseSession(raw: string): BrowserSession {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new SessionDecodeError(`Session record is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = BrowserSessionSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new SessionDecodeError('Session record failed validation', issues);
  }

  return result.data;
}
