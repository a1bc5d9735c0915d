/**
 * Browser session data types
 *
 * Schemas double as the serialization boundary: stores only ever see the JSON
 * produced by serializeSession, and everything read back goes through parseSession.
 */

import { z } from 'zod';

/**
 * In-flight login attempt awaiting the provider callback
 */
export const ConsentSchema = z.object({
  verifier: z.string().min(1),
  challenge: z.string().min(1),
  state: z.string().min(1),
  authUrl: z.string().url(),
  expiresAt: z.number().int(),
});

export type Consent = z.infer<typeof ConsentSchema>;

/**
 * Delegated access for one browser session
 */
export const CredentialsSchema = z.object({
  tokenType: z.string().min(1),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: z.number().int(), // epoch milliseconds
  issuedAt: z.number().int().optional(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

export const FlashCategorySchema = z.enum(['danger', 'warning', 'info', 'success']);

export type FlashCategory = z.infer<typeof FlashCategorySchema>;

export const FlashMessageSchema = z.object({
  category: FlashCategorySchema,
  message: z.string(),
});

export type FlashMessage = z.infer<typeof FlashMessageSchema>;

export const BrowserSessionSchema = z.object({
  sessionId: z.string().min(1),
  createdAt: z.number().int(),
  expiresAt: z.number().int(),
  consent: ConsentSchema.optional(),
  credentials: CredentialsSchema.optional(),
  flashes: z.array(FlashMessageSchema).default([]),
});

export type BrowserSession = z.infer<typeof BrowserSessionSchema>;
