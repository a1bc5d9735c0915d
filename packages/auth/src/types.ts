/**
 * OAuth wire types
 */

import { z } from 'zod';

export interface OAuthEndpoints {
  authorizationEndpoint: string;
  tokenEndpoint: string;
}

/**
 * Query parameters the provider appends to the redirect URL
 */
export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}

/**
 * RFC 8414 authorization server metadata (the parts this client uses)
 */
export const DiscoveryDocumentSchema = z.object({
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
}).passthrough();

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1).default('Bearer'),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const TokenErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});
