/**
 * PKCE (RFC 7636) verifier, S256 challenge and CSRF state generation
 */

import { createHash, randomBytes } from 'node:crypto';
import { EntropySourceError } from './errors.js';

export type RandomSource = (size: number) => Buffer;

export interface PkcePair {
  verifier: string;
  challenge: string;
  state: string;
}

export const VERIFIER_BYTES = 32;
export const STATE_BYTES = 16;

/**
 * S256 transform: base64url(SHA-256(verifier))
 */
export function deriveChallenge(verifier: string): string {
  return createHash('sha256')
    .update(verifier)
    .digest('base64url');
}

function draw(randomSource: RandomSource, size: number): Buffer {
  let bytes: Buffer;
  try {
    bytes = randomSource(size);
  } catch (error) {
    throw new EntropySourceError('System random source is unavailable', {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  if (bytes.length !== size) {
    throw new EntropySourceError(`Random source returned ${bytes.length} bytes, expected ${size}`);
  }
  return bytes;
}

/**
 * Generate a fresh verifier/challenge pair and an independent state token
 */
export function generatePkce(randomSource: RandomSource = randomBytes): PkcePair {
  const verifier = draw(randomSource, VERIFIER_BYTES).toString('base64url');
  const state = draw(randomSource, STATE_BYTES).toString('hex');

  return {
    verifier,
    challenge: deriveChallenge(verifier),
    state,
  };
}
