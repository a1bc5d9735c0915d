/**
 * Browser session store interface
 *
 * Backends hold opaque serialized records keyed by session id. Implementations
 * must drop records once their expiry has passed.
 */

export interface SessionStore {
  /**
   * Retrieve a serialized session record
   * @returns the record, or undefined if missing or expired
   */
  get(_sessionId: string): Promise<string | undefined>;

  /**
   * Store a serialized session record until the given epoch-millisecond expiry
   */
  set(_sessionId: string, _record: string, _expiresAt: number): Promise<void>;

  /**
   * Delete a session record
   * @returns true if a record existed
   */
  delete(_sessionId: string): Promise<boolean>;

  /**
   * Remove expired records
   * @returns number of records removed
   */
  cleanup(): Promise<number>;

  /**
   * Number of live records (for monitoring)
   */
  count(): Promise<number>;

  /**
   * Release timers and connections
   */
  dispose(): void;
}
