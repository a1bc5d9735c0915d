/**
 * One-shot messages carried in the browser session until the next render
 */

import type { BrowserSessionManager, FlashMessage } from '@warehouse-oauth-demo/persistence';

export async function pushFlash(
  sessions: BrowserSessionManager,
  sessionId: string,
  flash: FlashMessage
): Promise<void> {
  await sessions.update(sessionId, (session) => {
    session.flashes.push(flash);
  });
}

export async function drainFlashes(sessions: BrowserSessionManager, sessionId: string): Promise<FlashMessage[]> {
  const drained = await sessions.update(sessionId, (session) => {
    const flashes = session.flashes;
    session.flashes = [];
    return flashes;
  });
  return drained ?? [];
}
