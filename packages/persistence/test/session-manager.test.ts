import { BrowserSessionManager } from '../src/session-manager.js';
import { MemorySessionStore } from '../src/stores/memory/memory-session-store.js';

describe('BrowserSessionManager', () => {
  let store: MemorySessionStore;
  let manager: BrowserSessionManager;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    store = new MemorySessionStore();
    manager = new BrowserSessionManager(store, { ttlMs: 60_000 });
  });

  afterEach(() => {
    manager.dispose();
    vi.useRealTimers();
  });

  it('creates sessions with an expiry and no state', async () => {
    const session = await manager.createSession();

    expect(session.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(session.expiresAt - session.createdAt).toBe(60_000);
    expect(await manager.getSession(session.sessionId)).toEqual(session);
    expect(await manager.getSessionCount()).toBe(1);
  });

  it('persists mutations made inside update', async () => {
    const { sessionId } = await manager.createSession();

    const result = await manager.update(sessionId, session => {
      session.flashes.push({ category: 'info', message: 'hello' });
      return 'ok';
    });

    expect(result).toBe('ok');
    expect((await manager.getSession(sessionId))?.flashes).toEqual([{ category: 'info', message: 'hello' }]);
  });

  it('writes nothing when the mutator throws', async () => {
    const { sessionId } = await manager.createSession();

    await expect(manager.update(sessionId, session => {
      session.flashes.push({ category: 'info', message: 'lost' });
      throw new Error('abort');
    })).rejects.toThrow('abort');

    expect((await manager.getSession(sessionId))?.flashes).toEqual([]);
  });

  it('returns undefined when updating a missing session', async () => {
    const mutator = vi.fn();

    expect(await manager.update('missing', mutator)).toBeUndefined();
    expect(mutator).not.toHaveBeenCalled();
  });

  it('serializes concurrent updates to one session', async () => {
    const { sessionId } = await manager.createSession();

    await Promise.all(['a', 'b', 'c'].map(message =>
      manager.update(sessionId, async session => {
        await Promise.resolve();
        session.flashes.push({ category: 'info', message });
      })
    ));

    const messages = (await manager.getSession(sessionId))?.flashes.map(flash => flash.message);
    expect(messages).toEqual(['a', 'b', 'c']);
  });

  it('discards records that fail validation', async () => {
    await store.set('corrupt', '{"sessionId":""}', Date.now() + 1000);

    expect(await manager.getSession('corrupt')).toBeUndefined();
    expect(await store.get('corrupt')).toBeUndefined();
  });

  it('destroys sessions', async () => {
    const { sessionId } = await manager.createSession();

    expect(await manager.destroySession(sessionId)).toBe(true);
    expect(await manager.getSession(sessionId)).toBeUndefined();
    expect(await manager.destroySession(sessionId)).toBe(false);
  });

  it('expires sessions after the ttl', async () => {
    const { sessionId } = await manager.createSession();

    vi.setSystemTime(new Date('2024-01-01T00:01:00Z'));
    expect(await manager.getSession(sessionId)).toBeUndefined();
  });
});
