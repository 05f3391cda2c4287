import { describe, it, expect, vi } from 'vitest';
import { SESSION_STORAGE_KEY, SessionIdentity, createMemoryStore, isValidSessionId } from '../../../src/client/session.js';

const FIRST = 'a3bb189e-8bf9-4888-9912-ace4e6543002';
const SECOND = '6f1c2d3e-4a5b-4c6d-8e7f-901234567890';

describe('SessionIdentity', () => {
  it('creates an id once and persists it', () => {
    const store = createMemoryStore();
    const createId = vi.fn(() => FIRST);
    const identity = new SessionIdentity(store, createId);

    expect(identity.sessionId).toBe(FIRST);
    expect(identity.sessionId).toBe(FIRST);
    expect(createId).toHaveBeenCalledTimes(1);
    expect(store.getItem(SESSION_STORAGE_KEY)).toBe(FIRST);
  });

  it('reuses a stored id', () => {
    const createId = vi.fn(() => SECOND);
    const identity = new SessionIdentity(createMemoryStore({ [SESSION_STORAGE_KEY]: FIRST }), createId);

    expect(identity.sessionId).toBe(FIRST);
    expect(createId).not.toHaveBeenCalled();
  });

  it('replaces a malformed stored id', () => {
    const store = createMemoryStore({ [SESSION_STORAGE_KEY]: 'not-a-uuid' });
    const identity = new SessionIdentity(store, () => SECOND);

    expect(identity.sessionId).toBe(SECOND);
    expect(store.getItem(SESSION_STORAGE_KEY)).toBe(SECOND);
  });

  it('issues a new id on reset', () => {
    const ids = [FIRST, SECOND];
    const store = createMemoryStore();
    const identity = new SessionIdentity(store, () => ids.shift() ?? FIRST);

    expect(identity.sessionId).toBe(FIRST);
    expect(identity.reset()).toBe(SECOND);
    expect(identity.sessionId).toBe(SECOND);
    expect(store.getItem(SESSION_STORAGE_KEY)).toBe(SECOND);
  });

  it('generates valid ids by default', () => {
    expect(isValidSessionId(new SessionIdentity(createMemoryStore()).sessionId)).toBe(true);
  });

  it('draws default ids from the global Web Crypto API', () => {
    const spy = vi.spyOn(globalThis.crypto, 'randomUUID').mockReturnValue(FIRST);

    expect(new SessionIdentity(createMemoryStore()).sessionId).toBe(FIRST);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});

describe('isValidSessionId', () => {
  it('accepts v4 uuids only', () => {
    expect(isValidSessionId(FIRST)).toBe(true);
    expect(isValidSessionId('a3bb189e-8bf9-1888-9912-ace4e6543002')).toBe(false);
    expect(isValidSessionId('')).toBe(false);
  });
});
