// Anonymous session identity. The id is created once, persisted in whatever
// store the host provides, and passed explicitly to calls that need it.

export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export const SESSION_STORAGE_KEY = 'persona_press_session_id';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isValidSessionId(value: string): boolean {
  return UUID_V4.test(value);
}

export class SessionIdentity {
  private cached: string | null = null;

  constructor(
    private readonly store: KeyValueStore,
    private readonly createId: () => string = () => globalThis.crypto.randomUUID(),
    private readonly key: string = SESSION_STORAGE_KEY,
  ) {}

  /** Returns the stored id, replacing a missing or malformed one. */
  get sessionId(): string {
    if (this.cached) return this.cached;

    const stored = this.store.getItem(this.key);
    if (stored && isValidSessionId(stored)) {
      this.cached = stored;
      return stored;
    }

    const fresh = this.createId();
    this.store.setItem(this.key, fresh);
    this.cached = fresh;
    return fresh;
  }

  reset(): string {
    this.cached = null;
    const fresh = this.createId();
    this.store.setItem(this.key, fresh);
    this.cached = fresh;
    return fresh;
  }
}

export function createMemoryStore(initial: Record<string, string> = {}): KeyValueStore {
  const values = new Map(Object.entries(initial));
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    },
  };
}
