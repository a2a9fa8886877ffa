export interface SessionState {
  /** Summarization provider chosen with /change_model. */
  summarizerId?: string;
}

/**
 * Per-user state that survives between messages. Kept behind an interface so
 * an external store can replace the in-memory one.
 */
export interface SessionStore {
  get(userId: number): Promise<SessionState | undefined>;
  update(userId: number, patch: Partial<SessionState>): Promise<SessionState>;
}

// Lives for the process lifetime; the event loop serializes access
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<number, SessionState>();

  async get(userId: number): Promise<SessionState | undefined> {
    const state = this.sessions.get(userId);
    return state ? { ...state } : undefined;
  }

  async update(userId: number, patch: Partial<SessionState>): Promise<SessionState> {
    const next = { ...this.sessions.get(userId), ...patch };
    this.sessions.set(userId, next);
    return { ...next };
  }
}
