import { KeyedMutex } from './keyed-mutex.js';
import { cloneSession, createSession, type Session } from './types.js';

/**
 * In-memory session table, one entry per conversation. Lives as long as the
 * instance does; nothing is persisted.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();
  private locks = new KeyedMutex();

  /** Returns a snapshot; mutate through `update`. */
  getOrCreate(conversationId: string): Session {
    return cloneSession(this.ensure(conversationId));
  }

  get(conversationId: string): Session | null {
    const session = this.sessions.get(conversationId);
    return session ? cloneSession(session) : null;
  }

  /**
   * Atomic read-modify-write for one conversation. Mutators for the same
   * conversation never interleave, even across awaits inside the mutator.
   */
  async update<T>(conversationId: string, mutator: (session: Session) => T | Promise<T>): Promise<T> {
    return this.locks.run(conversationId, () => mutator(this.ensure(conversationId)));
  }

  delete(conversationId: string): boolean {
    return this.sessions.delete(conversationId);
  }

  clear(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }

  private ensure(conversationId: string): Session {
    let session = this.sessions.get(conversationId);
    if (!session) {
      session = createSession(conversationId);
      this.sessions.set(conversationId, session);
    }
    return session;
  }
}
