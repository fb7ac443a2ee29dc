// src/services/sessionMemory.ts
// What: Per-session conversation history handed to the generation layer alongside retrieved chunks.
// How: A Map from session id to a bounded message list. Each session keeps only its newest maxMessages;
//      when more than maxSessions are live, the least recently touched session is evicted.
//      Independent of the document store.

export type MessageRole = 'user' | 'assistant' | 'system';

export interface SessionMessage {
  role: MessageRole;
  content: string;
  at: string; // ISO timestamp
}

export interface SessionMemoryOptions {
  maxMessages: number;
  maxSessions?: number;
  now?: () => Date;
}

export class SessionMemory {
  private readonly sessions = new Map<string, SessionMessage[]>();
  private readonly maxMessages: number;
  private readonly maxSessions: number;
  private readonly now: () => Date;

  constructor(opts: SessionMemoryOptions) {
    this.maxMessages = Math.max(1, opts.maxMessages);
    this.maxSessions = Math.max(1, opts.maxSessions ?? 1000);
    this.now = opts.now ?? (() => new Date());
  }

  append(sessionId: string, role: MessageRole, content: string): SessionMessage[] {
    const history = this.touch(sessionId) ?? [];
    history.push({ role, content, at: this.now().toISOString() });
    if (history.length > this.maxMessages) history.splice(0, history.length - this.maxMessages);
    this.sessions.set(sessionId, history);
    this.evict();
    return [...history];
  }

  /** Oldest first; empty for unknown sessions. */
  history(sessionId: string): SessionMessage[] {
    return [...(this.touch(sessionId) ?? [])];
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  // Map iteration order doubles as recency order: re-inserting moves a session to the back.
  private touch(sessionId: string): SessionMessage[] | undefined {
    const history = this.sessions.get(sessionId);
    if (history) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, history);
    }
    return history;
  }

  private evict(): void {
    for (const id of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) return;
      this.sessions.delete(id);
    }
  }
}
