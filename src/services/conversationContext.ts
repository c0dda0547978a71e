import { ConversationTurn } from "../domain/types.js";

export const DEFAULT_HISTORY_TURNS = 3;

/** The last `capacity` turns of one conversation, oldest first. */
export class ConversationContext {
  private readonly slots: Array<ConversationTurn | undefined>;

  private head = 0;

  private count = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_TURNS) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}.`);
    }
    this.slots = new Array<ConversationTurn | undefined>(capacity).fill(undefined);
  }

  append(turn: ConversationTurn): void {
    this.slots[(this.head + this.count) % this.capacity] = Object.freeze({
      ...turn,
      citedChunkIds: [...turn.citedChunkIds],
    });
    if (this.count < this.capacity) {
      this.count += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  window(): readonly ConversationTurn[] {
    const turns: ConversationTurn[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const turn = this.slots[(this.head + i) % this.capacity];
      if (turn) {
        turns.push(turn);
      }
    }
    return Object.freeze(turns);
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}

export interface ConversationSessionsOptions {
  historyTurns?: number;
  maxSessions?: number;
}

export const DEFAULT_SESSION_ID = "default";

/** One isolated context per session id; the least recently used session is dropped past the cap. */
export class ConversationSessions {
  private readonly sessions = new Map<string, ConversationContext>();

  private readonly historyTurns: number;

  private readonly maxSessions: number;

  constructor(options: ConversationSessionsOptions = {}) {
    this.historyTurns = options.historyTurns ?? DEFAULT_HISTORY_TURNS;
    this.maxSessions = Math.max(1, options.maxSessions ?? 100);
  }

  get(sessionId: string = DEFAULT_SESSION_ID): ConversationContext {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    const context = new ConversationContext(this.historyTurns);
    this.sessions.set(sessionId, context);
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
    }
    return context;
  }

  /** Window of a session without creating or touching it. */
  peek(sessionId: string = DEFAULT_SESSION_ID): readonly ConversationTurn[] {
    return this.sessions.get(sessionId)?.window() ?? [];
  }

  clear(sessionId: string = DEFAULT_SESSION_ID): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
