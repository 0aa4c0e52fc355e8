import { createLogger, type Logger } from './logger.ts';

export type LogEventType = 'threat' | 'invasion' | 'battle' | 'subsystem' | 'system';

export interface LogEventPayload {
  readonly type: LogEventType;
  /** Feed event name, e.g. `battle.started`. */
  readonly event: string;
  /** Threat, battle or provider the line is about. */
  readonly subject?: string | null;
  readonly message: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface LogEntry {
  readonly id: string;
  readonly type: LogEventType;
  readonly event: string;
  readonly subject: string | null;
  readonly message: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly firstSeenAt: number;
  readonly lastSeenAt: number;
  readonly occurrences: number;
}

export type LogChange =
  | { readonly kind: 'added'; readonly entry: LogEntry }
  | { readonly kind: 'repeated'; readonly entry: LogEntry }
  | { readonly kind: 'evicted'; readonly entries: readonly LogEntry[] };

export type LogListener = (change: LogChange) => void;

export interface LogStoreOptions {
  readonly maxEntries?: number;
  readonly now?: () => number;
  readonly logger?: Logger;
}

const DEFAULT_MAX_ENTRIES = 150;

/**
 * Bounded engine feed. Lines for the same event and subject fold into one
 * entry that moves to the newest position; lines without a subject never
 * fold. Oldest entries are evicted past `maxEntries`.
 */
export class LogStore {
  // insertion order is feed order, oldest first
  private readonly entries = new Map<string, LogEntry>();
  private readonly listeners = new Set<LogListener>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(options: LogStoreOptions = {}) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? DEFAULT_MAX_ENTRIES));
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('log-store');
  }

  record(payload: LogEventPayload): LogEntry {
    const at = this.now();
    const subject = payload.subject ?? null;
    const key = subject === null ? null : `${payload.event}\u0000${subject}`;
    const existing = key === null ? undefined : this.entries.get(key);

    if (key !== null && existing) {
      const entry: LogEntry = {
        ...existing,
        message: payload.message,
        metadata: { ...existing.metadata, ...payload.metadata },
        lastSeenAt: at,
        occurrences: existing.occurrences + 1
      };
      this.entries.delete(key);
      this.entries.set(key, entry);
      this.notify({ kind: 'repeated', entry });
      return entry;
    }

    this.sequence += 1;
    const id = `log-${this.sequence}`;
    const entry: LogEntry = {
      id,
      type: payload.type,
      event: payload.event,
      subject,
      message: payload.message,
      metadata: { ...payload.metadata },
      firstSeenAt: at,
      lastSeenAt: at,
      occurrences: 1
    };
    this.entries.set(key ?? id, entry);
    this.notify({ kind: 'added', entry });
    this.evictOverflow();
    return entry;
  }

  getHistory(): LogEntry[] {
    return Array.from(this.entries.values(), (entry) => ({
      ...entry,
      metadata: { ...entry.metadata }
    }));
  }

  get size(): number {
    return this.entries.size;
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    if (this.entries.size === 0) {
      return;
    }
    const entries = [...this.entries.values()];
    this.entries.clear();
    this.notify({ kind: 'evicted', entries });
  }

  private evictOverflow(): void {
    const overflow = this.entries.size - this.maxEntries;
    if (overflow <= 0) {
      return;
    }
    const evicted: LogEntry[] = [];
    for (const [key, entry] of this.entries) {
      if (evicted.length === overflow) {
        break;
      }
      this.entries.delete(key);
      evicted.push(entry);
    }
    this.notify({ kind: 'evicted', entries: evicted });
  }

  private notify(change: LogChange): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (error) {
        this.logger.warn('Log listener failed', error);
      }
    }
  }
}
