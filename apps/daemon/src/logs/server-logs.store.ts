import { inspect } from 'node:util';

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServerLogEntry = {
  id: number;
  time: string; // ISO
  level: ServerLogLevel;
  message: string;
  context: string | null;
};

// Nest boot chatter; errors from these contexts are still kept.
const IGNORED_CONTEXTS = new Set<string>([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
]);

const MAX_MESSAGE_LENGTH = 10_000;

function normalizeMessage(input: unknown): string {
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (typeof input === 'number' || typeof input === 'boolean' || typeof input === 'bigint') {
    return String(input);
  }
  try {
    const json = JSON.stringify(input);
    return typeof json === 'string' ? json : inspect(input, { depth: 4 });
  } catch {
    // circular
    return inspect(input, { depth: 4 });
  }
}

/** Fixed-size ring of recent log lines, served by GET /api/logs. */
export class ServerLogStore {
  private readonly ring: Array<ServerLogEntry | null>;
  private nextId = 1;
  private writeIndex = 0;
  private count = 0;

  constructor(readonly capacity = 5000) {
    this.ring = Array.from({ length: capacity }, () => null);
  }

  get size(): number {
    return this.count;
  }

  add(params: {
    level: ServerLogLevel;
    message: unknown;
    stack?: unknown;
    context?: unknown;
    time?: Date;
  }): void {
    const msg = normalizeMessage(params.message).trim();
    const stack = normalizeMessage(params.stack).trim();
    const combined = stack ? (msg ? `${msg}\n${stack}` : stack) : msg;
    if (!combined) return;

    const contextRaw = typeof params.context === 'string' ? params.context.trim() : '';
    const context = contextRaw || null;
    if (params.level !== 'error' && context && IGNORED_CONTEXTS.has(context)) return;

    this.push({
      id: this.nextId++,
      time: (params.time ?? new Date()).toISOString(),
      level: params.level,
      message:
        combined.length > MAX_MESSAGE_LENGTH
          ? `${combined.slice(0, MAX_MESSAGE_LENGTH)}…`
          : combined,
      context,
    });
  }

  list(params: { afterId?: number; limit?: number } = {}): {
    logs: ServerLogEntry[];
    latestId: number;
  } {
    const latestId = this.nextId - 1;
    const limit = Math.max(1, Math.min(this.capacity, params.limit ?? 200));
    const { afterId } = params;
    const ordered = this.ordered();
    const filtered = afterId === undefined ? ordered : ordered.filter((l) => l.id > afterId);
    return { logs: filtered.slice(-limit), latestId };
  }

  /** Drop entries older than `cutoff`. Ids keep counting so `afterId` polling stays valid. */
  pruneOlderThan(cutoff: Date): { removed: number; kept: number } {
    const cutoffMs = cutoff.getTime();
    const all = this.ordered();
    if (!all.length || !Number.isFinite(cutoffMs)) return { removed: 0, kept: all.length };

    const kept = all.filter((entry) => Date.parse(entry.time) >= cutoffMs);
    this.clear();
    for (const entry of kept) this.push(entry);
    return { removed: all.length - kept.length, kept: kept.length };
  }

  clear(): void {
    this.ring.fill(null);
    this.writeIndex = 0;
    this.count = 0;
  }

  private push(entry: ServerLogEntry) {
    this.ring[this.writeIndex] = entry;
    this.writeIndex = (this.writeIndex + 1) % this.capacity;
    this.count = Math.min(this.capacity, this.count + 1);
  }

  private ordered(): ServerLogEntry[] {
    const oldestIndex = this.count === this.capacity ? this.writeIndex : 0;
    const ordered: ServerLogEntry[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const entry = this.ring[(oldestIndex + i) % this.capacity];
      if (entry) ordered.push(entry);
    }
    return ordered;
  }
}

/** Process-wide store shared by the logger and the logs endpoint. */
export const serverLogStore = new ServerLogStore();
