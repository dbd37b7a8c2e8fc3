import type { StoreConnection } from "./types.js";

/**
 * Configuration options for the in-memory connection.
 */
export interface MemoryConnectionOptions {
  /**
   * Password the connection expects on `authenticate`. When set, commands
   * fail with `NOAUTH` until it was given; when unset, any password is
   * rejected like a server without `requirepass`.
   */
  password?: string;
}

/**
 * In-memory connection exposing its keyspace for inspection.
 */
export interface MemoryConnection extends StoreConnection {
  /**
   * Every key currently stored, in insertion order.
   */
  keys(): string[];
}

type Value =
  | { type: "string"; value: string }
  | { type: "hash"; value: Map<string, string> }
  | { type: "zset"; value: Map<string, number> };

/**
 * Creates a {@link StoreConnection} that keeps its data in process memory,
 * answering the commands the todo store uses the way Redis does. Data
 * survives `close` and reconnects, just like a server would keep it.
 *
 * @example
 * ```typescript
 * const connection = createMemoryConnection();
 * const store = createTodoStore({ connection });
 * await store.add({ title: "buy milk" });
 * connection.keys(); // ["todo:id", "todo:1", "todoset:default"]
 * ```
 */
export function createMemoryConnection(options: MemoryConnectionOptions = {}): MemoryConnection {
  const { password } = options;
  const data = new Map<string, Value>();
  let open = false;
  let authenticated = false;

  const wrongType = () => new Error("WRONGTYPE Operation against a key holding the wrong kind of value");

  const ensureOpen = () => {
    if (!open) {
      throw new Error("Connection is closed");
    }
  };

  const ensureReady = () => {
    ensureOpen();
    if (password !== undefined && !authenticated) {
      throw new Error("NOAUTH Authentication required.");
    }
  };

  const readHash = (key: string): Map<string, string> | undefined => {
    const entry = data.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "hash") throw wrongType();
    return entry.value;
  };

  const readZset = (key: string): Map<string, number> | undefined => {
    const entry = data.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "zset") throw wrongType();
    return entry.value;
  };

  const writeHash = (key: string): Map<string, string> => {
    const existing = readHash(key);
    if (existing !== undefined) return existing;
    const value = new Map<string, string>();
    data.set(key, { type: "hash", value });
    return value;
  };

  const writeZset = (key: string): Map<string, number> => {
    const existing = readZset(key);
    if (existing !== undefined) return existing;
    const value = new Map<string, number>();
    data.set(key, { type: "zset", value });
    return value;
  };

  /**
   * Members ordered by score, ties broken lexicographically.
   */
  const sorted = (members: Map<string, number>): string[] =>
    [...members.entries()]
      .sort(([a, scoreA], [b, scoreB]) => scoreA - scoreB || (a < b ? -1 : a > b ? 1 : 0))
      .map(([member]) => member);

  /**
   * Removes a collection once it has no elements left, as Redis does.
   */
  const dropIfEmpty = (key: string, collection: Map<string, unknown>) => {
    if (collection.size === 0) data.delete(key);
  };

  return {
    get connected(): boolean {
      return open;
    },

    async connect(_host: string, _port: number): Promise<void> {
      open = true;
      authenticated = false;
    },

    async authenticate(given: string): Promise<void> {
      ensureOpen();
      if (password === undefined) {
        throw new Error("ERR AUTH <password> called without any password configured for the default user");
      }
      if (given !== password) {
        throw new Error("WRONGPASS invalid username-password pair or user is disabled.");
      }
      authenticated = true;
    },

    async increment(key: string): Promise<number> {
      ensureReady();
      const entry = data.get(key);
      if (entry !== undefined && entry.type !== "string") throw wrongType();
      const current = entry === undefined ? 0 : Number(entry.value);
      if (!Number.isSafeInteger(current)) {
        throw new Error("ERR value is not an integer or out of range");
      }
      const next = current + 1;
      data.set(key, { type: "string", value: String(next) });
      return next;
    },

    async hashSetMany(key: string, fields: Record<string, string>): Promise<void> {
      ensureReady();
      const entries = Object.entries(fields);
      if (entries.length === 0) {
        throw new Error("ERR wrong number of arguments for 'hset' command");
      }
      const record = writeHash(key);
      for (const [field, value] of entries) {
        record.set(field, value);
      }
    },

    async hashGetMany(key: string, fields: readonly string[]): Promise<(string | null)[]> {
      ensureReady();
      const record = readHash(key);
      return fields.map((field) => record?.get(field) ?? null);
    },

    async sortedSetAdd(key: string, score: number, member: string): Promise<number> {
      ensureReady();
      const members = writeZset(key);
      const added = members.has(member) ? 0 : 1;
      members.set(member, score);
      return added;
    },

    async sortedSetRange(key: string, start: number, stop: number): Promise<string[]> {
      ensureReady();
      const members = readZset(key);
      if (members === undefined) return [];
      const ordered = sorted(members);
      const from = start < 0 ? Math.max(ordered.length + start, 0) : start;
      const to = stop < 0 ? ordered.length + stop : Math.min(stop, ordered.length - 1);
      return from > to ? [] : ordered.slice(from, to + 1);
    },

    async sortedSetRemove(key: string, member: string): Promise<number> {
      ensureReady();
      const members = readZset(key);
      if (members === undefined || !members.delete(member)) return 0;
      dropIfEmpty(key, members);
      return 1;
    },

    async sortedSetCardinality(key: string): Promise<number> {
      ensureReady();
      return readZset(key)?.size ?? 0;
    },

    async keyDelete(key: string): Promise<number> {
      ensureReady();
      return data.delete(key) ? 1 : 0;
    },

    async flushAll(): Promise<string> {
      ensureReady();
      data.clear();
      return "OK";
    },

    async close(): Promise<void> {
      open = false;
      authenticated = false;
    },

    keys(): string[] {
      return [...data.keys()];
    },
  };
}
