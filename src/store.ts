import { DEFAULT_HOST, DEFAULT_PORT } from "./config.js";
import { createKeys, type KeyScheme } from "./keys.js";
import { createRedisConnection } from "./redis.js";
import { decodeTodoHash, encodeTodoChanges, encodeTodoHash, TODO_FIELDS } from "./serialization/hash.js";
import { withTimeout } from "./timeout.js";
import {
  AuthorizationError,
  ConnectionError,
  CreationError,
  type Logger,
  type NewTodo,
  NotFoundError,
  StoreError,
  type StoreConnection,
  type TodoChanges,
  type TodoItem,
  type TodoStore,
  TodoStoreError,
  ValidationError,
} from "./types.js";

/**
 * User ID assumed when a caller does not name one.
 */
export const DEFAULT_USER_ID = "default";

const DOCUMENT_ID = /^\d+$/;

/**
 * Configuration options for the todo store.
 */
export interface TodoStoreOptions {
  /**
   * Connection the store owns and closes.
   * @defaults a new Redis connection
   */
  connection?: StoreConnection;

  /** @defaults `"localhost"` */
  host?: string;

  /** @defaults `6379` */
  port?: number;

  /**
   * Authenticates after connecting when non-empty.
   */
  password?: string;

  /**
   * Milliseconds before a single store command fails with `TimeoutError`.
   */
  commandTimeout?: number;

  keys?: KeyScheme;

  /** @defaults console */
  logger?: Logger;
}

/**
 * Resolves the caller's identity. Every public operation calls this once;
 * nothing below it sees an optional user ID.
 */
export function resolveUserID(userID?: string | null): string {
  return userID === undefined || userID === null || userID === "" ? DEFAULT_USER_ID : userID;
}

/**
 * Creates a todo store that maps items onto hashes, per-user sorted sets and
 * an ID counter.
 *
 * The connection is opened lazily by the first operation and reused after
 * that. Commands that depend on each other run one after another; independent
 * lookups run concurrently and are joined before the operation settles.
 *
 * @example
 * ```typescript
 * const store = createTodoStore({ host: "localhost", port: 6379 });
 * const item = await store.add({ userID: "u1", title: "buy milk", order: 1 });
 * const items = await store.getAll("u1");
 * await store.close();
 * ```
 */
export function createTodoStore(options: TodoStoreOptions = {}): TodoStore {
  const {
    host = DEFAULT_HOST,
    port = DEFAULT_PORT,
    password,
    commandTimeout,
    logger = console,
    connection = createRedisConnection({ logger }),
  } = options;
  const keys = createKeys(options.keys);

  let connecting: Promise<void> | undefined;
  // Set only once connect and authentication have both succeeded
  let ready = false;

  const release = async (reason: string): Promise<void> => {
    await connection.close().catch((closeError: unknown) => {
      logger.warn(`Could not close connection after ${reason}`, closeError);
    });
  };

  const openConnection = async (): Promise<void> => {
    try {
      await withTimeout(connection.connect(host, port), commandTimeout, "CONNECT");
    } catch (error) {
      await release("failed connect");
      throw new ConnectionError(`Could not connect to ${host}:${port}`, { cause: error });
    }

    if (password) {
      try {
        await withTimeout(connection.authenticate(password), commandTimeout, "AUTH");
      } catch (error) {
        logger.error(`Authentication with ${host}:${port} failed`, error);
        await release("failed authentication");
        throw new ConnectionError(`Authentication with ${host}:${port} failed`, { cause: error });
      }
    }

    ready = true;
  };

  /**
   * Opens and authenticates the connection unless that already happened and
   * the connection is still live. Concurrent callers share one attempt; a
   * failed attempt is forgotten so the next call retries.
   */
  const ensureConnected = async (): Promise<void> => {
    if (ready && connection.connected) {
      return;
    }
    ready = false;

    connecting ??= openConnection().finally(() => {
      connecting = undefined;
    });
    await connecting;
  };

  /**
   * Runs one store command under the timeout. Failures the store already
   * classified pass through; anything else becomes a `StoreError`.
   */
  const command = async <R>(label: string, run: () => Promise<R>): Promise<R> => {
    try {
      return await withTimeout(run(), commandTimeout, label);
    } catch (error) {
      if (error instanceof TodoStoreError) {
        throw error;
      }
      throw new StoreError(`${label} failed`, { cause: error });
    }
  };

  /**
   * Reads one item and checks it belongs to `userID`.
   */
  const lookup = async (documentID: string, userID: string): Promise<TodoItem> => {
    const values = await command(`HMGET ${keys.item(documentID)}`, () =>
      connection.hashGetMany(keys.item(documentID), TODO_FIELDS),
    );
    const item = decodeTodoHash(documentID, values);

    if (item.userID !== userID) {
      throw new AuthorizationError(`Todo "${documentID}" does not belong to user "${userID}"`);
    }
    return item;
  };

  /**
   * Minted IDs are decimal, so anything else cannot name an item and must not
   * reach keys that share the item prefix, such as the counter.
   */
  const checkDocumentID = (documentID: string): void => {
    if (!DOCUMENT_ID.test(documentID)) {
      throw new NotFoundError(`Todo "${documentID}" not found`);
    }
  };

  const members = async (userID: string): Promise<string[]> =>
    command(`ZRANGE ${keys.set(userID)}`, () => connection.sortedSetRange(keys.set(userID), 0, -1));

  return {
    async count(userID?: string | null): Promise<number> {
      const user = resolveUserID(userID);
      await ensureConnected();

      return command(`ZCARD ${keys.set(user)}`, () => connection.sortedSetCardinality(keys.set(user)));
    },

    async clear(userID?: string | null): Promise<void> {
      const user = resolveUserID(userID);
      await ensureConnected();

      const ids = await members(user);
      const results = await Promise.allSettled(
        ids.map((id) => command(`DEL ${keys.item(id)}`, () => connection.keyDelete(keys.item(id)))),
      );

      const deleted = ids.filter((_, index) => results[index]?.status === "fulfilled");
      const failures = results.flatMap((result): unknown[] => (result.status === "rejected" ? [result.reason] : []));

      // Unindex only what was read, so items added meanwhile keep their entry
      for (const id of deleted) {
        await command(`ZREM ${keys.set(user)}`, () => connection.sortedSetRemove(keys.set(user), id));
      }

      if (failures.length > 0) {
        throw new StoreError(`Could not delete ${failures.length} of ${ids.length} todos of user "${user}"`, {
          errors: failures,
        });
      }
    },

    async clearAll(): Promise<void> {
      await ensureConnected();

      const reply = await command("FLUSHALL", () => connection.flushAll());
      if (reply !== "OK") {
        throw new StoreError(`FLUSHALL was not confirmed, store replied "${reply}"`);
      }
    },

    async getAll(userID?: string | null): Promise<TodoItem[]> {
      const user = resolveUserID(userID);
      await ensureConnected();

      const ids = await members(user);
      // Settle every lookup before answering, then fail on the first bad item in index order
      const results = await Promise.allSettled(ids.map((id) => lookup(id, user)));

      return results.map((result) => {
        if (result.status === "rejected") {
          throw result.reason;
        }
        return result.value;
      });
    },

    async get(documentID: string, userID?: string | null): Promise<TodoItem> {
      const user = resolveUserID(userID);
      checkDocumentID(documentID);
      await ensureConnected();

      return lookup(documentID, user);
    },

    async add(todo: NewTodo): Promise<TodoItem> {
      const userID = resolveUserID(todo.userID);
      const { title, order = 0, completed = false } = todo;

      if (typeof title !== "string" || title === "") {
        throw new ValidationError("Title must be a non-empty string");
      }
      const fields = encodeTodoHash({ userID, title, order, completed });

      await ensureConnected();

      const id = await command(`INCR ${keys.counter}`, () => connection.increment(keys.counter));
      const documentID = String(id);

      try {
        await command(`HSET ${keys.item(documentID)}`, () => connection.hashSetMany(keys.item(documentID), fields));
      } catch (error) {
        throw new CreationError(`Could not write todo "${documentID}"`, { cause: error });
      }

      try {
        await command(`ZADD ${keys.set(userID)}`, () => connection.sortedSetAdd(keys.set(userID), order, documentID));
      } catch (error) {
        logger.error(`Todo "${documentID}" was written but not indexed for user "${userID}"`, error);
        throw new CreationError(`Could not index todo "${documentID}" for user "${userID}"`, { cause: error });
      }

      return { documentID, userID, title, order, completed };
    },

    async update(documentID: string, changes: TodoChanges = {}): Promise<TodoItem> {
      const userID = resolveUserID(changes.userID);
      const { title, order, completed } = changes;

      if (title !== undefined && (typeof title !== "string" || title === "")) {
        throw new ValidationError("Title must be a non-empty string");
      }
      const fields = encodeTodoChanges({ title, order, completed });
      checkDocumentID(documentID);

      await ensureConnected();

      // Ownership is checked before writing so an unknown ID never gets a partial record
      await lookup(documentID, userID);

      if (Object.keys(fields).length > 0) {
        await command(`HSET ${keys.item(documentID)}`, () => connection.hashSetMany(keys.item(documentID), fields));
      }

      if (order !== undefined) {
        await command(`ZADD ${keys.set(userID)}`, () => connection.sortedSetAdd(keys.set(userID), order, documentID));
      }

      return lookup(documentID, userID);
    },

    async delete(documentID: string, userID?: string | null): Promise<void> {
      const user = resolveUserID(userID);
      checkDocumentID(documentID);
      await ensureConnected();

      const removed = await command(`ZREM ${keys.set(user)}`, () =>
        connection.sortedSetRemove(keys.set(user), documentID),
      );
      if (removed === 0) {
        throw new NotFoundError(`Todo "${documentID}" not found for user "${user}"`);
      }

      try {
        await command(`DEL ${keys.item(documentID)}`, () => connection.keyDelete(keys.item(documentID)));
      } catch (error) {
        logger.error(`Todo "${documentID}" was unindexed but its record remains`, error);
        throw new StoreError(`Could not delete record of todo "${documentID}"`, { cause: error });
      }
    },

    async close(): Promise<void> {
      ready = false;
      await connection.close();
    },
  };
}
