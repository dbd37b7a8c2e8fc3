/**
 * A single todo item as seen by callers of the store.
 *
 * @example
 * ```typescript
 * const item: TodoItem = {
 *   documentID: "1",
 *   userID: "u1",
 *   title: "buy milk",
 *   order: 1,
 *   completed: false,
 * };
 * ```
 */
export interface TodoItem {
  /**
   * Store-assigned identifier, minted by the ID counter. Never changes.
   */
  readonly documentID: string;

  /**
   * Owner of the item. `"default"` when the caller gave none.
   */
  userID: string;

  title: string;

  /**
   * Display rank, only meaningful among the items of one user.
   */
  order: number;

  completed: boolean;
}

/**
 * Input for {@link TodoStore.add}.
 */
export interface NewTodo {
  userID?: string | null;
  title: string;
  /** @defaults 0 */
  order?: number;
  /** @defaults false */
  completed?: boolean;
}

/**
 * Input for {@link TodoStore.update}. Fields left out are not touched.
 */
export interface TodoChanges {
  userID?: string | null;
  title?: string;
  order?: number;
  completed?: boolean;
}

/**
 * Per-user todo collection persisted in a key-value store.
 *
 * Every operation takes an optional user identifier; absent identifiers
 * resolve to `"default"`.
 *
 * @example
 * ```typescript
 * const store = createTodoStore({ connection: createMemoryConnection() });
 * const item = await store.add({ userID: "u1", title: "buy milk", order: 1 });
 * await store.update(item.documentID, { userID: "u1", completed: true });
 * console.log(await store.count("u1")); // 1
 * await store.close();
 * ```
 */
export interface TodoStore {
  /**
   * Number of items owned by the user.
   *
   * @throws {StoreError} If the cardinality query fails
   */
  count(userID?: string | null): Promise<number>;

  /**
   * Removes every item of one user. The ID counter is left as it is.
   *
   * @throws {StoreError} If listing fails, or with `errors` set when some records could not be deleted
   */
  clear(userID?: string | null): Promise<void>;

  /**
   * Flushes the whole store, counter included.
   *
   * @throws {StoreError} If the store does not confirm the flush
   */
  clearAll(): Promise<void>;

  /**
   * All items of a user, ascending by their indexed order.
   * Fails as a whole when any single item cannot be read.
   */
  getAll(userID?: string | null): Promise<TodoItem[]>;

  /**
   * @throws {NotFoundError} If no record exists for the ID
   * @throws {AuthorizationError} If the record belongs to another user
   * @throws {ParseError} If the record is incomplete or malformed
   */
  get(documentID: string, userID?: string | null): Promise<TodoItem>;

  /**
   * @throws {ValidationError} If the title is empty or the order is not an integer
   * @throws {CreationError} If the record or its index entry cannot be written
   */
  add(todo: NewTodo): Promise<TodoItem>;

  /**
   * Writes the given fields and returns the item as stored afterwards.
   * Changing `order` re-scores the item in the user's index as well.
   */
  update(documentID: string, changes?: TodoChanges): Promise<TodoItem>;

  /**
   * @throws {NotFoundError} If the user's index does not contain the ID
   * @throws {StoreError} If the record could not be deleted after its index entry was removed
   */
  delete(documentID: string, userID?: string | null): Promise<void>;

  /**
   * Releases the connection. The next operation reconnects.
   */
  close(): Promise<void>;
}

/**
 * The command surface the todo store needs from a key-value store.
 * Each method maps to one store command and rejects when the store does.
 */
export interface StoreConnection {
  /**
   * Whether the connection is open and ready for commands.
   */
  readonly connected: boolean;

  connect(host: string, port: number): Promise<void>;
  authenticate(password: string): Promise<void>;

  /** `INCR`: returns the incremented value. */
  increment(key: string): Promise<number>;

  /** `HSET` with several field/value pairs. */
  hashSetMany(key: string, fields: Record<string, string>): Promise<void>;

  /** `HMGET`: one value per requested field, `null` where absent. */
  hashGetMany(key: string, fields: readonly string[]): Promise<(string | null)[]>;

  /** `ZADD`: returns the number of members newly added. */
  sortedSetAdd(key: string, score: number, member: string): Promise<number>;

  /** `ZRANGE` by index, inclusive on both ends; negative indexes count from the end. */
  sortedSetRange(key: string, start: number, stop: number): Promise<string[]>;

  /** `ZREM`: returns the number of members removed. */
  sortedSetRemove(key: string, member: string): Promise<number>;

  /** `ZCARD` */
  sortedSetCardinality(key: string): Promise<number>;

  /** `DEL`: returns the number of keys removed. */
  keyDelete(key: string): Promise<number>;

  /** `FLUSHALL`: returns the store's status reply. */
  flushAll(): Promise<string>;

  close(): Promise<void>;
}

/**
 * Console-shaped logger accepted by the store and its connections.
 */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Base class of every error the store raises.
 */
export class TodoStoreError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TodoStoreError";
  }
}

/**
 * The store could not be reached, or it rejected the credentials.
 */
export class ConnectionError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/**
 * A store command failed or answered with something other than expected.
 *
 * @example
 * ```typescript
 * try {
 *   await store.clear("u1");
 * } catch (error) {
 *   if (error instanceof StoreError) {
 *     for (const failure of error.errors) console.error(failure);
 *   }
 * }
 * ```
 */
export class StoreError extends TodoStoreError {
  /**
   * Individual failures when an operation collected several.
   */
  readonly errors: readonly unknown[];

  constructor(message?: string, options?: ErrorOptions & { errors?: readonly unknown[] }) {
    super(message, options);
    this.name = "StoreError";
    this.errors = options?.errors ?? [];
  }
}

/**
 * A stored value could not be decoded into its field type.
 */
export class ParseError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParseError";
  }
}

/**
 * The caller asked for an item owned by another user.
 */
export class AuthorizationError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthorizationError";
  }
}

/**
 * The targeted document does not exist.
 */
export class NotFoundError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/**
 * Writing a new item failed after its ID was minted.
 */
export class CreationError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CreationError";
  }
}

/**
 * A store command did not answer within the configured time.
 */
export class TimeoutError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TimeoutError";
  }
}

/**
 * Caller input was rejected before any command was issued.
 */
export class ValidationError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends TodoStoreError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
