import { createClient } from "redis";
import type { Logger, StoreConnection } from "./types.js";

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis connection with access to the underlying client once connected.
 */
export interface RedisConnection extends StoreConnection {
  /**
   * The node-redis client, `undefined` until {@link StoreConnection.connect} succeeds.
   */
  readonly client: RedisClient | undefined;
}

/**
 * Configuration options for a Redis connection.
 */
export interface RedisConnectionOptions {
  /**
   * Username sent with the password on authentication.
   * @defaults the server's `default` user
   */
  username?: string;

  /**
   * Logical database selected on connect.
   */
  database?: number;

  /**
   * @defaults console
   */
  logger?: Logger;
}

/**
 * Creates a {@link StoreConnection} backed by the `redis` client.
 *
 * The client is created on `connect` with reconnection turned off, so an
 * unreachable server rejects instead of retrying forever; a dropped
 * connection is reported through `connected` and reopened by the next
 * `connect`.
 *
 * @example
 * ```typescript
 * const connection = createRedisConnection();
 * await connection.connect("localhost", 6379);
 * await connection.authenticate("test-secret");
 * const id = await connection.increment("todo:id");
 * await connection.close();
 * ```
 */
export function createRedisConnection(options: RedisConnectionOptions = {}): RedisConnection {
  const { username, database, logger = console } = options;
  let client: RedisClient | undefined;
  // Bumped by every connect and close, so a connect that lost the race discards its client
  let generation = 0;

  const ready = (): RedisClient => {
    if (!client?.isReady) {
      throw new Error("Redis client is not connected");
    }
    return client;
  };

  return {
    /**
     * The node-redis client, once connected.
     */
    get client(): RedisClient | undefined {
      return client;
    },

    /**
     * Whether the client is open and ready for commands.
     * @type {boolean}
     */
    get connected(): boolean {
      return client?.isReady ?? false;
    },

    /**
     * Opens a new client, closing any previous one first.
     *
     * @param {string} host - Redis host name
     * @param {number} port - Redis port
     * @returns {Promise<void>} Promise that resolves once the client is ready
     * @throws {Error} If the server is unreachable, or `close` was called while connecting
     */
    async connect(host: string, port: number): Promise<void> {
      const attempt = ++generation;
      const previous = client;
      client = undefined;
      if (previous?.isOpen) {
        await previous.close();
      }

      const next = createClient({
        socket: { host, port, reconnectStrategy: false },
        database,
      }).on("error", (err) => logger.error("Redis Client Error", err));

      await next.connect();

      if (attempt !== generation) {
        await next.close();
        throw new Error(`Connection to ${host}:${port} was closed while connecting`);
      }

      client = next;
      logger.debug(`Connected to Redis at ${host}:${port}`);
    },

    /**
     * Sends `AUTH` with the configured username, if any.
     *
     * @param {string} password - Password to authenticate with
     * @returns {Promise<void>} Promise that resolves when the server accepts the credentials
     */
    async authenticate(password: string): Promise<void> {
      await ready().auth(username === undefined ? { password } : { username, password });
    },

    /**
     * Increments a counter.
     *
     * @param {string} key - The counter key
     * @returns {Promise<number>} Promise that resolves to the incremented value
     */
    async increment(key: string): Promise<number> {
      return Number(await ready().incr(key));
    },

    /**
     * Writes several hash fields at once.
     *
     * @param {string} key - The hash key
     * @param {Record<string, string>} fields - Field/value pairs to write
     * @returns {Promise<void>} Promise that resolves when the fields are written
     */
    async hashSetMany(key: string, fields: Record<string, string>): Promise<void> {
      await ready().hSet(key, fields);
    },

    /**
     * Reads several hash fields at once.
     *
     * @param {string} key - The hash key
     * @param {readonly string[]} fields - Fields to read
     * @returns {Promise<(string | null)[]>} Promise that resolves to one value per field, `null` where absent
     */
    async hashGetMany(key: string, fields: readonly string[]): Promise<(string | null)[]> {
      const values = await ready().hmGet(key, [...fields]);
      return values.map((value) => (value === null ? null : String(value)));
    },

    /**
     * Adds a member to a sorted set, or updates its score.
     *
     * @param {string} key - The sorted set key
     * @param {number} score - The member's score
     * @param {string} member - The member to add
     * @returns {Promise<number>} Promise that resolves to `1` if the member is new, `0` otherwise
     */
    async sortedSetAdd(key: string, score: number, member: string): Promise<number> {
      return Number(await ready().zAdd(key, { score, value: member }));
    },

    /**
     * Lists sorted set members by index, ascending by score.
     *
     * @param {string} key - The sorted set key
     * @param {number} start - First index, negative counts from the end
     * @param {number} stop - Last index (inclusive), negative counts from the end
     * @returns {Promise<string[]>} Promise that resolves to the members in range
     */
    async sortedSetRange(key: string, start: number, stop: number): Promise<string[]> {
      const members = await ready().zRange(key, start, stop);
      return members.map((member) => String(member));
    },

    /**
     * Removes a member from a sorted set.
     *
     * @param {string} key - The sorted set key
     * @param {string} member - The member to remove
     * @returns {Promise<number>} Promise that resolves to `1` if the member was removed, `0` if absent
     */
    async sortedSetRemove(key: string, member: string): Promise<number> {
      return Number(await ready().zRem(key, member));
    },

    /**
     * Counts the members of a sorted set.
     *
     * @param {string} key - The sorted set key
     * @returns {Promise<number>} Promise that resolves to the cardinality, `0` for a missing key
     */
    async sortedSetCardinality(key: string): Promise<number> {
      return Number(await ready().zCard(key));
    },

    /**
     * Deletes a key of any type.
     *
     * @param {string} key - The key to delete
     * @returns {Promise<number>} Promise that resolves to `1` if the key existed, `0` otherwise
     */
    async keyDelete(key: string): Promise<number> {
      return Number(await ready().del(key));
    },

    /**
     * Removes every key of every database.
     *
     * @returns {Promise<string>} Promise that resolves to the server's status reply
     */
    async flushAll(): Promise<string> {
      return String(await ready().flushAll());
    },

    /**
     * Closes the Redis connection. Safe to call when already closed.
     */
    async close(): Promise<void> {
      generation++;
      const current = client;
      client = undefined;
      if (current?.isOpen) {
        await current.close();
      }
    },
  };
}
