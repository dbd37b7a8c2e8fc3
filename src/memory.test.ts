import { beforeEach, describe, expect, it } from "vitest";
import { createMemoryConnection } from "./memory.js";

describe("createMemoryConnection", () => {
  let connection = createMemoryConnection();

  beforeEach(async () => {
    // Create a fresh connection for each test
    connection = createMemoryConnection({ password: "test-secret" });
    await connection.connect("localhost", 6379);
    await connection.authenticate("test-secret");
  });

  describe("lifecycle", () => {
    it("should report whether it is connected", async () => {
      expect(connection.connected).toBe(true);
      await connection.close();
      expect(connection.connected).toBe(false);
    });

    it("should reject commands once closed", async () => {
      await connection.close();
      await expect(connection.increment("todo:id")).rejects.toThrow("Connection is closed");
    });

    it("should keep data across reconnects", async () => {
      await connection.increment("todo:id");
      await connection.close();
      await connection.connect("localhost", 6379);
      await connection.authenticate("test-secret");
      expect(await connection.increment("todo:id")).toBe(2);
    });

    it("should accept the configured password only", async () => {
      await expect(connection.authenticate("test-secret")).resolves.toBeUndefined();
      await expect(connection.authenticate("wrong")).rejects.toThrow(/^WRONGPASS/);
    });

    it("should require authentication when a password is configured", async () => {
      const guarded = createMemoryConnection({ password: "test-secret" });
      await guarded.connect("localhost", 6379);

      await expect(guarded.sortedSetCardinality("todoset:u1")).rejects.toThrow("NOAUTH Authentication required.");
      await guarded.authenticate("test-secret");
      await expect(guarded.sortedSetCardinality("todoset:u1")).resolves.toBe(0);
    });

    it("should forget authentication on reconnect", async () => {
      await connection.close();
      await connection.connect("localhost", 6379);

      await expect(connection.increment("todo:id")).rejects.toThrow(/^NOAUTH/);
    });

    it("should serve commands without authentication when no password is configured", async () => {
      const open = createMemoryConnection();
      await open.connect("localhost", 6379);
      await expect(open.increment("todo:id")).resolves.toBe(1);
    });

    it("should reject authentication when no password is configured", async () => {
      const open = createMemoryConnection();
      await open.connect("localhost", 6379);
      await expect(open.authenticate("test-secret")).rejects.toThrow(/without any password configured/);
    });
  });

  describe("increment", () => {
    it("should count up from one", async () => {
      expect(await connection.increment("todo:id")).toBe(1);
      expect(await connection.increment("todo:id")).toBe(2);
      expect(await connection.increment("other")).toBe(1);
    });

    it("should refuse keys of another type", async () => {
      await connection.hashSetMany("todo:id", { title: "x" });
      await expect(connection.increment("todo:id")).rejects.toThrow(/^WRONGTYPE/);
    });
  });

  describe("hashes", () => {
    it("should return values in the requested field order", async () => {
      await connection.hashSetMany("todo:1", { title: "buy milk", order: "1" });
      expect(await connection.hashGetMany("todo:1", ["order", "missing", "title"])).toEqual(["1", null, "buy milk"]);
    });

    it("should merge fields on later writes", async () => {
      await connection.hashSetMany("todo:1", { title: "buy milk", completed: "false" });
      await connection.hashSetMany("todo:1", { completed: "true" });
      expect(await connection.hashGetMany("todo:1", ["title", "completed"])).toEqual(["buy milk", "true"]);
    });

    it("should return nulls for a missing key", async () => {
      expect(await connection.hashGetMany("todo:404", ["title", "order"])).toEqual([null, null]);
    });

    it("should reject a write without fields", async () => {
      await expect(connection.hashSetMany("todo:1", {})).rejects.toThrow(/wrong number of arguments/);
    });
  });

  describe("sorted sets", () => {
    it("should order members by score, then by member", async () => {
      await connection.sortedSetAdd("todoset:u1", 2, "a");
      await connection.sortedSetAdd("todoset:u1", 1, "c");
      await connection.sortedSetAdd("todoset:u1", 1, "b");
      expect(await connection.sortedSetRange("todoset:u1", 0, -1)).toEqual(["b", "c", "a"]);
    });

    it("should report only newly added members", async () => {
      expect(await connection.sortedSetAdd("todoset:u1", 1, "a")).toBe(1);
      expect(await connection.sortedSetAdd("todoset:u1", 5, "a")).toBe(0);
      expect(await connection.sortedSetRange("todoset:u1", 0, -1)).toEqual(["a"]);
      expect(await connection.sortedSetCardinality("todoset:u1")).toBe(1);
    });

    it("should slice ranges by index", async () => {
      for (const [score, member] of [
        [1, "a"],
        [2, "b"],
        [3, "c"],
        [4, "d"],
      ] as const) {
        await connection.sortedSetAdd("s", score, member);
      }
      expect(await connection.sortedSetRange("s", 1, 2)).toEqual(["b", "c"]);
      expect(await connection.sortedSetRange("s", -2, -1)).toEqual(["c", "d"]);
      expect(await connection.sortedSetRange("s", 2, 10)).toEqual(["c", "d"]);
      expect(await connection.sortedSetRange("s", 3, 1)).toEqual([]);
      expect(await connection.sortedSetRange("missing", 0, -1)).toEqual([]);
    });

    it("should remove single members", async () => {
      await connection.sortedSetAdd("s", 1, "a");
      expect(await connection.sortedSetRemove("s", "a")).toBe(1);
      expect(await connection.sortedSetRemove("s", "a")).toBe(0);
      expect(connection.keys()).toEqual([]);
    });
  });

  describe("keys", () => {
    it("should delete keys of any type", async () => {
      await connection.increment("todo:id");
      await connection.hashSetMany("todo:1", { title: "x" });
      expect(await connection.keyDelete("todo:1")).toBe(1);
      expect(await connection.keyDelete("todo:1")).toBe(0);
      expect(connection.keys()).toEqual(["todo:id"]);
    });

    it("should flush everything", async () => {
      await connection.increment("todo:id");
      await connection.sortedSetAdd("todoset:u1", 1, "1");
      expect(await connection.flushAll()).toBe("OK");
      expect(connection.keys()).toEqual([]);
    });
  });
});
