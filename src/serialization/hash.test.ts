import { describe, expect, it } from "vitest";
import { NotFoundError, ParseError, ValidationError } from "../types.js";
import {
  decodeCompleted,
  decodeOrder,
  decodeTodoHash,
  encodeCompleted,
  encodeOrder,
  encodeTodoChanges,
  encodeTodoHash,
  TODO_FIELDS,
} from "./hash.js";

describe("hash serialization", () => {
  describe("order", () => {
    it("should encode integers as decimal strings", () => {
      expect(encodeOrder(0)).toBe("0");
      expect(encodeOrder(42)).toBe("42");
      expect(encodeOrder(-7)).toBe("-7");
    });

    it("should reject non-integer orders", () => {
      expect(() => encodeOrder(1.5)).toThrow(ValidationError);
      expect(() => encodeOrder(Number.NaN)).toThrow("Order must be an integer, got NaN");
    });

    it("should decode decimal strings", () => {
      expect(decodeOrder("12")).toBe(12);
      expect(decodeOrder("-3")).toBe(-3);
    });

    it("should throw ParseError for values that are not integers", () => {
      expect(() => decodeOrder("")).toThrow(ParseError);
      expect(() => decodeOrder("1.5")).toThrow(ParseError);
      expect(() => decodeOrder("abc")).toThrow('Could not parse order "abc" as an integer');
      expect(() => decodeOrder("99999999999999999999")).toThrow(ParseError);
    });
  });

  describe("completed", () => {
    it("should encode booleans as literal strings", () => {
      expect(encodeCompleted(true)).toBe("true");
      expect(encodeCompleted(false)).toBe("false");
    });

    it("should decode only the literal strings", () => {
      expect(decodeCompleted("true")).toBe(true);
      expect(decodeCompleted("false")).toBe(false);
      expect(() => decodeCompleted("TRUE")).toThrow(ParseError);
      expect(() => decodeCompleted("1")).toThrow('Could not parse completed "1" as a boolean');
    });
  });

  describe("encodeTodoHash", () => {
    it("should project every field to a string", () => {
      expect(encodeTodoHash({ userID: "u1", title: "buy milk", order: 1, completed: false })).toEqual({
        title: "buy milk",
        order: "1",
        completed: "false",
        userID: "u1",
      });
    });
  });

  describe("encodeTodoChanges", () => {
    it("should encode only the fields given", () => {
      expect(encodeTodoChanges({ completed: true })).toEqual({ completed: "true" });
      expect(encodeTodoChanges({ title: "X", order: 3 })).toEqual({ title: "X", order: "3" });
    });

    it("should return no fields when nothing changes", () => {
      expect(encodeTodoChanges({})).toEqual({});
    });
  });

  describe("decodeTodoHash", () => {
    it("should read values in field order", () => {
      expect(TODO_FIELDS).toEqual(["title", "order", "completed", "userID"]);
      expect(decodeTodoHash("1", ["buy milk", "1", "false", "u1"])).toEqual({
        documentID: "1",
        userID: "u1",
        title: "buy milk",
        order: 1,
        completed: false,
      });
    });

    it("should throw NotFoundError when every field is absent", () => {
      expect(() => decodeTodoHash("9", [null, null, null, null])).toThrow(NotFoundError);
      expect(() => decodeTodoHash("9", [null, null, null, null])).toThrow('Todo "9" not found');
    });

    it("should throw ParseError naming a missing field", () => {
      expect(() => decodeTodoHash("1", ["buy milk", "1", "false", null])).toThrow(ParseError);
      expect(() => decodeTodoHash("1", ["buy milk", "1", "false", null])).toThrow(
        'Todo "1" is missing field "userID"',
      );
    });

    it("should throw ParseError for a malformed order", () => {
      expect(() => decodeTodoHash("1", ["buy milk", "first", "false", "u1"])).toThrow(
        'Could not parse order "first" as an integer',
      );
    });
  });
});
