import { NotFoundError, ParseError, type TodoItem, ValidationError } from "../types.js";

/**
 * Hash fields of a stored item, in the order {@link decodeTodoHash} expects them.
 */
export const TODO_FIELDS = ["title", "order", "completed", "userID"] as const;

export type TodoField = (typeof TODO_FIELDS)[number];

const INTEGER = /^-?\d+$/;

/**
 * Encodes an order as its decimal string form.
 *
 * @throws {ValidationError} If the order is not a safe integer
 */
export function encodeOrder(order: number): string {
  if (!Number.isSafeInteger(order)) {
    throw new ValidationError(`Order must be an integer, got ${order}`);
  }
  return String(order);
}

/**
 * @throws {ParseError} If the value is not a decimal integer
 */
export function decodeOrder(raw: string): number {
  const order = INTEGER.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(order)) {
    throw new ParseError(`Could not parse order "${raw}" as an integer`);
  }
  return order;
}

export function encodeCompleted(completed: boolean): string {
  return completed ? "true" : "false";
}

/**
 * @throws {ParseError} Unless the value is exactly `"true"` or `"false"`
 */
export function decodeCompleted(raw: string): boolean {
  switch (raw) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      throw new ParseError(`Could not parse completed "${raw}" as a boolean`);
  }
}

/**
 * Projects an item onto the field/value pairs of its hash record.
 * The document ID is the record's key and is not stored as a field.
 *
 * @example
 * ```typescript
 * encodeTodoHash({ title: "buy milk", order: 1, completed: false, userID: "u1" });
 * // { title: "buy milk", order: "1", completed: "false", userID: "u1" }
 * ```
 */
export function encodeTodoHash(item: Omit<TodoItem, "documentID">): Record<TodoField, string> {
  return {
    title: item.title,
    order: encodeOrder(item.order),
    completed: encodeCompleted(item.completed),
    userID: item.userID,
  };
}

/**
 * Encodes only the fields present in `changes`, for partial updates.
 */
export function encodeTodoChanges(
  changes: Partial<Pick<TodoItem, "title" | "order" | "completed">>,
): Record<string, string> {
  const fields: Record<string, string> = {};
  if (changes.title !== undefined) fields.title = changes.title;
  if (changes.order !== undefined) fields.order = encodeOrder(changes.order);
  if (changes.completed !== undefined) fields.completed = encodeCompleted(changes.completed);
  return fields;
}

/**
 * Rebuilds an item from an `HMGET` reply over {@link TODO_FIELDS}.
 *
 * @param documentID - ID of the record the values were read from
 * @param values - One value per field of {@link TODO_FIELDS}, `null` where absent
 * @throws {NotFoundError} If every field is absent, meaning there is no record
 * @throws {ParseError} If some field is absent or cannot be decoded
 */
export function decodeTodoHash(documentID: string, values: readonly (string | null)[]): TodoItem {
  if (values.every((value) => value === null)) {
    throw new NotFoundError(`Todo "${documentID}" not found`);
  }

  const field = (name: TodoField): string => {
    const value = values[TODO_FIELDS.indexOf(name)];
    if (value === null || value === undefined) {
      throw new ParseError(`Todo "${documentID}" is missing field "${name}"`);
    }
    return value;
  };

  return {
    documentID,
    userID: field("userID"),
    title: field("title"),
    order: decodeOrder(field("order")),
    completed: decodeCompleted(field("completed")),
  };
}
