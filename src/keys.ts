/**
 * Key prefixes for the records the todo store writes.
 */
export interface KeyScheme {
  /**
   * Prefix of each item's hash record.
   * @defaults `"todo:"`
   */
  item?: string;

  /**
   * Prefix of each user's sorted set.
   * @defaults `"todoset:"`
   */
  set?: string;

  /**
   * Key of the counter that mints document IDs.
   * @defaults `"todo:id"`
   */
  counter?: string;
}

export interface Keys {
  item(documentID: string): string;
  set(userID: string): string;
  readonly counter: string;
}

/**
 * Builds the key functions for a scheme, filling in the defaults.
 *
 * @example
 * ```typescript
 * const keys = createKeys();
 * keys.item("1"); // "todo:1"
 * keys.set("u1"); // "todoset:u1"
 * keys.counter; // "todo:id"
 * ```
 */
export function createKeys(scheme: KeyScheme = {}): Keys {
  const { item = "todo:", set = "todoset:", counter = "todo:id" } = scheme;

  return {
    item: (documentID) => `${item}${documentID}`,
    set: (userID) => `${set}${userID}`,
    counter,
  };
}
