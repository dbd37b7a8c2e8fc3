export * from "./config.js";
export * from "./keys.js";
export * from "./memory.js";
export * from "./redis.js";
export * from "./serialization/hash.js";
export * from "./store.js";
export * from "./timeout.js";
export * from "./types.js";
