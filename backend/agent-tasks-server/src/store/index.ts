export { RESULT_KEY_PREFIX, resultStorageKey } from "./ResultStore";
export type { ResultStore } from "./ResultStore";
export { SqliteResultStore } from "./SqliteResultStore";
export type { SqliteResultStoreOptions } from "./SqliteResultStore";
export { MemoryResultStore } from "./MemoryResultStore";
