export { HashTable, createHashTable } from "./hash-table.js";
export type { Entry, Bucket } from "./hash-table.js";

export {
  GOLDEN_RATIO_FRACTION,
  hashNaive,
  hashImproved,
  hashDjb2,
  hashFunctions,
  isHashFunctionName,
  resolveHashFunction,
} from "./hash-functions.js";
export type { HashFunction, HashFunctionName } from "./hash-functions.js";

export {
  ChainTableError,
  InvalidArgumentError,
  DestroyedTableError,
  HashIndexOutOfRangeError,
} from "./errors.js";

export {
  debug,
  info,
  warn,
  error,
  onLog,
  setLogLevel,
  getLogLevel,
} from "./logger.js";
export type { LogLevel, LogEntry, LogCallback } from "./logger.js";
