/**
 * Base class for every error thrown by this package.
 */
export class ChainTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChainTableError";
  }
}

/**
 * Thrown when an argument is outside the domain an operation accepts,
 * e.g. a table size that is not a positive integer.
 */
export class InvalidArgumentError extends ChainTableError {
  readonly argument: string;
  readonly value: unknown;

  constructor(argument: string, value: unknown, reason: string) {
    super(`Invalid ${argument} ${JSON.stringify(value)}: ${reason}`);
    this.name = "InvalidArgumentError";
    this.argument = argument;
    this.value = value;
  }
}

/**
 * Thrown by any operation on a table after `destroy()`.
 */
export class DestroyedTableError extends ChainTableError {
  constructor(operation: string) {
    super(`Cannot ${operation}: hash table has been destroyed`);
    this.name = "DestroyedTableError";
  }
}

/**
 * Thrown when a hash function (or a caller) produces a bucket index
 * that does not address a bucket of the table.
 */
export class HashIndexOutOfRangeError extends ChainTableError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`Bucket index ${index} is out of range for table of size ${size}`);
    this.name = "HashIndexOutOfRangeError";
    this.index = index;
    this.size = size;
  }
}
