import {
  DestroyedTableError,
  HashIndexOutOfRangeError,
  InvalidArgumentError,
} from "./errors.js";
import { HashFunction } from "./hash-functions.js";
import { debug } from "./logger.js";

/**
 * One key/value record in a bucket chain. Each entry owns its successor.
 */
export type Entry = {
  readonly key: string;
  value: number;
  next?: Entry;
};

/** Head of a chain; `undefined` when the bucket is empty. */
export type Bucket = Entry | undefined;

/**
 * Separate-chaining hash table from string keys to integer values.
 *
 * The table never picks a hash function itself: `add`, `remove` and the
 * lookups take one per call, so the same table can be probed with
 * different strategies. The bucket count is fixed at construction.
 *
 * Inserting a key that is already present does not replace it. The new
 * entry goes to the head of its chain and shadows the older one until it
 * is removed.
 */
export class HashTable {
  private buckets: Bucket[] | undefined;
  private readonly bucketCount: number;
  private count = 0;

  /**
   * @param size - Number of buckets. Must be a positive integer.
   */
  constructor(size: number) {
    if (!Number.isSafeInteger(size) || size <= 0) {
      throw new InvalidArgumentError(
        "size",
        size,
        "table size must be a positive integer"
      );
    }

    this.bucketCount = size;
    this.buckets = new Array<Bucket>(size).fill(undefined);
    debug("created hash table", { size });
  }

  get size() {
    return this.bucketCount;
  }

  /** Number of live entries, duplicates included. */
  get total() {
    return this.count;
  }

  get loadFactor() {
    return this.count / this.bucketCount;
  }

  get isDestroyed() {
    return this.buckets === undefined;
  }

  /**
   * Insert `key` at the head of its bucket. Never checks for an existing
   * entry with the same key.
   */
  add(hash: HashFunction, key: string, value: number) {
    const buckets = this.live("add");
    if (!Number.isSafeInteger(value)) {
      throw new InvalidArgumentError("value", value, "value must be an integer");
    }
    const index = this.indexOf(hash, key);

    this.link(buckets, index, { key, value });
  }

  /**
   * Remove the first entry in chain order whose key is `key`, i.e. the
   * most recently added one.
   * @returns Whether an entry was removed.
   */
  remove(hash: HashFunction, key: string): boolean {
    const buckets = this.live("remove");
    const index = this.indexOf(hash, key);

    let prev: Entry | undefined;
    let current = buckets[index];
    while (current && current.key !== key) {
      prev = current;
      current = current.next;
    }

    if (!current) {
      debug("key not found", { key, index });
      return false;
    }

    this.unlink(buckets, index, prev, current);
    debug("removed key", { key, index });
    return true;
  }

  /**
   * Value of the entry a removal would hit, or `undefined` if absent.
   */
  get(hash: HashFunction, key: string): number | undefined {
    return this.find(hash, key)?.value;
  }

  has(hash: HashFunction, key: string): boolean {
    return this.find(hash, key) !== undefined;
  }

  /**
   * Drop every entry. The table keeps its size and stays usable.
   */
  reset() {
    const buckets = this.live("reset");

    for (let i = 0; i < buckets.length; i++) {
      for (let head = buckets[i]; head; head = buckets[i]) {
        this.unlink(buckets, i, undefined, head);
      }
    }
    debug("reset hash table", { size: this.bucketCount });
  }

  /**
   * Release all entries and the bucket array. Every later call on this
   * table, including another `destroy`, throws `DestroyedTableError`.
   */
  destroy() {
    this.live("destroy");
    this.reset();
    this.buckets = undefined;
    debug("destroyed hash table", { size: this.bucketCount });
  }

  /**
   * Sum over buckets of (chain length - 1) for non-empty chains.
   */
  collisions(): number {
    return this.chainLengths().reduce(
      (sum, length) => sum + Math.max(length - 1, 0),
      0
    );
  }

  chainLengths(): number[] {
    return this.live("count chains").map((head) => {
      let length = 0;
      for (let e = head; e; e = e.next) length++;
      return length;
    });
  }

  /**
   * Snapshot of the chain at `index`, head to tail.
   */
  bucket(index: number): { key: string; value: number }[] {
    const buckets = this.live("read bucket");
    this.checkIndex(index);

    const out: { key: string; value: number }[] = [];
    for (let e = buckets[index]; e; e = e.next) {
      out.push({ key: e.key, value: e.value });
    }
    return out;
  }

  /**
   * Every `[key, value]` pair, bucket by bucket, head to tail. Removing
   * the pair just yielded does not end the walk.
   */
  entries(): IterableIterator<[string, number]> {
    const buckets = this.live("iterate");

    function* walk(): Generator<[string, number]> {
      for (const head of buckets) {
        for (let e = head; e; e = e.next) {
          yield [e.key, e.value];
        }
      }
    }

    return walk();
  }

  /**
   * Human-readable dump of the whole table:
   *
   * ```
   * Hash table, size=2, total=1
   * array[0]-|
   * array[1]->(key=a,value=1)-|
   * ```
   */
  display(): string {
    const buckets = this.live("display");
    const lines = [`Hash table, size=${this.bucketCount}, total=${this.count}`];

    buckets.forEach((head, i) => {
      let line = `array[${i}]`;
      for (let e = head; e; e = e.next) {
        line += `->(key=${e.key},value=${e.value})`;
      }
      lines.push(`${line}-|`);
    });

    return lines.join("\n");
  }

  private find(hash: HashFunction, key: string): Entry | undefined {
    const buckets = this.live("look up");
    let e = buckets[this.indexOf(hash, key)];
    while (e && e.key !== key) e = e.next;
    return e;
  }

  private live(operation: string): Bucket[] {
    if (!this.buckets) throw new DestroyedTableError(operation);
    return this.buckets;
  }

  private indexOf(hash: HashFunction, key: string) {
    const index = hash(this.bucketCount, key);
    this.checkIndex(index);
    return index;
  }

  private checkIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.bucketCount) {
      throw new HashIndexOutOfRangeError(index, this.bucketCount);
    }
  }

  // link and unlink are the only places that change the entry count

  private link(buckets: Bucket[], index: number, entry: Entry) {
    entry.next = buckets[index];
    buckets[index] = entry;
    this.count++;
  }

  private unlink(
    buckets: Bucket[],
    index: number,
    prev: Entry | undefined,
    entry: Entry
  ) {
    if (prev) {
      prev.next = entry.next;
    } else {
      buckets[index] = entry.next;
    }
    this.count--;
  }
}

/**
 * Create a table with `size` empty buckets.
 */
export function createHashTable(size: number) {
  return new HashTable(size);
}
