import { InvalidArgumentError } from "./errors.js";
import { HashFunctionName, isHashFunctionName } from "./hash-functions.js";

export type HashSelection = HashFunctionName | "all";

export type RunConfig = {
  size: number;
  hash: HashSelection;
  keys: { key: string; value: number }[];
};

export const defaultConfig = {
  size: 7,
  hash: "improved",
} as const satisfies Omit<RunConfig, "keys">;

export type Env = Record<string, string | undefined>;

export function parseSize(raw: string): number {
  const size = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new InvalidArgumentError("size", raw, "expected a positive integer");
  }
  return size;
}

export function parseHashSelection(raw: string): HashSelection {
  if (raw === "all" || isHashFunctionName(raw)) return raw;
  throw new InvalidArgumentError(
    "hash function",
    raw,
    "expected naive, improved, djb2 or all"
  );
}

/**
 * Parse `key` or `key=value`. Without a value the key's position is used.
 */
export function parseKeyArg(raw: string, position: number) {
  const eq = raw.lastIndexOf("=");
  if (eq === -1) return { key: raw, value: position };

  const valueText = raw.slice(eq + 1);
  const value = /^-?\d+$/.test(valueText) ? Number(valueText) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError("value", valueText, "expected an integer");
  }
  return { key: raw.slice(0, eq), value };
}

/**
 * Build a run configuration. Flags win over `CHAINTABLE_SIZE` and
 * `CHAINTABLE_HASH`, which win over the defaults.
 */
export function resolveConfig(
  flags: { size?: string; hash?: string; keys: string[] },
  env: Env = process.env
): RunConfig {
  const sizeText = flags.size ?? env.CHAINTABLE_SIZE;
  const hashText = flags.hash ?? env.CHAINTABLE_HASH;

  return {
    size: sizeText === undefined ? defaultConfig.size : parseSize(sizeText),
    hash:
      hashText === undefined ? defaultConfig.hash : parseHashSelection(hashText),
    keys: flags.keys.map((k, i) => parseKeyArg(k, i)),
  };
}
