import { HashSelection, RunConfig, resolveConfig } from "./config.js";
import { ChainTableError, InvalidArgumentError } from "./errors.js";
import { HashFunctionName, hashFunctions } from "./hash-functions.js";
import { HashTable } from "./hash-table.js";

export const usage = [
  "Usage: chaintable [--size N] [--hash naive|improved|djb2|all] key[=value] ...",
  "",
  "Inserts every key into a fresh table per hash function, then prints the",
  "table and its collision count. A key without a value gets its position.",
  "",
  "Environment: CHAINTABLE_SIZE, CHAINTABLE_HASH, CHAINTABLE_DEBUG",
].join("\n");

export type Output = {
  out: (text: string) => void;
  err: (text: string) => void;
};

type ParsedArgs =
  | { help: true }
  | { help: false; size?: string; hash?: string; keys: string[] };

export function parseArgs(args: string[]): ParsedArgs {
  const parsed: { size?: string; hash?: string; keys: string[] } = {
    keys: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-h":
      case "--help":
        return { help: true };
      case "--size":
      case "--hash": {
        const value = args[++i];
        if (value === undefined) {
          throw new InvalidArgumentError("flag", arg, "missing value");
        }
        parsed[arg === "--size" ? "size" : "hash"] = value;
        break;
      }
      default:
        if (arg.startsWith("--")) {
          throw new InvalidArgumentError("flag", arg, "unknown flag");
        }
        parsed.keys.push(arg);
    }
  }

  return { help: false, ...parsed };
}

function selectedHashes(selection: HashSelection): HashFunctionName[] {
  return selection === "all" ? ["naive", "improved", "djb2"] : [selection];
}

/**
 * Fill one table per selected hash function and render each one.
 */
export function report(config: RunConfig): string {
  return selectedHashes(config.hash)
    .map((name) => {
      const table = new HashTable(config.size);
      const hash = hashFunctions[name];
      for (const { key, value } of config.keys) {
        table.add(hash, key, value);
      }
      const text = [
        `hash=${name}`,
        table.display(),
        `collisions=${table.collisions()}`,
      ].join("\n");
      table.destroy();
      return text;
    })
    .join("\n\n");
}

/**
 * @returns The process exit code.
 */
export function run(
  args: string[],
  io: Output,
  env: Record<string, string | undefined> = process.env
): number {
  try {
    const parsed = parseArgs(args);
    if (parsed.help) {
      io.out(usage);
      return 0;
    }

    io.out(report(resolveConfig(parsed, env)));
    return 0;
  } catch (err) {
    if (err instanceof ChainTableError) {
      io.err(`chaintable: ${err.message}`);
      io.err(usage);
      return 1;
    }
    throw err;
  }
}
