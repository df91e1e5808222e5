import { test, expect, describe, jest, afterEach } from "@jest/globals";
import { HashTable, LogEntry, hashNaive } from "../src/index.js";
import {
  getLogLevel,
  levelFromEnv,
  onLog,
  setLogLevel,
  warn,
} from "../src/logger.js";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogLevel(initialLevel);
  jest.restoreAllMocks();
});

describe("levelFromEnv", () => {
  test("maps CHAINTABLE_DEBUG values", () => {
    expect(levelFromEnv("1")).toEqual("debug");
    expect(levelFromEnv("true")).toEqual("debug");
    expect(levelFromEnv("warn")).toEqual("warn");
    expect(levelFromEnv("error")).toEqual("error");
    expect(levelFromEnv(undefined)).toEqual("info");
    expect(levelFromEnv("verbose")).toEqual("info");
  });
});

describe("logging", () => {
  test("writes a prefixed line with its data", () => {
    const spy = jest.spyOn(console, "warn").mockImplementation(() => {});
    setLogLevel("warn");
    warn("load is high", { load: 3 });
    expect(spy).toHaveBeenCalledWith('[chaintable] load is high {"load":3}');
  });

  test("drops entries below the current level", () => {
    const spy = jest.spyOn(console, "debug").mockImplementation(() => {});
    setLogLevel("info");
    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));

    new HashTable(2).remove(hashNaive, "a");

    off();
    expect(entries).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
  });

  test("reports removal hits and misses at debug level", () => {
    jest.spyOn(console, "debug").mockImplementation(() => {});
    setLogLevel("debug");
    const t = new HashTable(2);
    t.add(hashNaive, "a", 1);

    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));
    t.remove(hashNaive, "a");
    t.remove(hashNaive, "a");
    off();

    expect(entries.map((e) => [e.level, e.message, e.data])).toEqual([
      ["debug", "removed key", { key: "a", index: 1 }],
      ["debug", "key not found", { key: "a", index: 1 }],
    ]);
  });

  test("unsubscribed callbacks stop receiving entries", () => {
    const spy = jest.spyOn(console, "warn").mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));
    off();
    setLogLevel("warn");
    warn("after unsubscribe");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(entries).toEqual([]);
  });
});
