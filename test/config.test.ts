import { test, expect, describe } from "@jest/globals";
import {
  parseHashSelection,
  parseKeyArg,
  parseSize,
  resolveConfig,
} from "../src/config.js";
import { InvalidArgumentError } from "../src/index.js";

describe("resolveConfig", () => {
  test("falls back to defaults", () => {
    expect(resolveConfig({ keys: ["a", "b=5"] }, {})).toEqual({
      size: 7,
      hash: "improved",
      keys: [
        { key: "a", value: 0 },
        { key: "b", value: 5 },
      ],
    });
  });

  test("environment overrides defaults, flags override environment", () => {
    const env = { CHAINTABLE_SIZE: "3", CHAINTABLE_HASH: "djb2" };
    expect(resolveConfig({ keys: [] }, env)).toEqual({
      size: 3,
      hash: "djb2",
      keys: [],
    });
    expect(resolveConfig({ size: "11", hash: "all", keys: [] }, env)).toEqual({
      size: 11,
      hash: "all",
      keys: [],
    });
  });

  test("rejects a bad environment value", () => {
    expect(() => resolveConfig({ keys: [] }, { CHAINTABLE_SIZE: "-1" })).toThrow(
      InvalidArgumentError
    );
  });
});

describe("parsers", () => {
  test("size must be a positive integer", () => {
    expect(parseSize("13")).toEqual(13);
    for (const raw of ["0", "", "abc", "2.5", "-4"]) {
      expect(() => parseSize(raw)).toThrow(InvalidArgumentError);
    }
  });

  test("hash selection", () => {
    expect(parseHashSelection("naive")).toEqual("naive");
    expect(parseHashSelection("all")).toEqual("all");
    expect(() => parseHashSelection("sha1")).toThrow(InvalidArgumentError);
  });

  test("key arguments", () => {
    expect(parseKeyArg("apple", 4)).toEqual({ key: "apple", value: 4 });
    expect(parseKeyArg("apple=-2", 4)).toEqual({ key: "apple", value: -2 });
    expect(parseKeyArg("a=b=3", 0)).toEqual({ key: "a=b", value: 3 });
    expect(() => parseKeyArg("apple=x", 0)).toThrow(InvalidArgumentError);
  });
});
