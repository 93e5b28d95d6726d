import { describe, it, expect } from "vitest";
import { resolveKey, type KeyFlags } from "../src/keymap.js";

const NONE: KeyFlags = { upArrow: false, downArrow: false, return: false, ctrl: false };

describe("resolveKey", () => {
  it.each([
    ["q", NONE, "quit"],
    ["c", { ...NONE, ctrl: true }, "quit"],
    ["", { ...NONE, upArrow: true }, "up"],
    ["k", NONE, "up"],
    ["", { ...NONE, downArrow: true }, "down"],
    ["j", NONE, "down"],
    ["r", NONE, "rerun"],
    ["\r", { ...NONE, return: true }, "select"],
    [" ", NONE, "select"],
  ] as const)("maps %j %o to %s", (input, key, expected) => {
    expect(resolveKey(input, key)).toBe(expected);
  });

  it("ignores unbound keys", () => {
    expect(resolveKey("x", NONE)).toBeNull();
    expect(resolveKey("Q", NONE)).toBeNull();
    expect(resolveKey("r", { ...NONE, ctrl: true })).toBeNull();
  });
});
