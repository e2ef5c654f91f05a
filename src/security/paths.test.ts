import { describe, expect, test } from "vitest";
import {
  findForbiddenMatch,
  normalizeForbiddenPath,
  toForbiddenDirectory,
  toPosixAlias,
} from "./paths";

describe("normalizeForbiddenPath", () => {
  test("converts backslashes, lowercases and strips trailing separators", () => {
    expect(normalizeForbiddenPath("C:\\Users\\Alice\\.claude-work\\")).toBe("c:/users/alice/.claude-work");
  });

  test("strips repeated trailing slashes", () => {
    expect(normalizeForbiddenPath("/home/alice/.claude-work///")).toBe("/home/alice/.claude-work");
  });

  test("collapses a bare root to an empty string", () => {
    expect(normalizeForbiddenPath("/")).toBe("");
  });
});

describe("toPosixAlias", () => {
  test("rewrites a drive path to its mount form", () => {
    expect(toPosixAlias("c:/users/alice/.claude-work")).toBe("/c/users/alice/.claude-work");
  });

  test("returns null for paths without a drive prefix", () => {
    expect(toPosixAlias("/home/alice")).toBeNull();
    expect(toPosixAlias("c:")).toBeNull();
    expect(toPosixAlias("cd:/x")).toBeNull();
  });
});

describe("findForbiddenMatch", () => {
  const unix = toForbiddenDirectory("/home/alice/.claude-work");
  const win = toForbiddenDirectory("C:\\Users\\alice\\.claude-work");

  test("matches forward-slash spelling case-insensitively", () => {
    expect(findForbiddenMatch("CAT /HOME/ALICE/.CLAUDE-WORK/settings.json", [unix])).toBe(unix);
  });

  test("matches backslash spelling of a forward-slash entry", () => {
    expect(findForbiddenMatch("type \\home\\alice\\.claude-work\\x", [unix])).toBe(unix);
  });

  test("matches the drive-mount alias", () => {
    expect(findForbiddenMatch("/c/Users/alice/.claude-work/CLAUDE.md", [win])).toBe(win);
  });

  test("matches a mixed-separator spelling", () => {
    expect(findForbiddenMatch("C:/Users\\alice/.claude-work", [win])).toBe(win);
  });

  test("matches a longer sibling name (no boundary anchoring)", () => {
    expect(findForbiddenMatch("ls /home/alice/.claude-work2", [unix])).toBe(unix);
  });

  test("returns the first entry in configuration order", () => {
    const parent = toForbiddenDirectory("/home/alice");
    expect(findForbiddenMatch("/home/alice/.claude-work/x", [unix, parent])).toBe(unix);
    expect(findForbiddenMatch("/home/alice/.claude-work/x", [parent, unix])).toBe(parent);
  });

  test("returns null when no spelling appears", () => {
    expect(findForbiddenMatch("ls /home/alice/.claude-personal", [unix, win])).toBeNull();
  });
});
