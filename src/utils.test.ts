import { describe, expect, it } from "vitest";
import {
  formatDuration,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  globToRegex,
  hasFlag,
  hasHelpFlag,
  plural,
  sha256,
} from "./utils.js";

describe("globToRegex", () => {
  it("matches exact strings", () => {
    const regex = globToRegex("day 1/chapter-1.md");
    expect(regex.test("day 1/chapter-1.md")).toBe(true);
    expect(regex.test("day 1/chapter-1.mdx")).toBe(false);
    expect(regex.test("part/day 1/chapter-1.md")).toBe(false);
  });

  it("handles * wildcard (matches anything except /)", () => {
    const regex = globToRegex("day */chapter-*.md");
    expect(regex.test("day 1/chapter-2.md")).toBe(true);
    expect(regex.test("day 13/chapter-10.md")).toBe(true);
    expect(regex.test("day 1/drafts/chapter-2.md")).toBe(false);
  });

  it("handles ** wildcard (matches anything including /)", () => {
    const regex = globToRegex("**/chapter-*.md");
    expect(regex.test("day 1/chapter-2.md")).toBe(true);
    expect(regex.test("part 1/day 3/chapter-1.md")).toBe(true);
    expect(regex.test("chapter-1.md")).toBe(false); // no leading /
  });

  it("handles ? wildcard (matches single char)", () => {
    const regex = globToRegex("day ?/*.md");
    expect(regex.test("day 1/a.md")).toBe(true);
    expect(regex.test("day 12/a.md")).toBe(false);
  });

  it("matches the documented examples", () => {
    expect(globToRegex("day */chapter-*.md").test("day 1/chapter-2.md")).toBe(true);
    expect(globToRegex("**/*.md").test("part 1/day 3/chapter-1.md")).toBe(true);
  });

  it("escapes regex special characters", () => {
    const regex = globToRegex("notes (old)/v1.0+draft.md");
    expect(regex.test("notes (old)/v1.0+draft.md")).toBe(true);
    expect(regex.test("notes (old)/v1x0+draft.md")).toBe(false);
  });
});

describe("formatDuration", () => {
  it("formats milliseconds", () => {
    expect(formatDuration(0)).toBe("0ms");
    expect(formatDuration(250)).toBe("250ms");
  });

  it("formats seconds only", () => {
    expect(formatDuration(1000)).toBe("1s");
    expect(formatDuration(45999)).toBe("45s");
  });

  it("formats minutes and seconds", () => {
    expect(formatDuration(60000)).toBe("1m 0s");
    expect(formatDuration(65000)).toBe("1m 5s");
  });
});

describe("sha256", () => {
  it("returns the hex digest", () => {
    expect(sha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});

describe("plural", () => {
  it("pluralizes counts other than one", () => {
    expect(plural(0, "file")).toBe("0 files");
    expect(plural(1, "file")).toBe("1 file");
    expect(plural(3, "issue")).toBe("3 issues");
  });
});

describe("hasHelpFlag", () => {
  it("returns true for --help", () => {
    expect(hasHelpFlag(["--help"])).toBe(true);
  });

  it("returns true for -h", () => {
    expect(hasHelpFlag(["content", "-h"])).toBe(true);
  });

  it("returns false when not present", () => {
    expect(hasHelpFlag(["content", "--drafts"])).toBe(false);
  });
});

describe("hasFlag", () => {
  it("detects a boolean flag", () => {
    expect(hasFlag(["content", "--drafts"], "--drafts")).toBe(true);
    expect(hasFlag(["content"], "--drafts")).toBe(false);
  });
});

describe("getStringArg", () => {
  it("returns value after flag", () => {
    expect(getStringArg(["--out", "dist/corpus.json"], "--out", "default")).toBe("dist/corpus.json");
  });

  it("returns default when flag not present", () => {
    expect(getStringArg(["content"], "--out", "default")).toBe("default");
  });

  it("returns default when the flag has no value", () => {
    expect(getStringArg(["--out"], "--out", "default")).toBe("default");
    expect(getStringArg(["--out", "--drafts"], "--out", "default")).toBe("default");
  });

  it("returns the last value when repeated", () => {
    expect(getStringArg(["--format", "json", "--format", "outline"], "--format", "json")).toBe("outline");
  });
});

describe("getNullableStringArg", () => {
  it("returns value after flag", () => {
    expect(getNullableStringArg(["--pattern", "day */*.md"], "--pattern")).toBe("day */*.md");
  });

  it("returns null when flag not present", () => {
    expect(getNullableStringArg(["content"], "--pattern")).toBeNull();
  });
});

describe("getNumberArg", () => {
  it("parses numeric value", () => {
    expect(getNumberArg(["--timeout", "1500"], "--timeout", 5000)).toBe(1500);
  });

  it("returns default for non-numeric value", () => {
    expect(getNumberArg(["--timeout", "soon"], "--timeout", 5000)).toBe(5000);
  });

  it("returns default when flag not present", () => {
    expect(getNumberArg([], "--timeout", 5000)).toBe(5000);
  });
});

describe("getPositionalArg", () => {
  it("returns first non-flag argument", () => {
    expect(getPositionalArg(["content", "--drafts"])).toBe("content");
  });

  it("skips values of known flags", () => {
    expect(getPositionalArg(["--out", "corpus.json", "content"], ["--out"])).toBe("content");
  });

  it("returns empty string when no positional", () => {
    expect(getPositionalArg(["--drafts", "--lowercase"])).toBe("");
  });
});
