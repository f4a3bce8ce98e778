import { describe, expect, it } from "vitest";
import {
  cleanTitleFromLine,
  extractEvidence,
  extractFileRefs,
  headingText,
  inferTitle,
  normalizeTag,
  sanitizeLine,
  selectExcerpt,
  slugify,
} from "./text.js";

describe("slugify", () => {
  it("collapses non-alphanumeric runs into single dashes", () => {
    expect(slugify("My Project: Topic! With Spaces")).toBe("my-project-topic-with-spaces");
  });

  it("falls back to 'note' when nothing survives", () => {
    expect(slugify("")).toBe("note");
    expect(slugify("!!! ???")).toBe("note");
  });

  it("caps the length without leaving a trailing dash", () => {
    expect(slugify("a".repeat(50))).toBe("a".repeat(40));
    expect(slugify(`${"x".repeat(39)} yz`)).toBe("x".repeat(39));
  });

  it("always yields a URL-safe slug", () => {
    for (const value of ["  Leading", "Ünïcode Tëxt", "a/b\\c", "--dashes--"]) {
      const slug = slugify(value);
      expect(slug).toMatch(/^[a-z0-9]+(?:-[a-z0-9]+)*$/);
      expect(slug.length).toBeLessThanOrEqual(40);
    }
  });
});

describe("normalizeTag", () => {
  it("lowercases, dashes whitespace and drops other characters", () => {
    expect(normalizeTag("  C++ Build ")).toBe("c-build");
    expect(normalizeTag("My Tag")).toBe("my-tag");
  });
});

describe("headingText", () => {
  it("returns the text of an ATX heading", () => {
    expect(headingText("# Build failed")).toBe("Build failed");
    expect(headingText("## Notes ##")).toBe("Notes");
  });

  it("ignores lines that only look like headings", () => {
    expect(headingText("#include <stdio.h>")).toBeUndefined();
    expect(headingText("#")).toBeUndefined();
    expect(headingText("plain text")).toBeUndefined();
  });
});

describe("extractEvidence", () => {
  it("keeps marker and location lines in their original order", () => {
    const lines = ["# Build failed", "error: linker exited 1", "src/main.c:42"];
    expect(extractEvidence(lines, 8)).toEqual(["error: linker exited 1", "src/main.c:42"]);
  });

  it("drops duplicate lines", () => {
    expect(extractEvidence(["warning: x", "warning: x", "ok"], 8)).toEqual(["warning: x"]);
  });

  it("treats lines equal after trimming as duplicates", () => {
    expect(extractEvidence(["error: disk full", "error: disk full   ", "ok"], 8)).toEqual(["error: disk full"]);

    const long = `error: ${"x".repeat(400)}`;
    const evidence = extractEvidence([`${long}a`, `${long}b`], 8);
    expect(evidence).toHaveLength(1);
    expect(evidence[0]).toBe(`error: ${"x".repeat(290)}...`);
  });

  it("keeps the highest scoring lines when capped", () => {
    const lines = ["a.c:1 note", "fatal error here", "warning: w", "plain"];
    expect(extractEvidence(lines, 2)).toEqual(["a.c:1 note", "fatal error here"]);
  });

  it("trims long lines", () => {
    const [line] = extractEvidence([`error ${"x".repeat(400)}`], 1);
    expect(line).toHaveLength(300);
    expect(line.endsWith("...")).toBe(true);
  });
});

describe("sanitizeLine", () => {
  it("strips trailing whitespace", () => {
    expect(sanitizeLine("value \t")).toBe("value");
  });
});

describe("selectExcerpt", () => {
  it("pads the evidence to three lines", () => {
    expect(selectExcerpt(["hello", "world", "error: boom", "tail"], 8)).toEqual([
      "error: boom",
      "hello",
      "world",
    ]);
  });

  it("never repeats a line that only differs in trailing whitespace", () => {
    expect(selectExcerpt(["note one", "note one  ", "error: boom"], 8)).toEqual(["error: boom", "note one"]);
  });

  it("uses the opening lines when nothing scored", () => {
    expect(selectExcerpt(["one", "", "two"], 1)).toEqual(["one"]);
  });
});

describe("extractFileRefs", () => {
  it("collects unique path:line[:col] references", () => {
    const lines = ["at src/app.ts:10:5 and", "lib/x.py:3", "src/app.ts:10:5"];
    expect(extractFileRefs(lines)).toEqual(["src/app.ts:10:5", "lib/x.py:3"]);
  });
});

describe("cleanTitleFromLine", () => {
  it("strips timestamps and severity prefixes", () => {
    expect(cleanTitleFromLine("[2026-01-02 10:00:00] ERROR: disk full")).toBe("disk full");
    expect(cleanTitleFromLine("2026-01-02T10:00:00Z error: disk full")).toBe("disk full");
  });

  it("keeps what follows an inline error marker", () => {
    expect(cleanTitleFromLine("main.c:5: error: implicit declaration of function 'foo'")).toBe(
      "implicit declaration of function 'foo'"
    );
  });
});

describe("inferTitle", () => {
  it("prefers the first issue line", () => {
    expect(inferTitle(["starting", "warning: low disk"], { project: "p", topic: "t" })).toBe("low disk");
  });

  it("falls back to meta, then the first line", () => {
    expect(inferTitle(["hello"], { project: "demo", topic: "build" })).toBe("demo: build");
    expect(inferTitle(["hello"], { topic: "build" })).toBe("build");
    expect(inferTitle(["just some text", "more"])).toBe("just some text");
    expect(inferTitle(["", " "], { project: "p" })).toBe("p");
    expect(inferTitle([""])).toBe("Notes summary");
  });
});
