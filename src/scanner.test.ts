import { describe, it, expect } from "vitest";
import { LineCursor, scan } from "./scanner.js";

describe("scan", () => {
  it("annotates lines with depth and line number", () => {
    const { lines, blankLines } = scan("a: 1\n  b: 2\n    c: 3\n", 2, true);
    expect(lines).toEqual([
      { content: "a: 1", depth: 0, lineNumber: 1 },
      { content: "b: 2", depth: 1, lineNumber: 2 },
      { content: "c: 3", depth: 2, lineNumber: 3 },
    ]);
    expect(blankLines).toEqual([]);
  });

  it("records whitespace-only lines separately", () => {
    const { lines, blankLines } = scan("a\n\n   \nb", 2, true);
    expect(lines.map((l) => l.lineNumber)).toEqual([1, 4]);
    expect(blankLines).toEqual([2, 3]);
  });

  it("strips carriage returns", () => {
    const { lines } = scan("a: 1\r\nb: 2\r\n", 2, true);
    expect(lines.map((l) => l.content)).toEqual(["a: 1", "b: 2"]);
  });

  it("returns nothing for empty input", () => {
    expect(scan("", 2, true)).toEqual({ lines: [], blankLines: [] });
  });

  it("honors a custom indent unit", () => {
    const { lines } = scan("a:\n    b: 1", 4, true);
    expect(lines[1].depth).toBe(1);
  });

  describe("strict mode", () => {
    it("rejects tabs in indentation", () => {
      expect(() => scan("a:\n\tb: 1", 2, true)).toThrow("Line 2: Tabs are not allowed in indentation");
    });

    it("rejects partial indentation", () => {
      expect(() => scan("a:\n   b: 1", 2, true)).toThrow(
        "Line 2: Indentation must be a multiple of 2 spaces (found 3)",
      );
    });
  });

  describe("lenient mode", () => {
    it("counts a tab as four spaces", () => {
      expect(scan("a:\n\tb: 1", 2, false).lines[1].depth).toBe(2);
    });

    it("rounds partial indentation down", () => {
      expect(scan("a:\n   b: 1", 2, false).lines[1].depth).toBe(1);
    });
  });
});

describe("LineCursor", () => {
  it("walks the lines in order", () => {
    const { lines } = scan("x\ny\n\n", 2, true);
    const cursor = new LineCursor(lines);
    expect(cursor.length).toBe(2);
    expect(cursor.peek()?.content).toBe("x");
    cursor.advance();
    expect(cursor.peek()?.content).toBe("y");
    expect(cursor.atEnd()).toBe(false);
    cursor.advance();
    expect(cursor.atEnd()).toBe(true);
    expect(cursor.peek()).toBeUndefined();
  });
});
