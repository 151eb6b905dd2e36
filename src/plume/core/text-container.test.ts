import { describe, expect, it } from "vitest";
import { TextContainer } from "./text-container";

const HUGE = Number.MAX_SAFE_INTEGER;

const roundTripCases = [
  "",
  "hello",
  "multiple\nlines",
  "trailing newline\n",
  "\n",
  "tabs\tinside",
  "emoji 😀\nsecond line",
  "combining é",
];

describe("TextContainer", () => {
  describe("construction", () => {
    it("has one empty line when empty", () => {
      const text = new TextContainer();
      expect(text.length).toBe(0);
      expect(text.isEmpty()).toBe(true);
      expect(text.lineCount()).toBe(1);
      expect(text.getLine(0)).toBe("");
    });

    it("splits lines and strips newlines from line access", () => {
      const text = new TextContainer("Hello\nWorld");
      expect(text.lineCount()).toBe(2);
      expect(text.getLine(0)).toBe("Hello");
      expect(text.getLine(1)).toBe("World");
      expect(text.lineLength(0)).toBe(5);
    });

    it("returns null for lines out of range", () => {
      const text = new TextContainer("Hello");
      expect(text.getLine(-1)).toBeNull();
      expect(text.getLine(1)).toBeNull();
      expect(text.lineLength(3)).toBeNull();
    });

    it("round-trips text without carriage returns", () => {
      for (const value of roundTripCases) {
        expect(new TextContainer(value).toString()).toBe(value);
      }
    });
  });

  describe("line endings", () => {
    it("detects CRLF and stores LF internally", () => {
      const text = new TextContainer("a\r\nb");
      expect(text.lineEnding).toBe("crlf");
      expect(text.length).toBe(3);
      expect(text.getLine(1)).toBe("b");
    });

    it("restores the detected ending on output", () => {
      const text = new TextContainer("a\r\nb\r\n");
      expect(text.toString()).toBe("a\r\nb\r\n");
      expect(text.toStringWithEnding("lf")).toBe("a\nb\n");
    });

    it("defaults to LF", () => {
      expect(new TextContainer("a\nb").lineEnding).toBe("lf");
      expect(new TextContainer("").lineEnding).toBe("lf");
    });

    it("normalizes inserted CRLF text", () => {
      const text = new TextContainer("ab");
      text.insert(1, "x\r\ny");
      expect(text.toString()).toBe("ax\nyb");
      expect(text.length).toBe(5);
    });

    it("marks the document modified when the ending changes", () => {
      const text = new TextContainer("a\nb");
      text.setLineEnding("crlf");
      expect(text.isModified()).toBe(true);
      expect(text.version).toBe(1);
      expect(text.toString()).toBe("a\r\nb");
    });
  });

  describe("mutations", () => {
    it("inserts and deletes as inverse operations", () => {
      const text = new TextContainer("Hello World");
      text.insert(5, ",");
      expect(text.toString()).toBe("Hello, World");
      expect(text.version).toBe(1);

      expect(text.delete(5, 6)).toBe(",");
      expect(text.toString()).toBe("Hello World");
      expect(text.version).toBe(2);
    });

    it("clamps insert positions past the end", () => {
      const text = new TextContainer("abc");
      text.insert(999, "!");
      expect(text.toString()).toBe("abc!");
    });

    it("treats reversed and empty ranges as no-op deletes", () => {
      const text = new TextContainer("abcdef");
      expect(text.delete(3, 1)).toBe("");
      expect(text.delete(2, 2)).toBe("");
      expect(text.delete(50, 60)).toBe("");
      expect(text.version).toBe(0);
      expect(text.isModified()).toBe(false);
    });

    it("clamps negative delete starts", () => {
      const text = new TextContainer("abcdef");
      expect(text.delete(-5, 2)).toBe("ab");
      expect(text.toString()).toBe("cdef");
    });

    it("ignores empty inserts", () => {
      const text = new TextContainer("abc");
      text.insert(1, "");
      expect(text.version).toBe(0);
    });

    it("replaces a range in one mutation", () => {
      const text = new TextContainer("Hello World");
      expect(text.replace(6, 11, "There")).toBe("World");
      expect(text.toString()).toBe("Hello There");
      expect(text.version).toBe(1);
    });

    it("inserts at the start of a reversed replace range", () => {
      const text = new TextContainer("Hello World");
      expect(text.replace(5, 2, "!")).toBe("");
      expect(text.toString()).toBe("Hello! World");
    });

    it("replaces all content and re-detects the line ending", () => {
      const text = new TextContainer("one");
      text.setContent("x\r\ny");
      expect(text.lineEnding).toBe("crlf");
      expect(text.getLine(1)).toBe("y");
      expect(text.version).toBe(1);
      expect(text.isModified()).toBe(true);
    });

    it("keeps line access consistent on large documents", () => {
      const lines = Array.from({ length: 20000 }, (_, i) => `line ${i}`);
      const text = new TextContainer(lines.join("\n"));
      const middle = text.lineColToChar(10000, 0);
      expect(middle).not.toBeNull();
      text.insert(middle ?? 0, "inserted\n");
      expect(text.lineCount()).toBe(20001);
      expect(text.getLine(10000)).toBe("inserted");
      expect(text.getLine(10001)).toBe("line 10000");
      expect(text.getLine(20000)).toBe("line 19999");
    });
  });

  describe("saved state", () => {
    it("tracks modification against the saved version", () => {
      const text = new TextContainer("abc");
      expect(text.isModified()).toBe(false);

      text.insert(0, "x");
      expect(text.isModified()).toBe(true);

      text.markSaved();
      expect(text.isModified()).toBe(false);
      expect(text.savedVersion).toBe(1);
    });
  });

  describe("coordinate conversion", () => {
    const text = new TextContainer("Line 1\nLine 2\nLine 3");

    it("maps line and column to a character offset", () => {
      expect(text.lineColToChar(0, 0)).toBe(0);
      expect(text.lineColToChar(1, 0)).toBe(7);
      expect(text.lineColToChar(1, 4)).toBe(11);
    });

    it("clamps columns to the line length, excluding the newline", () => {
      expect(text.lineColToChar(1, 99)).toBe(13);
      expect(text.lineColToChar(2, 99)).toBe(20);
    });

    it("returns null for lines past the end", () => {
      expect(text.lineColToChar(3, 0)).toBeNull();
      expect(text.lineColToChar(HUGE, HUGE)).toBeNull();
    });

    it("maps character offsets back to line and column", () => {
      expect(text.charToLineCol(0)).toEqual({ line: 0, column: 0 });
      expect(text.charToLineCol(7)).toEqual({ line: 1, column: 0 });
      expect(text.charToLineCol(11)).toEqual({ line: 1, column: 4 });
      expect(text.charToLineCol(6)).toEqual({ line: 0, column: 6 });
    });

    it("clamps character offsets into the document", () => {
      expect(text.charToLineCol(HUGE)).toEqual({ line: 2, column: 6 });
      expect(text.charToLineCol(-3)).toEqual({ line: 0, column: 0 });
    });

    it("never lands between the halves of a surrogate pair", () => {
      const math = new TextContainer("x\n𝒳𝒴");
      expect(math.lineColToChar(1, 1)).toBe(2);
      expect(math.lineColToChar(1, 2)).toBe(4);
      expect(math.lineColToChar(1, 3)).toBe(4);
      expect(math.charToLineCol(3)).toEqual({ line: 1, column: 0 });
      expect(math.charToLineCol(5)).toEqual({ line: 1, column: 2 });
      expect(math.charToLineCol(6)).toEqual({ line: 1, column: 4 });
    });

    it("stays total on an empty document", () => {
      const empty = new TextContainer();
      expect(empty.lineColToChar(0, 0)).toBe(0);
      expect(empty.lineColToChar(0, HUGE)).toBe(0);
      expect(empty.lineColToChar(HUGE, HUGE)).toBeNull();
      expect(empty.charToLineCol(HUGE)).toEqual({ line: 0, column: 0 });
    });
  });

  describe("character access", () => {
    const text = new TextContainer("aé\n😀");

    it("reads single code units and slices", () => {
      expect(text.charAt(1)).toBe("é");
      expect(text.charAt(2)).toBe("\n");
      expect(text.charAt(5)).toBeNull();
      expect(text.slice(0, 2)).toBe("aé");
      expect(text.slice(4, 1)).toBe("");
      expect(text.slice(3, 99)).toBe("😀");
    });

    it("converts between character and UTF-8 byte offsets", () => {
      expect(text.byteLength()).toBe(8);
      expect(text.charToByte(2)).toBe(3);
      expect(text.charToByte(3)).toBe(4);
      expect(text.byteToChar(4)).toBe(3);
      expect(text.byteToChar(8)).toBe(5);
    });

    it("snaps bytes inside a character to its start", () => {
      expect(text.byteToChar(2)).toBe(1);
      expect(text.byteToChar(5)).toBe(3);
      expect(text.byteToChar(100)).toBe(5);
    });

    it("maps the newline byte to the end of its line", () => {
      expect(text.byteToChar(3)).toBe(2);
    });

    it("recomputes byte offsets after an edit", () => {
      const doc = new TextContainer("ab\ncd\nef");
      expect(doc.charToByte(7)).toBe(7);
      expect(doc.byteToChar(6)).toBe(6);

      doc.insert(1, "é");
      expect(doc.byteLength()).toBe(10);
      expect(doc.charToByte(2)).toBe(3);
      expect(doc.charToByte(8)).toBe(9);
      expect(doc.byteToChar(7)).toBe(6);
      expect(doc.byteToChar(2)).toBe(1);

      doc.delete(0, 4);
      expect(doc.toString()).toBe("cd\nef");
      expect(doc.charToByte(4)).toBe(4);
      expect(doc.byteToChar(5)).toBe(5);
    });
  });

  describe("words", () => {
    it("finds the word under an offset", () => {
      const text = new TextContainer("Hello world");
      expect(text.wordAt(2)).toEqual({ start: 0, end: 5 });
      expect(text.wordAt(7)).toEqual({ start: 6, end: 11 });
      expect(text.wordAt(5)).toBeNull();
    });

    it("treats letters stored as surrogate pairs as word characters", () => {
      const text = new TextContainer("𝒳𝒴 b");
      expect(text.wordAt(0)).toEqual({ start: 0, end: 4 });
      expect(text.nextWordBoundary(0)).toBe(5);
      expect(text.prevWordBoundary(5)).toBe(0);
    });

    it("scans word boundaries across the document", () => {
      const text = new TextContainer("Hello world  test");
      expect(text.nextWordBoundary(0)).toBe(6);
      expect(text.nextWordBoundary(6)).toBe(13);
      expect(text.prevWordBoundary(17)).toBe(13);
      expect(text.prevWordBoundary(6)).toBe(0);
    });

    it("counts whitespace-separated words", () => {
      expect(new TextContainer("Hello world, this is a test.").wordCount()).toBe(6);
      expect(new TextContainer("one two\n\nthree ").wordCount()).toBe(3);
      expect(new TextContainer("").wordCount()).toBe(0);
    });
  });
});
