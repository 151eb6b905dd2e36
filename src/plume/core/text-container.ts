import { Text } from "@codemirror/state";
import type { CharRange, CursorPosition, LineEnding } from "./types";
import { clampIndex } from "../shared/clamp";
import {
  codeUnitOffsetForBytes,
  snapToCodePointStart,
  utf8Length,
} from "../shared/code-points";
import {
  detectLineEnding,
  normalizeLineEndings,
  restoreLineEndings,
} from "../shared/line-ending";
import {
  getWordBoundariesAt,
  nextWordBreak,
  prevWordBreak,
  type CharReader,
} from "../shared/word-break";

function toDoc(normalized: string): Text {
  return Text.of(normalized.split("\n"));
}

/** UTF-8 offset of each line start, for one `Text` value. */
type ByteIndex = {
  doc: Text;
  lineStarts: number[];
};

function buildByteIndex(doc: Text): ByteIndex {
  const lineStarts: number[] = [];
  let bytes = 0;
  for (let line = 1; line <= doc.lines; line += 1) {
    lineStarts.push(bytes);
    bytes += utf8Length(doc.line(line).text) + 1;
  }
  return { doc, lineStarts };
}

/**
 * Editable document text.
 *
 * Content is stored LF-normalized in a persistent B-tree (`Text` from
 * `@codemirror/state`), so inserts, deletes and line lookups stay
 * logarithmic in document size. The line ending found at load time is put
 * back by `toString()`.
 *
 * Offsets and columns are UTF-16 code units; the conversions never return an
 * offset between the halves of a surrogate pair. Every index argument is
 * clamped into the document instead of being rejected.
 */
export class TextContainer {
  private doc: Text;
  private ending: LineEnding;
  private versionValue = 0;
  private modifiedFlag = false;
  private savedVersionValue = 0;
  private byteIndex: ByteIndex | null = null;

  constructor(text = "") {
    this.ending = detectLineEnding(text);
    this.doc = toDoc(normalizeLineEndings(text));
  }

  get length(): number {
    return this.doc.length;
  }

  /** Incremented by every mutation. */
  get version(): number {
    return this.versionValue;
  }

  get savedVersion(): number {
    return this.savedVersionValue;
  }

  get lineEnding(): LineEnding {
    return this.ending;
  }

  setLineEnding(ending: LineEnding): void {
    this.ending = ending;
    this.touch();
  }

  isModified(): boolean {
    return this.modifiedFlag || this.versionValue !== this.savedVersionValue;
  }

  markSaved(): void {
    this.modifiedFlag = false;
    this.savedVersionValue = this.versionValue;
  }

  isEmpty(): boolean {
    return this.doc.length === 0;
  }

  /** Always at least 1: an empty document has one empty line. */
  lineCount(): number {
    return this.doc.lines;
  }

  /** Line text without its newline, or null when out of range. */
  getLine(index: number): string | null {
    if (!this.hasLine(index)) {
      return null;
    }
    return this.doc.line(index + 1).text;
  }

  lineLength(index: number): number | null {
    if (!this.hasLine(index)) {
      return null;
    }
    return this.doc.line(index + 1).length;
  }

  lineColToChar(line: number, column: number): number | null {
    const lineIndex = Number.isNaN(line) ? 0 : Math.max(0, Math.trunc(line));
    if (lineIndex >= this.doc.lines) {
      return null;
    }
    const info = this.doc.line(lineIndex + 1);
    const clamped = clampIndex(column, info.length);
    return info.from + snapToCodePointStart(info.text, clamped);
  }

  charToLineCol(index: number): CursorPosition {
    const offset = clampIndex(index, this.doc.length);
    const info = this.doc.lineAt(offset);
    return {
      line: info.number - 1,
      column: snapToCodePointStart(info.text, offset - info.from),
    };
  }

  charAt(index: number): string | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.doc.length) {
      return null;
    }
    return this.doc.sliceString(index, index + 1);
  }

  slice(start: number, end: number): string {
    const from = clampIndex(start, this.doc.length);
    const to = clampIndex(end, this.doc.length);
    if (from >= to) {
      return "";
    }
    return this.doc.sliceString(from, to);
  }

  insert(index: number, text: string): void {
    const normalized = normalizeLineEndings(text);
    if (normalized.length === 0) {
      return;
    }
    const at = clampIndex(index, this.doc.length);
    this.doc = this.doc.replace(at, at, toDoc(normalized));
    this.touch();
  }

  /** Removes `[start, end)` and returns the removed text. */
  delete(start: number, end: number): string {
    const from = clampIndex(start, this.doc.length);
    const to = clampIndex(end, this.doc.length);
    if (from >= to) {
      return "";
    }
    const removed = this.doc.sliceString(from, to);
    this.doc = this.doc.replace(from, to, Text.empty);
    this.touch();
    return removed;
  }

  /**
   * Replaces `[start, end)` with `text` as a single mutation and returns the
   * replaced text. A reversed range inserts at `start`.
   */
  replace(start: number, end: number, text: string): string {
    const from = clampIndex(start, this.doc.length);
    const to = Math.max(from, clampIndex(end, this.doc.length));
    const normalized = normalizeLineEndings(text);
    if (from === to && normalized.length === 0) {
      return "";
    }
    const removed = this.doc.sliceString(from, to);
    this.doc = this.doc.replace(from, to, toDoc(normalized));
    this.touch();
    return removed;
  }

  /** Replaces everything and re-detects the line ending. */
  setContent(text: string): void {
    this.ending = detectLineEnding(text);
    this.doc = toDoc(normalizeLineEndings(text));
    this.versionValue += 1;
  }

  toString(): string {
    return restoreLineEndings(this.doc.toString(), this.ending);
  }

  toStringWithEnding(ending: LineEnding): string {
    return restoreLineEndings(this.doc.toString(), ending);
  }

  wordAt(index: number): CharRange | null {
    return getWordBoundariesAt(this.reader(), index);
  }

  nextWordBoundary(index: number): number {
    return nextWordBreak(this.reader(), index);
  }

  prevWordBoundary(index: number): number {
    return prevWordBreak(this.reader(), index);
  }

  wordCount(): number {
    let count = 0;
    for (let line = 1; line <= this.doc.lines; line += 1) {
      count += this.doc
        .line(line)
        .text.split(/\s+/)
        .filter((token) => token.length > 0).length;
    }
    return count;
  }

  /** UTF-8 size of the LF-normalized content. */
  byteLength(): number {
    return this.charToByte(this.doc.length);
  }

  charToByte(index: number): number {
    const offset = clampIndex(index, this.doc.length);
    const info = this.doc.lineAt(offset);
    const lineStart = this.lineByteStarts()[info.number - 1];
    return lineStart + utf8Length(info.text.slice(0, offset - info.from));
  }

  byteToChar(byteIndex: number): number {
    const target = Number.isNaN(byteIndex) ? 0 : Math.max(0, byteIndex);
    const starts = this.lineByteStarts();

    // Last line starting at or before the target byte.
    let low = 0;
    let high = starts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (starts[mid] <= target) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const info = this.doc.line(low + 1);
    const within = target - starts[low];
    if (within >= utf8Length(info.text)) {
      return info.to;
    }
    return info.from + codeUnitOffsetForBytes(info.text, within);
  }

  private lineByteStarts(): number[] {
    if (this.byteIndex === null || this.byteIndex.doc !== this.doc) {
      this.byteIndex = buildByteIndex(this.doc);
    }
    return this.byteIndex.lineStarts;
  }

  private hasLine(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.doc.lines;
  }

  private reader(): CharReader {
    const doc = this.doc;
    return {
      length: doc.length,
      slice: (from, to) => doc.sliceString(from, to),
    };
  }

  private touch(): void {
    this.versionValue += 1;
    this.modifiedFlag = true;
  }
}
