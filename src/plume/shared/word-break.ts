import type { CharRange } from "../core/types";
import { codePointLengthAfter, codePointLengthBefore } from "./code-points";

/** Random access to the text of a document by code unit offsets. */
export type CharReader = {
  readonly length: number;
  slice(from: number, to: number): string;
};

const WORD_CHAR = /^[\p{Alphabetic}\p{N}_]$/u;
const WHITESPACE = /^\s$/;

export function isWordChar(char: string): boolean {
  return WORD_CHAR.test(char);
}

/** Whitespace that does not end a line. */
export function isInlineWhitespace(char: string): boolean {
  return char !== "\n" && WHITESPACE.test(char);
}

/** The code point starting at `index`; a lone surrogate on its own. */
function charAfter(reader: CharReader, index: number): string {
  const pair = reader.slice(index, index + 2);
  return pair.slice(0, codePointLengthAfter(pair, 0));
}

function charBefore(reader: CharReader, index: number): string {
  const pair = reader.slice(Math.max(0, index - 2), index);
  return pair.slice(pair.length - codePointLengthBefore(pair, pair.length));
}

function alignToCodePoint(reader: CharReader, index: number): number {
  if (index <= 0 || index >= reader.length) {
    return index;
  }
  return charBefore(reader, index + 1).length === 2 ? index - 1 : index;
}

/**
 * Maximal run of word characters around `offset`. Null when the character at
 * `offset` is not a word character or `offset` is past the end.
 */
export function getWordBoundariesAt(
  reader: CharReader,
  offset: number,
): CharRange | null {
  if (offset < 0 || offset >= reader.length) {
    return null;
  }
  const at = alignToCodePoint(reader, offset);
  const first = charAfter(reader, at);
  if (!isWordChar(first)) {
    return null;
  }

  let start = at;
  while (start > 0) {
    const char = charBefore(reader, start);
    if (!isWordChar(char)) {
      break;
    }
    start -= char.length;
  }

  let end = at + first.length;
  while (end < reader.length) {
    const char = charAfter(reader, end);
    if (!isWordChar(char)) {
      break;
    }
    end += char.length;
  }

  return { start, end };
}

/**
 * Skips the run of characters sharing the class of the one at `offset`, then
 * any spaces or tabs after it.
 */
export function nextWordBreak(reader: CharReader, offset: number): number {
  const length = reader.length;
  if (offset >= length) {
    return length;
  }

  let index = alignToCodePoint(reader, Math.max(0, offset));
  const startIsWord = isWordChar(charAfter(reader, index));
  while (index < length) {
    const char = charAfter(reader, index);
    if (isWordChar(char) !== startIsWord) {
      break;
    }
    index += char.length;
  }

  while (index < length) {
    const char = charAfter(reader, index);
    if (!isInlineWhitespace(char)) {
      break;
    }
    index += char.length;
  }

  return index;
}

/**
 * Skips spaces or tabs before `offset`, then the run of characters sharing
 * the class of the one before that.
 */
export function prevWordBreak(reader: CharReader, offset: number): number {
  if (offset <= 0) {
    return 0;
  }

  let index = alignToCodePoint(reader, Math.min(offset, reader.length));
  while (index > 0) {
    const char = charBefore(reader, index);
    if (!isInlineWhitespace(char)) {
      break;
    }
    index -= char.length;
  }

  if (index === 0) {
    return 0;
  }

  const startIsWord = isWordChar(charBefore(reader, index));
  while (index > 0) {
    const char = charBefore(reader, index);
    if (isWordChar(char) !== startIsWord) {
      break;
    }
    index -= char.length;
  }

  return index;
}
