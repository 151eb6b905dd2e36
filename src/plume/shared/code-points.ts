function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}

/**
 * Number of code units taken by the code point that ends at `offset`.
 * A lone surrogate counts as one unit.
 */
export function codePointLengthBefore(text: string, offset: number): number {
  if (offset <= 0 || text.length === 0) {
    return 0;
  }
  const end = Math.min(offset, text.length);
  if (
    end >= 2 &&
    isLowSurrogate(text.charCodeAt(end - 1)) &&
    isHighSurrogate(text.charCodeAt(end - 2))
  ) {
    return 2;
  }
  return 1;
}

export function codePointLengthAfter(text: string, offset: number): number {
  if (offset >= text.length) {
    return 0;
  }
  const start = Math.max(0, offset);
  if (
    isHighSurrogate(text.charCodeAt(start)) &&
    isLowSurrogate(text.charCodeAt(start + 1))
  ) {
    return 2;
  }
  return 1;
}

/** Moves an offset that falls between two halves of a surrogate pair back by one. */
export function snapToCodePointStart(text: string, offset: number): number {
  if (
    offset > 0 &&
    offset < text.length &&
    isLowSurrogate(text.charCodeAt(offset)) &&
    isHighSurrogate(text.charCodeAt(offset - 1))
  ) {
    return offset - 1;
  }
  return offset;
}

export function utf8Length(text: string): number {
  if (isAsciiText(text)) {
    return text.length;
  }

  let bytes = 0;
  for (let i = 0; i < text.length; i += 1) {
    const code = text.charCodeAt(i);
    if (code < 0x80) {
      bytes += 1;
    } else if (code < 0x800) {
      bytes += 2;
    } else if (
      isHighSurrogate(code) &&
      isLowSurrogate(text.charCodeAt(i + 1))
    ) {
      bytes += 4;
      i += 1;
    } else {
      bytes += 3;
    }
  }
  return bytes;
}

/**
 * Walks `text` until `byteOffset` UTF-8 bytes are consumed and returns the
 * code unit offset reached. A byte offset inside a multi-byte sequence
 * resolves to the start of that code point.
 */
export function codeUnitOffsetForBytes(text: string, byteOffset: number): number {
  let bytes = 0;
  let index = 0;
  while (index < text.length) {
    const step = codePointLengthAfter(text, index);
    const width = utf8Length(text.slice(index, index + step));
    if (bytes + width > byteOffset) {
      return index;
    }
    bytes += width;
    index += step;
  }
  return index;
}
