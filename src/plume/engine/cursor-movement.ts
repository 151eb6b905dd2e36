import type { CursorPosition } from "../core/types";
import type { TextContainer } from "../core/text-container";
import { clampIndex } from "../shared/clamp";
import {
  codePointLengthAfter,
  codePointLengthBefore,
  snapToCodePointStart,
} from "../shared/code-points";

/**
 * Position math over a TextContainer. Nothing here mutates the container or
 * keeps state between calls; positions passed in are expected to be clamped.
 */

export type VerticalMoveResult = {
  position: CursorPosition;
  /** Unclamped target column to remember for the next vertical move. */
  preferredColumn: number | null;
};

function lineText(text: TextContainer, line: number): string {
  return text.getLine(line) ?? "";
}

function lastLine(text: TextContainer): number {
  return text.lineCount() - 1;
}

function landOnLine(
  text: TextContainer,
  line: number,
  targetColumn: number,
): CursorPosition {
  const content = lineText(text, line);
  const column = Math.min(targetColumn, content.length);
  return { line, column: snapToCodePointStart(content, column) };
}

export function moveLeft(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  if (position.column > 0) {
    const content = lineText(text, position.line);
    const column = Math.min(position.column, content.length);
    return {
      line: position.line,
      column: column - codePointLengthBefore(content, column),
    };
  }
  if (position.line > 0) {
    const previous = position.line - 1;
    return { line: previous, column: lineText(text, previous).length };
  }
  return { ...position };
}

export function moveRight(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  const content = lineText(text, position.line);
  if (position.column < content.length) {
    return {
      line: position.line,
      column: position.column + codePointLengthAfter(content, position.column),
    };
  }
  if (position.line < lastLine(text)) {
    return { line: position.line + 1, column: 0 };
  }
  return { ...position };
}

export function moveUp(
  text: TextContainer,
  position: CursorPosition,
  preferredColumn: number | null,
): VerticalMoveResult {
  if (position.line === 0) {
    return { position: { ...position }, preferredColumn };
  }
  const target = preferredColumn ?? position.column;
  return {
    position: landOnLine(text, position.line - 1, target),
    preferredColumn: target,
  };
}

export function moveDown(
  text: TextContainer,
  position: CursorPosition,
  preferredColumn: number | null,
): VerticalMoveResult {
  if (position.line >= lastLine(text)) {
    return { position: { ...position }, preferredColumn };
  }
  const target = preferredColumn ?? position.column;
  return {
    position: landOnLine(text, position.line + 1, target),
    preferredColumn: target,
  };
}

/**
 * Smart home: toggles between the first non-whitespace column and column 0.
 * From anywhere else on the line it goes to the first non-whitespace column.
 */
export function moveHome(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  const content = lineText(text, position.line);
  const indent = content.search(/\S/);
  const firstNonWhitespace = indent === -1 ? 0 : indent;

  if (position.column === 0 && firstNonWhitespace > 0) {
    return { line: position.line, column: firstNonWhitespace };
  }
  if (position.column === 0 || position.column === firstNonWhitespace) {
    return { line: position.line, column: 0 };
  }
  return { line: position.line, column: firstNonWhitespace };
}

export function moveEnd(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  return { line: position.line, column: lineText(text, position.line).length };
}

export function moveWordLeft(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  const index = text.lineColToChar(position.line, position.column) ?? 0;
  return text.charToLineCol(text.prevWordBoundary(index));
}

export function moveWordRight(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  const index =
    text.lineColToChar(position.line, position.column) ?? text.length;
  return text.charToLineCol(text.nextWordBoundary(index));
}

export function movePageUp(
  text: TextContainer,
  position: CursorPosition,
  viewportLines: number,
  preferredColumn: number | null,
): VerticalMoveResult {
  const target = preferredColumn ?? position.column;
  const line = Math.max(0, position.line - viewportLines);
  return {
    position: landOnLine(text, line, target),
    preferredColumn: target,
  };
}

export function movePageDown(
  text: TextContainer,
  position: CursorPosition,
  viewportLines: number,
  preferredColumn: number | null,
): VerticalMoveResult {
  const target = preferredColumn ?? position.column;
  const line = Math.min(position.line + viewportLines, lastLine(text));
  return {
    position: landOnLine(text, line, target),
    preferredColumn: target,
  };
}

export function moveDocumentStart(): CursorPosition {
  return { line: 0, column: 0 };
}

export function moveDocumentEnd(text: TextContainer): CursorPosition {
  const line = lastLine(text);
  return { line, column: lineText(text, line).length };
}

/** `lineNumber` is 1-indexed, as typed by a user. */
export function goToLine(
  text: TextContainer,
  lineNumber: number,
): CursorPosition {
  return { line: clampIndex(lineNumber - 1, lastLine(text)), column: 0 };
}

export function clampPosition(
  text: TextContainer,
  position: CursorPosition,
): CursorPosition {
  const line = clampIndex(position.line, lastLine(text));
  const content = lineText(text, line);
  const column = clampIndex(position.column, content.length);
  return { line, column: snapToCodePointStart(content, column) };
}

/** Where the cursor ends up after `inserted` is typed at `position`. */
export function advancePosition(
  position: CursorPosition,
  inserted: string,
): CursorPosition {
  let newlines = 0;
  for (let i = 0; i < inserted.length; i += 1) {
    if (inserted.charCodeAt(i) === 10) {
      newlines += 1;
    }
  }
  if (newlines === 0) {
    return { line: position.line, column: position.column + inserted.length };
  }
  return {
    line: position.line + newlines,
    column: inserted.length - inserted.lastIndexOf("\n") - 1,
  };
}
