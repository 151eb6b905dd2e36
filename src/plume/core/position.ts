import type { CursorPosition, Selection } from "./types";

export function createPosition(line: number, column: number): CursorPosition {
  return { line, column };
}

export function positionsEqual(a: CursorPosition, b: CursorPosition): boolean {
  return a.line === b.line && a.column === b.column;
}

/** Negative when `a` precedes `b` in document order. */
export function comparePositions(a: CursorPosition, b: CursorPosition): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.column - b.column;
}

export function formatPosition(position: CursorPosition): string {
  return `Ln ${position.line + 1}, Col ${position.column + 1}`;
}

export function createSelection(
  start: CursorPosition,
  end: CursorPosition,
): Selection {
  return { start: { ...start }, end: { ...end } };
}

export function collapsedSelection(position: CursorPosition): Selection {
  return createSelection(position, position);
}

export function selectionsEqual(a: Selection, b: Selection): boolean {
  return positionsEqual(a.start, b.start) && positionsEqual(a.end, b.end);
}

export function isCollapsed(selection: Selection): boolean {
  return positionsEqual(selection.start, selection.end);
}

export function normalizeSelection(
  selection: Selection,
): [CursorPosition, CursorPosition] {
  if (comparePositions(selection.start, selection.end) <= 0) {
    return [selection.start, selection.end];
  }
  return [selection.end, selection.start];
}

export function selectionContains(
  selection: Selection,
  position: CursorPosition,
): boolean {
  const [start, end] = normalizeSelection(selection);
  return (
    comparePositions(position, start) >= 0 &&
    comparePositions(position, end) <= 0
  );
}
