export type LineEnding = "lf" | "crlf";

export type CursorPosition = {
  line: number;
  column: number;
};

/**
 * `start` is the anchor set when extension begins, `end` follows the live
 * cursor. The two are not kept in document order.
 */
export type Selection = {
  start: CursorPosition;
  end: CursorPosition;
};

/** Half-open range of character offsets. */
export type CharRange = {
  start: number;
  end: number;
};

export type EditorState = {
  cursor: CursorPosition;
  selection: Selection;
  findResults: CharRange[];
  currentFindIndex: number | null;
};
