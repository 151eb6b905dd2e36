export type MoveDirection =
  | "left"
  | "right"
  | "up"
  | "down"
  | "home"
  | "end"
  | "word-left"
  | "word-right"
  | "page-up"
  | "page-down"
  | "document-start"
  | "document-end";

/** Cursor movement, optionally extending the selection */
export type MoveCommand = {
  type: "move";
  direction: MoveDirection;
  extend?: boolean;
};

/** Commands that change document content */
export type EditCommand =
  | { type: "insert"; text: string }
  | { type: "insert-line-break" }
  | { type: "delete-backward" }
  | { type: "delete-forward" }
  | { type: "delete-word-backward" }
  | { type: "delete-word-forward" }
  | { type: "replace-find-result"; text: string }
  | { type: "replace-all-find-results"; text: string };

export type SessionCommand =
  | MoveCommand
  | EditCommand
  | { type: "go-to-line"; line: number }
  | { type: "select-all" }
  | { type: "select-word" }
  | { type: "clear-selection" }
  | { type: "next-find-result" }
  | { type: "prev-find-result" }
  | { type: "undo" }
  | { type: "redo" };
