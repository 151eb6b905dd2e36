import type { CursorPosition, Selection } from "../core/types";
import type { TextContainer } from "../core/text-container";
import { createSelection } from "../core/position";

export const HISTORY_GROUPING_INTERVAL_MS = 500;

type OperationFields = {
  /** Character offset the edit starts at. */
  position: number;
  /** Inserted text, removed text, or the replacement, depending on kind. */
  text: string;
  cursorBefore: CursorPosition;
  selectionBefore: Selection;
  cursorAfter: CursorPosition;
  /** Monotonic milliseconds. */
  timestamp: number;
};

export type InsertOperation = OperationFields & { kind: "insert" };
export type DeleteOperation = OperationFields & { kind: "delete" };
export type ReplaceOperation = OperationFields & {
  kind: "replace";
  oldText: string;
};

export type EditOperation = InsertOperation | DeleteOperation | ReplaceOperation;

export type OperationInput = OperationFields;

function copyFields(input: OperationInput): OperationFields {
  return {
    position: input.position,
    text: input.text,
    cursorBefore: { ...input.cursorBefore },
    selectionBefore: createSelection(
      input.selectionBefore.start,
      input.selectionBefore.end,
    ),
    cursorAfter: { ...input.cursorAfter },
    timestamp: input.timestamp,
  };
}

export function createInsertOperation(input: OperationInput): InsertOperation {
  return { kind: "insert", ...copyFields(input) };
}

export function createDeleteOperation(input: OperationInput): DeleteOperation {
  return { kind: "delete", ...copyFields(input) };
}

export function createReplaceOperation(
  input: OperationInput,
  oldText: string,
): ReplaceOperation {
  return { kind: "replace", ...copyFields(input), oldText };
}

/**
 * Whether `next`, recorded right after `previous`, continues the same
 * logical edit: contiguous typing, or a run of backspaces or forward
 * deletes, inside the grouping window. Line breaks always start a new step,
 * and so does a space typed after a space.
 */
export function canMergeOperations(
  previous: EditOperation,
  next: EditOperation,
  groupingIntervalMs: number = HISTORY_GROUPING_INTERVAL_MS,
): boolean {
  if (next.timestamp - previous.timestamp > groupingIntervalMs) {
    return false;
  }

  if (previous.kind === "insert" && next.kind === "insert") {
    if (next.position !== previous.position + previous.text.length) {
      return false;
    }
    if (next.text === "\n") {
      return false;
    }
    return !(next.text === " " && previous.text.endsWith(" "));
  }

  if (previous.kind === "delete" && next.kind === "delete") {
    const isBackspace = next.position + next.text.length === previous.position;
    const isForwardDelete = next.position === previous.position;
    if (!isBackspace && !isForwardDelete) {
      return false;
    }
    return !next.text.includes("\n") && !previous.text.includes("\n");
  }

  return false;
}

/** Folds `next` into `target` in place. */
export function mergeOperations(
  target: EditOperation,
  next: EditOperation,
): void {
  if (target.kind === "insert" && next.kind === "insert") {
    target.text += next.text;
  } else if (target.kind === "delete" && next.kind === "delete") {
    if (next.position < target.position) {
      target.text = next.text + target.text;
      target.position = next.position;
    } else {
      target.text += next.text;
    }
  } else {
    console.warn(`Cannot merge ${next.kind} into ${target.kind}`);
    return;
  }

  target.cursorAfter = { ...next.cursorAfter };
  target.timestamp = next.timestamp;
}

/** Rough retained size of an operation, in characters plus fixed overhead. */
export function operationSize(operation: EditOperation): number {
  const base = operation.text.length + 128;
  return operation.kind === "replace" ? base + operation.oldText.length : base;
}

/** Undoes `operation` on `text`. */
export function revertOperation(
  text: TextContainer,
  operation: EditOperation,
): void {
  const end = operation.position + operation.text.length;
  switch (operation.kind) {
    case "insert":
      text.delete(operation.position, end);
      break;
    case "delete":
      text.insert(operation.position, operation.text);
      break;
    case "replace":
      text.replace(operation.position, end, operation.oldText);
      break;
  }
}

/** Applies `operation` to `text` again after it was reverted. */
export function reapplyOperation(
  text: TextContainer,
  operation: EditOperation,
): void {
  switch (operation.kind) {
    case "insert":
      text.insert(operation.position, operation.text);
      break;
    case "delete":
      text.delete(
        operation.position,
        operation.position + operation.text.length,
      );
      break;
    case "replace":
      text.replace(
        operation.position,
        operation.position + operation.oldText.length,
        operation.text,
      );
      break;
  }
}
