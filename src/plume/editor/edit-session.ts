import type {
  CharRange,
  CursorPosition,
  EditorState,
  LineEnding,
  Selection,
} from "../core/types";
import { TextContainer } from "../core/text-container";
import {
  collapsedSelection,
  createSelection,
  isCollapsed,
  normalizeSelection,
  positionsEqual,
  selectionsEqual,
} from "../core/position";
import * as movement from "../engine/cursor-movement";
import { calculateScroll } from "../engine/scroll";
import { History } from "../history/history";
import {
  createDeleteOperation,
  createInsertOperation,
  createReplaceOperation,
  reapplyOperation,
  revertOperation,
  type OperationInput,
} from "../history/edit-operation";
import { clampIndex } from "../shared/clamp";
import { monotonicClock, type Clock } from "../shared/clock";
import {
  codePointLengthAfter,
  codePointLengthBefore,
} from "../shared/code-points";
import { normalizeLineEndings } from "../shared/line-ending";
import type { SessionCommand, MoveDirection } from "./commands";
import {
  resolveSessionOptions,
  type EditSessionOptions,
  type SessionChangeEvent,
} from "./options";

type SessionSnapshot = {
  version: number;
  cursor: CursorPosition;
  selection: Selection;
};

function createEditorState(): EditorState {
  return {
    cursor: { line: 0, column: 0 },
    selection: collapsedSelection({ line: 0, column: 0 }),
    findResults: [],
    currentFindIndex: null,
  };
}

/**
 * One open document: its text, cursor and selection, undo history and
 * viewport. Every operation clamps its input and none of them throw.
 */
export class EditSession {
  private text: TextContainer;
  private state: EditorState = createEditorState();
  private history: History;
  private preferredColumn: number | null = null;
  private viewportLines: number;
  private scrollMargin: number;
  private scrollLine = 0;
  private readonly clock: Clock;
  private onChange?: (event: SessionChangeEvent) => void;
  private onSelectionChange?: (
    selection: Selection,
    cursor: CursorPosition,
  ) => void;
  private transactionDepth = 0;

  constructor(content = "", options: EditSessionOptions = {}) {
    const resolved = resolveSessionOptions(options);
    this.text = new TextContainer(content);
    this.history = new History({
      maxHistory: resolved.maxHistory,
      groupingIntervalMs: resolved.groupingIntervalMs,
    });
    this.viewportLines = resolved.viewportLines;
    this.scrollMargin = resolved.scrollMargin;
    this.clock = options.clock ?? monotonicClock;
    this.onChange = options.onChange;
    this.onSelectionChange = options.onSelectionChange;
  }

  // --- Content ---

  getContent(): string {
    return this.text.toString();
  }

  /** Replaces the document and resets cursor, selection, history and scroll. */
  setContent(content: string) {
    this.transact(() => {
      this.text.setContent(content);
      this.text.markSaved();
      this.history.clear();
      this.state = createEditorState();
      this.preferredColumn = null;
      this.scrollLine = 0;
    });
  }

  getLine(index: number): string | null {
    return this.text.getLine(index);
  }

  getLineCount(): number {
    return this.text.lineCount();
  }

  getCharCount(): number {
    return this.text.length;
  }

  getLineEnding(): LineEnding {
    return this.text.lineEnding;
  }

  getVersion(): number {
    return this.text.version;
  }

  isModified(): boolean {
    return !this.history.isAtSavedState();
  }

  markSaved() {
    this.text.markSaved();
    this.history.markSaved();
  }

  // --- Cursor and selection ---

  getCursor(): CursorPosition {
    return { ...this.state.cursor };
  }

  getPreferredColumn(): number | null {
    return this.preferredColumn;
  }

  /** Null while the selection is collapsed. */
  getSelection(): Selection | null {
    if (isCollapsed(this.state.selection)) {
      return null;
    }
    return createSelection(this.state.selection.start, this.state.selection.end);
  }

  hasSelection(): boolean {
    return !isCollapsed(this.state.selection);
  }

  getSelectedText(): string | null {
    if (isCollapsed(this.state.selection)) {
      return null;
    }
    const range = this.selectionRange();
    return this.text.slice(range.start, range.end);
  }

  setCursor(position: CursorPosition) {
    this.transact(() => {
      this.moveTo(movement.clampPosition(this.text, position), false, null);
    });
  }

  /** Clamps both ends; the cursor follows `selection.end`. */
  setSelection(selection: Selection) {
    this.transact(() => {
      const start = movement.clampPosition(this.text, selection.start);
      const end = movement.clampPosition(this.text, selection.end);
      this.state.selection = createSelection(start, end);
      this.state.cursor = { ...end };
      this.preferredColumn = null;
      this.updateScroll();
    });
  }

  clearSelection() {
    this.transact(() => {
      this.state.selection = collapsedSelection(this.state.cursor);
    });
  }

  selectAll() {
    this.transact(() => {
      const end = movement.moveDocumentEnd(this.text);
      this.state.selection = createSelection({ line: 0, column: 0 }, end);
      this.state.cursor = end;
      this.preferredColumn = null;
      this.updateScroll();
    });
  }

  /** Selects the word under the cursor, or the word just before it. */
  selectWord(): boolean {
    return this.transact(() => {
      const index = this.cursorIndex();
      const range =
        this.text.wordAt(index) ??
        (index > 0 ? this.text.wordAt(index - 1) : null);
      if (!range) {
        return false;
      }
      this.selectRange(range);
      return true;
    });
  }

  // --- Movement ---

  moveLeft(extend = false) {
    this.transact(() => {
      this.moveTo(movement.moveLeft(this.text, this.state.cursor), extend, null);
    });
  }

  moveRight(extend = false) {
    this.transact(() => {
      this.moveTo(
        movement.moveRight(this.text, this.state.cursor),
        extend,
        null,
      );
    });
  }

  moveUp(extend = false) {
    this.transact(() => {
      const result = movement.moveUp(
        this.text,
        this.state.cursor,
        this.preferredColumn,
      );
      this.moveTo(result.position, extend, result.preferredColumn);
    });
  }

  moveDown(extend = false) {
    this.transact(() => {
      const result = movement.moveDown(
        this.text,
        this.state.cursor,
        this.preferredColumn,
      );
      this.moveTo(result.position, extend, result.preferredColumn);
    });
  }

  moveHome(extend = false) {
    this.transact(() => {
      this.moveTo(movement.moveHome(this.text, this.state.cursor), extend, null);
    });
  }

  moveEnd(extend = false) {
    this.transact(() => {
      this.moveTo(movement.moveEnd(this.text, this.state.cursor), extend, null);
    });
  }

  moveWordLeft(extend = false) {
    this.transact(() => {
      this.moveTo(
        movement.moveWordLeft(this.text, this.state.cursor),
        extend,
        null,
      );
    });
  }

  moveWordRight(extend = false) {
    this.transact(() => {
      this.moveTo(
        movement.moveWordRight(this.text, this.state.cursor),
        extend,
        null,
      );
    });
  }

  pageUp(extend = false) {
    this.transact(() => {
      const result = movement.movePageUp(
        this.text,
        this.state.cursor,
        this.viewportLines,
        this.preferredColumn,
      );
      this.moveTo(result.position, extend, result.preferredColumn);
    });
  }

  pageDown(extend = false) {
    this.transact(() => {
      const result = movement.movePageDown(
        this.text,
        this.state.cursor,
        this.viewportLines,
        this.preferredColumn,
      );
      this.moveTo(result.position, extend, result.preferredColumn);
    });
  }

  moveDocumentStart(extend = false) {
    this.transact(() => {
      this.moveTo(movement.moveDocumentStart(), extend, null);
    });
  }

  moveDocumentEnd(extend = false) {
    this.transact(() => {
      this.moveTo(movement.moveDocumentEnd(this.text), extend, null);
    });
  }

  /** `lineNumber` is 1-indexed. */
  goToLine(lineNumber: number) {
    this.transact(() => {
      this.moveTo(movement.goToLine(this.text, lineNumber), false, null);
    });
  }

  // --- Editing ---

  insertChar(char: string) {
    this.insertText(char);
  }

  /** Replaces the selection, if any, and leaves the cursor after `text`. */
  insertText(text: string) {
    this.transact(() => {
      this.insertAtCursor(normalizeLineEndings(text), this.clock());
    });
  }

  backspace() {
    this.transact(() => {
      const timestamp = this.clock();
      if (this.deleteSelection(timestamp)) {
        return;
      }

      const index = this.cursorIndex();
      if (index === 0) {
        return;
      }

      const { line, column } = this.state.cursor;
      const step =
        column > 0
          ? codePointLengthBefore(this.text.getLine(line) ?? "", column)
          : 1;
      this.deleteRange(index - step, index, timestamp, true);
    });
  }

  delete() {
    this.transact(() => {
      const timestamp = this.clock();
      if (this.deleteSelection(timestamp)) {
        return;
      }

      const index = this.cursorIndex();
      if (index >= this.text.length) {
        return;
      }

      const { line, column } = this.state.cursor;
      const content = this.text.getLine(line) ?? "";
      const step =
        column < content.length ? codePointLengthAfter(content, column) : 1;
      this.deleteRange(index, index + step, timestamp, false);
    });
  }

  deleteWordLeft() {
    this.transact(() => {
      const timestamp = this.clock();
      if (this.deleteSelection(timestamp)) {
        return;
      }

      const index = this.cursorIndex();
      if (index === 0) {
        return;
      }
      this.deleteRange(
        this.text.prevWordBoundary(index),
        index,
        timestamp,
        true,
      );
    });
  }

  deleteWordRight() {
    this.transact(() => {
      const timestamp = this.clock();
      if (this.deleteSelection(timestamp)) {
        return;
      }

      const index = this.cursorIndex();
      const end = this.text.nextWordBoundary(index);
      if (end <= index) {
        return;
      }
      this.deleteRange(index, end, timestamp, false);
    });
  }

  // --- History ---

  undo(): boolean {
    return this.transact(() => {
      const operation = this.history.undo();
      if (!operation) {
        return false;
      }
      revertOperation(this.text, operation);
      const start = movement.clampPosition(
        this.text,
        operation.selectionBefore.start,
      );
      const end = movement.clampPosition(this.text, operation.selectionBefore.end);
      this.state.selection = createSelection(start, end);
      this.state.cursor = movement.clampPosition(
        this.text,
        operation.cursorBefore,
      );
      this.preferredColumn = null;
      this.updateScroll();
      return true;
    });
  }

  redo(): boolean {
    return this.transact(() => {
      const operation = this.history.redo();
      if (!operation) {
        return false;
      }
      reapplyOperation(this.text, operation);
      this.collapseTo(movement.clampPosition(this.text, operation.cursorAfter));
      return true;
    });
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  // --- Viewport ---

  getScrollLine(): number {
    return this.scrollLine;
  }

  getViewportLines(): number {
    return this.viewportLines;
  }

  setViewportLines(lines: number) {
    this.viewportLines = Number.isNaN(lines) ? 1 : Math.max(1, Math.trunc(lines));
    this.updateScroll();
  }

  setScrollMargin(margin: number) {
    this.scrollMargin = clampIndex(margin, Number.MAX_SAFE_INTEGER);
    this.updateScroll();
  }

  /** Scrolls without moving the cursor. */
  setScrollLine(line: number) {
    this.scrollLine = clampIndex(line, this.text.lineCount() - 1);
  }

  getVisibleLines(): string[] {
    const end = Math.min(
      this.scrollLine + this.viewportLines,
      this.text.lineCount(),
    );
    const lines: string[] = [];
    for (let line = this.scrollLine; line < end; line += 1) {
      lines.push(this.text.getLine(line) ?? "");
    }
    return lines;
  }

  // --- Find results ---

  /**
   * Stores match ranges, clamped and sorted by start. A range overlapping one
   * already kept is dropped.
   */
  setFindResults(ranges: CharRange[]) {
    const length = this.text.length;
    const sorted = ranges
      .map((range) => {
        const start = clampIndex(range.start, length);
        return { start, end: Math.max(start, clampIndex(range.end, length)) };
      })
      .sort((a, b) => a.start - b.start || a.end - b.end);

    // An overlapping or repeated match yields to the earlier one.
    const kept: CharRange[] = [];
    for (const range of sorted) {
      const last = kept[kept.length - 1];
      if (
        last === undefined ||
        (range.start >= last.end &&
          !(range.start === last.start && range.end === last.end))
      ) {
        kept.push(range);
      }
    }
    this.state.findResults = kept;
    this.state.currentFindIndex = null;
  }

  getFindResults(): CharRange[] {
    return this.state.findResults.map((range) => ({ ...range }));
  }

  getCurrentFindIndex(): number | null {
    return this.state.currentFindIndex;
  }

  clearFindResults() {
    this.state.findResults = [];
    this.state.currentFindIndex = null;
  }

  nextFindResult(): CharRange | null {
    const count = this.state.findResults.length;
    if (count === 0) {
      return null;
    }
    const current = this.state.currentFindIndex;
    return this.selectFindResult(current === null ? 0 : (current + 1) % count);
  }

  prevFindResult(): CharRange | null {
    const count = this.state.findResults.length;
    if (count === 0) {
      return null;
    }
    const current = this.state.currentFindIndex;
    return this.selectFindResult(
      current === null || current === 0 ? count - 1 : current - 1,
    );
  }

  /**
   * Replaces the current match. Later matches shift by the length change and
   * the current index steps back so the next `nextFindResult` lands on the
   * match that followed the replaced one.
   */
  replaceCurrentFindResult(text: string): boolean {
    const index = this.state.currentFindIndex;
    if (index === null) {
      return false;
    }
    const range = this.state.findResults[index];
    if (!range) {
      return false;
    }

    this.transact(() => {
      const replacement = normalizeLineEndings(text);
      const delta = this.replaceRange(range, replacement, this.clock());
      const remaining = this.state.findResults.filter((_, i) => i !== index);
      this.state.findResults = remaining.map((other, i) =>
        i < index
          ? other
          : { start: other.start + delta, end: other.end + delta },
      );
      this.state.currentFindIndex =
        index > 0 && remaining.length > 0 ? index - 1 : null;
    });
    return true;
  }

  /** Replaces every match, one history step each, and clears the results. */
  replaceAllFindResults(text: string): number {
    const ranges = this.state.findResults;
    if (ranges.length === 0) {
      return 0;
    }

    this.transact(() => {
      const replacement = normalizeLineEndings(text);
      const timestamp = this.clock();
      let delta = 0;
      for (const range of ranges) {
        delta += this.replaceRange(
          { start: range.start + delta, end: range.end + delta },
          replacement,
          timestamp,
        );
      }
      this.clearFindResults();
    });
    return ranges.length;
  }

  // --- Commands ---

  /** Runs `command`; true when the document, cursor or selection changed. */
  applyCommand(command: SessionCommand): boolean {
    const before = this.snapshot();
    this.transact(() => this.dispatch(command));
    return this.changedSince(before);
  }

  private dispatch(command: SessionCommand) {
    switch (command.type) {
      case "move":
        this.move(command.direction, command.extend ?? false);
        return;
      case "insert":
        this.insertText(command.text);
        return;
      case "insert-line-break":
        this.insertText("\n");
        return;
      case "delete-backward":
        this.backspace();
        return;
      case "delete-forward":
        this.delete();
        return;
      case "delete-word-backward":
        this.deleteWordLeft();
        return;
      case "delete-word-forward":
        this.deleteWordRight();
        return;
      case "replace-find-result":
        this.replaceCurrentFindResult(command.text);
        return;
      case "replace-all-find-results":
        this.replaceAllFindResults(command.text);
        return;
      case "go-to-line":
        this.goToLine(command.line);
        return;
      case "select-all":
        this.selectAll();
        return;
      case "select-word":
        this.selectWord();
        return;
      case "clear-selection":
        this.clearSelection();
        return;
      case "next-find-result":
        this.nextFindResult();
        return;
      case "prev-find-result":
        this.prevFindResult();
        return;
      case "undo":
        this.undo();
        return;
      case "redo":
        this.redo();
        return;
    }
  }

  private move(direction: MoveDirection, extend: boolean) {
    switch (direction) {
      case "left":
        this.moveLeft(extend);
        return;
      case "right":
        this.moveRight(extend);
        return;
      case "up":
        this.moveUp(extend);
        return;
      case "down":
        this.moveDown(extend);
        return;
      case "home":
        this.moveHome(extend);
        return;
      case "end":
        this.moveEnd(extend);
        return;
      case "word-left":
        this.moveWordLeft(extend);
        return;
      case "word-right":
        this.moveWordRight(extend);
        return;
      case "page-up":
        this.pageUp(extend);
        return;
      case "page-down":
        this.pageDown(extend);
        return;
      case "document-start":
        this.moveDocumentStart(extend);
        return;
      case "document-end":
        this.moveDocumentEnd(extend);
        return;
    }
  }

  // --- Internals ---

  private cursorIndex(): number {
    return this.indexOf(this.state.cursor);
  }

  private indexOf(position: CursorPosition): number {
    return (
      this.text.lineColToChar(position.line, position.column) ?? this.text.length
    );
  }

  private selectionRange(): CharRange {
    const [start, end] = normalizeSelection(this.state.selection);
    return { start: this.indexOf(start), end: this.indexOf(end) };
  }

  private operationInput(
    position: number,
    text: string,
    cursorAfter: CursorPosition,
    timestamp: number,
  ): OperationInput {
    return {
      position,
      text,
      cursorBefore: this.state.cursor,
      selectionBefore: this.state.selection,
      cursorAfter,
      timestamp,
    };
  }

  /**
   * Extension protocol: with `extend`, a collapsed selection anchors at the
   * cursor before the move and `end` follows the cursor. Otherwise the
   * selection collapses onto the new cursor.
   */
  private moveTo(
    position: CursorPosition,
    extend: boolean,
    preferredColumn: number | null,
  ) {
    const selection = this.state.selection;
    const anchor = isCollapsed(selection) ? this.state.cursor : selection.start;
    this.state.cursor = { ...position };
    this.state.selection = extend
      ? createSelection(anchor, position)
      : collapsedSelection(position);
    this.preferredColumn = preferredColumn;
    this.updateScroll();
  }

  private collapseTo(position: CursorPosition) {
    this.state.cursor = { ...position };
    this.state.selection = collapsedSelection(position);
    this.preferredColumn = null;
    this.updateScroll();
  }

  private selectRange(range: CharRange) {
    const start = this.text.charToLineCol(range.start);
    const end = this.text.charToLineCol(range.end);
    this.state.selection = createSelection(start, end);
    this.state.cursor = end;
    this.preferredColumn = null;
    this.updateScroll();
  }

  private selectFindResult(index: number): CharRange | null {
    const range = this.state.findResults[index];
    if (!range) {
      return null;
    }
    this.state.currentFindIndex = index;
    this.transact(() => this.selectRange(range));
    return { ...range };
  }

  private insertAtCursor(text: string, timestamp: number) {
    if (text.length === 0) {
      this.deleteSelection(timestamp);
      return;
    }

    if (!isCollapsed(this.state.selection)) {
      const range = this.selectionRange();
      const [start] = normalizeSelection(this.state.selection);
      const cursorAfter = movement.advancePosition(start, text);
      const input = this.operationInput(range.start, text, cursorAfter, timestamp);
      const oldText = this.text.replace(range.start, range.end, text);
      this.history.push(createReplaceOperation(input, oldText));
      this.collapseTo(cursorAfter);
      return;
    }

    const index = this.cursorIndex();
    const cursorAfter = movement.advancePosition(this.state.cursor, text);
    const input = this.operationInput(index, text, cursorAfter, timestamp);
    this.text.insert(index, text);
    this.history.push(createInsertOperation(input));
    this.collapseTo(cursorAfter);
  }

  /** Deletes a non-collapsed selection and collapses onto its start. */
  private deleteSelection(timestamp: number): boolean {
    if (isCollapsed(this.state.selection)) {
      return false;
    }
    const range = this.selectionRange();
    const [start] = normalizeSelection(this.state.selection);
    const input = this.operationInput(range.start, "", start, timestamp);
    const removed = this.text.delete(range.start, range.end);
    if (removed.length > 0) {
      this.history.push(createDeleteOperation({ ...input, text: removed }));
    }
    this.collapseTo(start);
    return true;
  }

  /**
   * Removes `[start, end)`. When `moveCursor` is set the cursor lands on
   * `start`, otherwise it stays where it was.
   */
  private deleteRange(
    start: number,
    end: number,
    timestamp: number,
    moveCursor: boolean,
  ) {
    const cursorAfter = moveCursor
      ? this.text.charToLineCol(start)
      : { ...this.state.cursor };
    const input = this.operationInput(start, "", cursorAfter, timestamp);
    const removed = this.text.delete(start, end);
    if (removed.length === 0) {
      return;
    }
    this.history.push(createDeleteOperation({ ...input, text: removed }));
    if (moveCursor) {
      this.collapseTo(cursorAfter);
    } else {
      this.preferredColumn = null;
    }
  }

  /** Replaces `range` with `text`, records it, and returns the length change. */
  private replaceRange(range: CharRange, text: string, timestamp: number): number {
    const oldText = this.text.replace(range.start, range.end, text);
    if (oldText.length === 0 && text.length === 0) {
      return 0;
    }
    const cursorAfter = this.text.charToLineCol(range.start + text.length);
    this.history.push(
      createReplaceOperation(
        this.operationInput(range.start, text, cursorAfter, timestamp),
        oldText,
      ),
    );
    this.collapseTo(cursorAfter);
    return text.length - oldText.length;
  }

  private updateScroll() {
    this.scrollLine = calculateScroll(
      this.state.cursor.line,
      this.scrollLine,
      this.viewportLines,
      this.scrollMargin,
    );
  }

  private snapshot(): SessionSnapshot {
    return {
      version: this.text.version,
      cursor: { ...this.state.cursor },
      selection: createSelection(
        this.state.selection.start,
        this.state.selection.end,
      ),
    };
  }

  private changedSince(snapshot: SessionSnapshot): boolean {
    return (
      snapshot.version !== this.text.version ||
      !positionsEqual(snapshot.cursor, this.state.cursor) ||
      !selectionsEqual(snapshot.selection, this.state.selection)
    );
  }

  /**
   * Runs `action` and notifies observers once, after the outermost call
   * returns, about whatever it changed.
   */
  private transact<T>(action: () => T): T {
    if (this.transactionDepth > 0) {
      return action();
    }

    const before = this.snapshot();
    this.transactionDepth += 1;
    let result: T;
    try {
      result = action();
    } finally {
      this.transactionDepth -= 1;
    }

    if (before.version !== this.text.version) {
      this.onChange?.({ version: this.text.version });
    }
    if (
      !positionsEqual(before.cursor, this.state.cursor) ||
      !selectionsEqual(before.selection, this.state.selection)
    ) {
      this.onSelectionChange?.(
        createSelection(this.state.selection.start, this.state.selection.end),
        { ...this.state.cursor },
      );
    }
    return result;
  }
}
