export { TextContainer } from "./core/text-container";
export type {
  CharRange,
  CursorPosition,
  EditorState,
  LineEnding,
  Selection,
} from "./core/types";
export {
  collapsedSelection,
  comparePositions,
  createPosition,
  createSelection,
  formatPosition,
  isCollapsed,
  normalizeSelection,
  positionsEqual,
  selectionContains,
  selectionsEqual,
} from "./core/position";

export * from "./engine/cursor-movement";
export { calculateScroll } from "./engine/scroll";

export {
  HISTORY_GROUPING_INTERVAL_MS,
  canMergeOperations,
  createDeleteOperation,
  createInsertOperation,
  createReplaceOperation,
  mergeOperations,
  reapplyOperation,
  revertOperation,
} from "./history/edit-operation";
export type {
  DeleteOperation,
  EditOperation,
  InsertOperation,
  OperationInput,
  ReplaceOperation,
} from "./history/edit-operation";
export { DEFAULT_MAX_HISTORY, History } from "./history/history";
export type { HistoryOptions } from "./history/history";

export { EditSession } from "./editor/edit-session";
export { SessionRegistry } from "./editor/session-registry";
export {
  SessionOptionsError,
  defaultSessionOptions,
  resolveSessionOptions,
} from "./editor/options";
export type {
  EditSessionOptions,
  ResolvedSessionOptions,
  SessionChangeEvent,
} from "./editor/options";

// Command types for use with applyCommand
export type {
  EditCommand,
  MoveCommand,
  MoveDirection,
  SessionCommand,
} from "./editor/commands";

export type { Clock } from "./shared/clock";
export { monotonicClock } from "./shared/clock";
export { lineEndingLabel } from "./shared/line-ending";
