import {
  HISTORY_GROUPING_INTERVAL_MS,
  canMergeOperations,
  mergeOperations,
  operationSize,
  type EditOperation,
} from "./edit-operation";

export const DEFAULT_MAX_HISTORY = 1000;

export type HistoryOptions = {
  maxHistory?: number;
  groupingIntervalMs?: number;
};

type HistoryEntry = {
  operation: EditOperation;
  versionBefore: number;
  versionAfter: number;
};

/**
 * Bounded undo/redo stacks of edit operations.
 *
 * Every push, merge, undo and redo moves `currentVersion` to the version of
 * the state it produces. Pushes and merges mint a new version; undo and redo
 * return to the version recorded on the entry, so walking back to a saved
 * state reports it as saved again.
 */
export class History {
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  private readonly maxHistory: number;
  private readonly groupingIntervalMs: number;
  private nextVersion = 1;
  private currentVersion = 0;
  private savedVersion = 0;

  constructor(options: HistoryOptions = {}) {
    this.maxHistory = Math.max(1, options.maxHistory ?? DEFAULT_MAX_HISTORY);
    this.groupingIntervalMs =
      options.groupingIntervalMs ?? HISTORY_GROUPING_INTERVAL_MS;
  }

  push(operation: EditOperation) {
    const version = this.nextVersion;
    this.nextVersion += 1;

    const last = this.undoStack[this.undoStack.length - 1];
    if (
      last &&
      canMergeOperations(last.operation, operation, this.groupingIntervalMs)
    ) {
      mergeOperations(last.operation, operation);
      last.versionAfter = version;
    } else {
      this.undoStack.push({
        operation,
        versionBefore: this.currentVersion,
        versionAfter: version,
      });
      while (this.undoStack.length > this.maxHistory) {
        this.undoStack.shift();
      }
    }

    this.currentVersion = version;
    this.redoStack = [];
  }

  /** Pops the latest operation for the caller to revert. */
  undo(): EditOperation | null {
    const entry = this.undoStack.pop();
    if (!entry) {
      return null;
    }
    this.redoStack.push(entry);
    this.currentVersion = entry.versionBefore;
    return entry.operation;
  }

  /** Pops the latest undone operation for the caller to re-apply. */
  redo(): EditOperation | null {
    const entry = this.redoStack.pop();
    if (!entry) {
      return null;
    }
    this.undoStack.push(entry);
    this.currentVersion = entry.versionAfter;
    return entry.operation;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  peekUndo(): EditOperation | null {
    return this.undoStack[this.undoStack.length - 1]?.operation ?? null;
  }

  clear() {
    this.undoStack = [];
    this.redoStack = [];
    this.nextVersion = 1;
    this.currentVersion = 0;
    this.savedVersion = 0;
  }

  markSaved() {
    this.savedVersion = this.currentVersion;
  }

  isAtSavedState(): boolean {
    return this.savedVersion === this.currentVersion;
  }

  undoCount(): number {
    return this.undoStack.length;
  }

  redoCount(): number {
    return this.redoStack.length;
  }

  memoryUsage(): number {
    let total = 0;
    for (const entry of this.undoStack) {
      total += operationSize(entry.operation);
    }
    for (const entry of this.redoStack) {
      total += operationSize(entry.operation);
    }
    return total;
  }
}
