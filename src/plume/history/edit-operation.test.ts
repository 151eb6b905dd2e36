import { afterEach, describe, expect, it, vi } from "vitest";
import { collapsedSelection, createPosition } from "../core/position";
import {
  canMergeOperations,
  createDeleteOperation,
  createInsertOperation,
  createReplaceOperation,
  mergeOperations,
  operationSize,
  reapplyOperation,
  revertOperation,
} from "./edit-operation";
import { TextContainer } from "../core/text-container";

function insertAt(position: number, text: string, timestamp = 0) {
  const before = createPosition(0, position);
  return createInsertOperation({
    position,
    text,
    cursorBefore: before,
    selectionBefore: collapsedSelection(before),
    cursorAfter: createPosition(0, position + text.length),
    timestamp,
  });
}

function deleteAt(
  position: number,
  text: string,
  timestamp: number,
  cursorAfterColumn: number,
) {
  const before = createPosition(0, cursorAfterColumn + text.length);
  return createDeleteOperation({
    position,
    text,
    cursorBefore: before,
    selectionBefore: collapsedSelection(before),
    cursorAfter: createPosition(0, cursorAfterColumn),
    timestamp,
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("canMergeOperations", () => {
  it("merges contiguous typing inside the grouping window", () => {
    expect(canMergeOperations(insertAt(0, "a", 0), insertAt(1, "b", 499))).toBe(
      true,
    );
    expect(canMergeOperations(insertAt(0, "a", 0), insertAt(1, "b", 500))).toBe(
      true,
    );
    expect(canMergeOperations(insertAt(0, "a", 0), insertAt(1, "b", 501))).toBe(
      false,
    );
  });

  it("honours a custom grouping window", () => {
    expect(
      canMergeOperations(insertAt(0, "a", 0), insertAt(1, "b", 0), 0),
    ).toBe(true);
    expect(
      canMergeOperations(insertAt(0, "a", 0), insertAt(1, "b", 1), 0),
    ).toBe(false);
  });

  it("requires inserts to be contiguous", () => {
    expect(canMergeOperations(insertAt(0, "a"), insertAt(5, "b"))).toBe(false);
  });

  it("breaks on a line break", () => {
    expect(canMergeOperations(insertAt(0, "a"), insertAt(1, "\n"))).toBe(false);
  });

  it("breaks on a space typed after a space", () => {
    expect(canMergeOperations(insertAt(0, "a "), insertAt(2, " "))).toBe(false);
    expect(canMergeOperations(insertAt(0, "a"), insertAt(1, " "))).toBe(true);
  });

  it("merges backspace and forward delete runs", () => {
    expect(
      canMergeOperations(deleteAt(5, "c", 0, 5), deleteAt(4, "b", 10, 4)),
    ).toBe(true);
    expect(
      canMergeOperations(deleteAt(3, "x", 0, 3), deleteAt(3, "y", 10, 3)),
    ).toBe(true);
    expect(
      canMergeOperations(deleteAt(5, "c", 0, 5), deleteAt(2, "b", 10, 2)),
    ).toBe(false);
  });

  it("does not merge deletes that span a line break", () => {
    expect(
      canMergeOperations(deleteAt(5, "c", 0, 5), deleteAt(4, "\n", 10, 4)),
    ).toBe(false);
  });

  it("never merges across kinds or replacements", () => {
    expect(canMergeOperations(insertAt(0, "a"), deleteAt(0, "a", 0, 0))).toBe(
      false,
    );
    const replace = createReplaceOperation(
      {
        position: 0,
        text: "x",
        cursorBefore: createPosition(0, 0),
        selectionBefore: collapsedSelection(createPosition(0, 0)),
        cursorAfter: createPosition(0, 1),
        timestamp: 0,
      },
      "old",
    );
    expect(canMergeOperations(replace, insertAt(1, "y"))).toBe(false);
  });
});

describe("mergeOperations", () => {
  it("appends typed text and takes the later cursor and timestamp", () => {
    const target = insertAt(0, "he", 0);
    mergeOperations(target, insertAt(2, "y", 120));

    expect(target.text).toBe("hey");
    expect(target.position).toBe(0);
    expect(target.cursorBefore).toEqual(createPosition(0, 0));
    expect(target.cursorAfter).toEqual(createPosition(0, 3));
    expect(target.timestamp).toBe(120);
  });

  it("prepends backspaced text and moves the position back", () => {
    const target = deleteAt(5, "c", 0, 5);
    mergeOperations(target, deleteAt(4, "b", 10, 4));

    expect(target.text).toBe("bc");
    expect(target.position).toBe(4);
    expect(target.cursorAfter).toEqual(createPosition(0, 4));
  });

  it("appends forward-deleted text", () => {
    const target = deleteAt(3, "x", 0, 3);
    mergeOperations(target, deleteAt(3, "y", 10, 3));

    expect(target.text).toBe("xy");
    expect(target.position).toBe(3);
  });

  it("warns and leaves the target alone for incompatible kinds", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const target = insertAt(0, "a", 0);
    mergeOperations(target, deleteAt(0, "a", 10, 0));

    expect(warn).toHaveBeenCalledWith("Cannot merge delete into insert");
    expect(target.text).toBe("a");
    expect(target.timestamp).toBe(0);
  });
});

describe("operation construction", () => {
  it("copies positions so later edits of the input do not leak in", () => {
    const before = createPosition(0, 1);
    const op = createInsertOperation({
      position: 1,
      text: "a",
      cursorBefore: before,
      selectionBefore: collapsedSelection(before),
      cursorAfter: createPosition(0, 2),
      timestamp: 0,
    });
    before.column = 9;
    expect(op.cursorBefore).toEqual(createPosition(0, 1));
  });

  it("sizes operations by text plus fixed overhead", () => {
    expect(operationSize(insertAt(0, "abc"))).toBe(131);
    const replace = createReplaceOperation(
      {
        position: 0,
        text: "xy",
        cursorBefore: createPosition(0, 0),
        selectionBefore: collapsedSelection(createPosition(0, 0)),
        cursorAfter: createPosition(0, 2),
        timestamp: 0,
      },
      "hello",
    );
    expect(operationSize(replace)).toBe(135);
  });
});

describe("reverting and re-applying", () => {
  it("round-trips an insert", () => {
    const text = new TextContainer("ac");
    text.insert(1, "b");
    const op = insertAt(1, "b");

    revertOperation(text, op);
    expect(text.toString()).toBe("ac");
    reapplyOperation(text, op);
    expect(text.toString()).toBe("abc");
  });

  it("round-trips a delete", () => {
    const text = new TextContainer("abc");
    text.delete(1, 2);
    const op = deleteAt(1, "b", 0, 1);

    revertOperation(text, op);
    expect(text.toString()).toBe("abc");
    reapplyOperation(text, op);
    expect(text.toString()).toBe("ac");
  });

  it("round-trips a replacement of a different length", () => {
    const text = new TextContainer("say hello");
    text.replace(4, 9, "hi");
    const op = createReplaceOperation(
      {
        position: 4,
        text: "hi",
        cursorBefore: createPosition(0, 9),
        selectionBefore: collapsedSelection(createPosition(0, 9)),
        cursorAfter: createPosition(0, 6),
        timestamp: 0,
      },
      "hello",
    );

    revertOperation(text, op);
    expect(text.toString()).toBe("say hello");
    reapplyOperation(text, op);
    expect(text.toString()).toBe("say hi");
  });
});
