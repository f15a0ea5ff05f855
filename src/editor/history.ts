import type { ByteBuffer, EditAction } from "./buffer.js";

export function invert(action: EditAction): EditAction {
  switch (action.kind) {
    case "insert":
      return { kind: "delete", offset: action.offset, byte: action.byte };
    case "delete":
      return { kind: "insert", offset: action.offset, byte: action.byte };
    case "replace":
      return {
        kind: "replace",
        offset: action.offset,
        oldByte: action.newByte,
        newByte: action.oldByte,
      };
  }
}

/** Applies `action` to `buf` without reporting it; false if it did not fit. */
export function applyAction(buf: ByteBuffer, action: EditAction): boolean {
  return buf.silently(() => {
    switch (action.kind) {
      case "insert":
        return buf.insert(action.offset, action.byte) !== null;
      case "delete":
        return buf.delete(action.offset) !== null;
      case "replace":
        return buf.replace(action.offset, action.newByte) !== null;
    }
  });
}

/**
 * Linear undo history kept as two stacks. Recording a new action drops
 * everything that could have been redone.
 */
export class History {
  private undoStack: EditAction[] = [];
  private redoStack: EditAction[] = [];

  record(action: EditAction) {
    this.undoStack.push(action);
    this.redoStack.length = 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  /** Reverts the newest action and returns it, or null when there is none. */
  undo(buf: ByteBuffer): EditAction | null {
    const action = this.undoStack.pop();
    if (!action) return null;
    if (!applyAction(buf, invert(action))) {
      this.undoStack.push(action);
      return null;
    }
    this.redoStack.push(action);
    return action;
  }

  redo(buf: ByteBuffer): EditAction | null {
    const action = this.redoStack.pop();
    if (!action) return null;
    if (!applyAction(buf, action)) {
      this.redoStack.push(action);
      return null;
    }
    this.undoStack.push(action);
    return action;
  }

  clear() {
    this.undoStack = [];
    this.redoStack = [];
  }
}
