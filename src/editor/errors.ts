import type { Severity } from "./state.js";

export type EditorErrorKind =
  | "OutOfRange"
  | "InvalidHex"
  | "InvalidEscape"
  | "EmptyHistory"
  | "NotFound"
  | "TableLoadPartial"
  | "IOFailure";

export class EditorError extends Error {
  readonly kind: EditorErrorKind;

  constructor(kind: EditorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EditorError";
    this.kind = kind;
  }
}

export function severityOf(kind: EditorErrorKind): Severity {
  switch (kind) {
    case "NotFound":
    case "TableLoadPartial":
    case "EmptyHistory":
      return "warning";
    case "OutOfRange":
    case "InvalidHex":
    case "InvalidEscape":
    case "IOFailure":
      return "error";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
