export type Mode =
  | "NORMAL"
  | "INSERT"
  | "INSERT_ASCII"
  | "APPEND"
  | "APPEND_ASCII"
  | "REPLACE"
  | "REPLACE_ASCII"
  | "COMMAND"
  | "SEARCH";

export type Severity = "info" | "warning" | "error";

export type Status = { severity: Severity; message: string };

export const STATUS_MAX_LENGTH = 120;

// One discrete key event. Printable characters use the character as `name`;
// control keys use blessed's full key name ("escape", "C-r", "pagedown").
export type Key = { name: string; char?: string };

export type SearchDirection = "forward" | "backward";

export type Layout = {
  octetsPerLine: number;
  grouping: number;
};

export function isEntryMode(mode: Mode): boolean {
  return mode !== "NORMAL" && mode !== "COMMAND" && mode !== "SEARCH";
}

export function isAsciiMode(mode: Mode): boolean {
  return (
    mode === "INSERT_ASCII" || mode === "APPEND_ASCII" || mode === "REPLACE_ASCII"
  );
}

export function isPromptMode(mode: Mode): boolean {
  return mode === "COMMAND" || mode === "SEARCH";
}

/** Modes in which the cursor may sit on the position one past the last byte. */
export function allowsPastEnd(mode: Mode): boolean {
  return (
    mode === "INSERT" ||
    mode === "INSERT_ASCII" ||
    mode === "APPEND" ||
    mode === "APPEND_ASCII"
  );
}

export function modeLabel(mode: Mode): string {
  return mode.replace("_", " ");
}
