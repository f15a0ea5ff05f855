export type CommandId =
  | "cursor.left"
  | "cursor.right"
  | "cursor.up"
  | "cursor.down"
  | "cursor.nextGroup"
  | "cursor.prevGroup"
  | "cursor.lineStart"
  | "cursor.lineEnd"
  | "cursor.fileStart"
  | "cursor.fileEnd"
  | "cursor.pageDown"
  | "cursor.pageUp"
  | "cursor.halfPageDown"
  | "cursor.halfPageUp"
  | "byte.delete"
  | "byte.increment"
  | "byte.decrement"
  | "mode.insert"
  | "mode.insertAscii"
  | "mode.append"
  | "mode.appendAscii"
  | "mode.replace"
  | "mode.replaceAscii"
  | "mode.command"
  | "mode.search"
  | "search.next"
  | "search.prev"
  | "history.undo"
  | "history.redo"
  | "help.toggle"
  | "quit";

export type Command = {
  id: CommandId;
  title: string;
  run: () => void;
};

/** A key either completes a binding or opens a prefix that waits for more keys. */
export type KeyNode =
  | { kind: "prefix"; title: string; next: Record<string, KeyNode> }
  | { kind: "bind"; title: string; command: CommandId };

export const prefix = (title: string, next: Record<string, KeyNode>): KeyNode => ({
  kind: "prefix",
  title,
  next,
});

export const bind = (title: string, command: CommandId): KeyNode => ({
  kind: "bind",
  title,
  command,
});

// Normal mode. Printable keys are bound by character, the rest by blessed's
// full key name.
export const normalMap: KeyNode = prefix("normal", {
  h: bind("Move left", "cursor.left"),
  left: bind("Move left", "cursor.left"),
  l: bind("Move right", "cursor.right"),
  right: bind("Move right", "cursor.right"),
  k: bind("Move up", "cursor.up"),
  up: bind("Move up", "cursor.up"),
  j: bind("Move down", "cursor.down"),
  down: bind("Move down", "cursor.down"),
  w: bind("Next group", "cursor.nextGroup"),
  b: bind("Previous group", "cursor.prevGroup"),
  "0": bind("Start of line", "cursor.lineStart"),
  home: bind("Start of line", "cursor.lineStart"),
  $: bind("End of line", "cursor.lineEnd"),
  end: bind("End of line", "cursor.lineEnd"),
  g: prefix("go to", {
    g: bind("Start of file", "cursor.fileStart"),
  }),
  G: bind("End of file", "cursor.fileEnd"),
  "C-f": bind("Page down", "cursor.pageDown"),
  pagedown: bind("Page down", "cursor.pageDown"),
  "C-b": bind("Page up", "cursor.pageUp"),
  pageup: bind("Page up", "cursor.pageUp"),
  "C-d": bind("Half page down", "cursor.halfPageDown"),
  "C-u": bind("Half page up", "cursor.halfPageUp"),
  x: bind("Delete byte", "byte.delete"),
  delete: bind("Delete byte", "byte.delete"),
  "]": bind("Increment byte", "byte.increment"),
  "[": bind("Decrement byte", "byte.decrement"),
  i: bind("Insert (hex)", "mode.insert"),
  I: bind("Insert (ascii)", "mode.insertAscii"),
  a: bind("Append (hex)", "mode.append"),
  A: bind("Append (ascii)", "mode.appendAscii"),
  r: bind("Replace (hex)", "mode.replace"),
  R: bind("Replace (ascii)", "mode.replaceAscii"),
  ":": bind("Command", "mode.command"),
  "/": bind("Search", "mode.search"),
  n: bind("Next match", "search.next"),
  N: bind("Previous match", "search.prev"),
  u: bind("Undo", "history.undo"),
  "C-r": bind("Redo", "history.redo"),
  "?": bind("Toggle help", "help.toggle"),
  "C-q": bind("Quit", "quit"),
  "C-c": bind("Quit", "quit"),
});

/** "key title" for each continuation of a pending prefix, comma separated. */
export function prefixHints(node: KeyNode): string {
  if (node.kind !== "prefix") return "";
  return Object.entries(node.next)
    .map(([key, child]) => `${key} ${child.title}`)
    .join(", ");
}

/** Every command binding under `node`, with prefix keys joined by spaces. */
export function flattenBindings(
  node: KeyNode,
  path: string[] = [],
): Array<{ keys: string; title: string }> {
  if (node.kind === "bind") return [{ keys: path.join(" "), title: node.title }];
  return Object.entries(node.next).flatMap(([key, child]) =>
    flattenBindings(child, [...path, key]),
  );
}

export function stepKey(node: KeyNode, key: string): KeyNode | null {
  if (node.kind !== "prefix") return null;
  return Object.hasOwn(node.next, key) ? node.next[key] : null;
}
