import { EditorError } from "./errors.js";
import type { DocumentIO } from "./file-io.js";
import type { EditorSession } from "./session.js";

/** In-memory DocumentIO for tests. */
export function memoryIO(files: Record<string, Uint8Array | string> = {}) {
  const store = new Map<string, Uint8Array | string>(Object.entries(files));
  let failWrites = false;

  const io: DocumentIO = {
    readBytes(path) {
      const entry = store.get(path);
      if (entry === undefined) throw new EditorError("IOFailure", `Cannot open ${path}: ENOENT`);
      return typeof entry === "string" ? new TextEncoder().encode(entry) : entry.slice();
    },
    writeBytes(path, bytes) {
      if (failWrites) throw new EditorError("IOFailure", `Cannot write ${path}: EACCES`);
      store.set(path, bytes.slice());
    },
    readText(path) {
      const entry = store.get(path);
      if (entry === undefined) throw new EditorError("IOFailure", `Cannot read ${path}: ENOENT`);
      return typeof entry === "string" ? entry : new TextDecoder().decode(entry);
    },
  };

  return {
    io,
    store,
    failWrites(on: boolean) {
      failWrites = on;
    },
  };
}

/** Feeds every character of `text` as a printable key. */
export function typeKeys(session: EditorSession, text: string) {
  for (const ch of text) session.handleKey({ name: ch, char: ch });
}

export function press(session: EditorSession, ...names: string[]) {
  for (const name of names) session.handleKey({ name });
}
