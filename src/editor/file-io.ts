import fs from "node:fs";

import { EditorError } from "./errors.js";

/** File access the editor needs; the session never opens files itself. */
export interface DocumentIO {
  readBytes(path: string): Uint8Array;
  writeBytes(path: string, bytes: Uint8Array): void;
  readText(path: string): string;
}

export const nodeFileIO: DocumentIO = {
  readBytes(path) {
    try {
      return new Uint8Array(fs.readFileSync(path));
    } catch (err) {
      throw new EditorError("IOFailure", `Cannot open ${path}: ${reason(err)}`, {
        cause: err,
      });
    }
  },

  writeBytes(path, bytes) {
    try {
      fs.writeFileSync(path, bytes);
    } catch (err) {
      throw new EditorError("IOFailure", `Cannot write ${path}: ${reason(err)}`, {
        cause: err,
      });
    }
  },

  readText(path) {
    try {
      return fs.readFileSync(path, "utf8");
    } catch (err) {
      throw new EditorError("IOFailure", `Cannot read ${path}: ${reason(err)}`, {
        cause: err,
      });
    }
  },
};

function reason(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return err instanceof Error ? err.message : String(err);
}
