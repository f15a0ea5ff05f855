import { layoutValueSchema } from "../config.js";
import { ByteBuffer } from "./buffer.js";
import { parseCommand } from "./commands.js";
import type { EditorErrorKind } from "./errors.js";
import { describeError, severityOf } from "./errors.js";
import type { DocumentIO } from "./file-io.js";
import type { FrameWriter } from "./frame.js";
import { History } from "./history.js";
import { HexReader, InputLine } from "./input.js";
import { normalMap, prefixHints, stepKey, type Command, type CommandId, type KeyNode } from "./keymap.js";
import { renderFrame, type RenderView } from "./render.js";
import { parseSearchString, search } from "./search.js";
import {
  allowsPastEnd,
  isAsciiMode,
  isEntryMode,
  isPromptMode,
  STATUS_MAX_LENGTH,
  type Key,
  type Layout,
  type Mode,
  type SearchDirection,
  type Severity,
  type Status,
} from "./state.js";
import { SubstitutionTable, type TableLoadResult } from "./substitution.js";
import { Viewport, type Direction } from "./viewport.js";

export type SessionOptions = {
  layout: Layout;
  /** Rows available for data, the status line excluded. */
  rows?: number;
  cols?: number;
  table?: SubstitutionTable;
};

const ARROWS: Record<string, Direction> = {
  left: "left",
  right: "right",
  up: "up",
  down: "down",
};

/**
 * One editing session: the document, its history, the view on it and the
 * active mode. Keys go in through handleKey, frames come out through refresh.
 */
export class EditorSession {
  readonly buffer = new ByteBuffer();
  readonly history = new History();
  readonly viewport: Viewport;
  table: SubstitutionTable;

  mode: Mode = "NORMAL";
  status: Status | null = null;
  showHelp = false;
  quitRequested = false;
  lastSearch: string | null = null;

  private readonly input = new InputLine();
  private readonly hexInput = new HexReader();
  private pendingNode: KeyNode = normalMap;
  private pendingKeys: string[] = [];
  private readonly commands: Record<CommandId, Command>;

  constructor(
    private readonly io: DocumentIO,
    options: SessionOptions,
  ) {
    this.viewport = new Viewport(this.buffer, options.layout, options.rows, options.cols);
    this.table = options.table ?? new SubstitutionTable();
    this.buffer.onEdit((action) => this.history.record(action));
    this.commands = this.buildCommands();
  }

  get offset(): number {
    return this.viewport.offset;
  }

  /** Loads `path` into the buffer. Throws an IOFailure EditorError. */
  open(path: string) {
    const bytes = this.io.readBytes(path);
    this.buffer.load(bytes, path);
    this.history.clear();
    this.setMode("NORMAL");
    this.viewport.scrollToOffset(0);
    this.setStatus("info", `"${path}" ${bytes.length} bytes`);
  }

  setStatus(severity: Severity, message: string) {
    this.status = { severity, message: message.slice(0, STATUS_MAX_LENGTH) };
  }

  fail(kind: EditorErrorKind, message: string) {
    this.setStatus(severityOf(kind), message);
  }

  setMode(mode: Mode) {
    this.mode = mode;
    this.status = null;
    this.hexInput.reset();
    this.pendingNode = normalMap;
    this.pendingKeys = [];
    if (isPromptMode(mode)) this.input.clear();
    if (!allowsPastEnd(mode)) this.viewport.clampCursor(false);
  }

  handleKey(key: Key) {
    if (this.showHelp) {
      this.showHelp = false;
      return;
    }
    if (this.mode === "NORMAL") this.normalKey(key);
    else if (isPromptMode(this.mode)) this.promptKey(key);
    else if (isEntryMode(this.mode)) this.entryKey(key);
  }

  view(): RenderView {
    let prompt: string | null = null;
    if (this.mode === "COMMAND") prompt = `:${this.input.value}`;
    if (this.mode === "SEARCH") prompt = `/${this.input.value}`;
    return {
      buffer: this.buffer,
      table: this.table,
      viewport: this.viewport,
      mode: this.mode,
      status: this.status,
      prompt,
      showHelp: this.showHelp,
      pendingNibble: this.hexInput.pending,
    };
  }

  /** Composes the frame and hands it to `writer` in a single write. */
  refresh(writer: FrameWriter) {
    writer.write(renderFrame(this.view()));
  }

  resize(rows: number, cols: number) {
    this.viewport.resize(rows, cols);
  }

  /** Moves the cursor to the byte drawn at screen cell (x, y). */
  pointAt(x: number, y: number) {
    if (this.mode !== "NORMAL" || y < 0 || y >= this.viewport.screenRows) return;
    const offset = this.viewport.positionToOffset(x, y);
    this.viewport.reveal(this.viewport.clampOffset(offset, false));
  }

  // --- editing -------------------------------------------------------------

  deleteAtCursor() {
    const offset = this.offset;
    if (this.buffer.delete(offset) === null) {
      this.fail("OutOfRange", this.buffer.length === 0 ? "Buffer is empty" : "Nothing to delete here");
      return;
    }
    this.viewport.clampCursor(allowsPastEnd(this.mode));
  }

  incrementByte(amount: number) {
    if (this.buffer.incrementByte(this.offset, amount) === null) {
      this.fail("OutOfRange", this.buffer.length === 0 ? "Buffer is empty" : "No byte under cursor");
    }
  }

  undo() {
    const action = this.history.undo(this.buffer);
    if (!action) {
      this.fail("EmptyHistory", "Nothing to undo");
      return;
    }
    this.buffer.dirty = true;
    this.viewport.reveal(this.viewport.clampOffset(action.offset, allowsPastEnd(this.mode)));
  }

  redo() {
    const action = this.history.redo(this.buffer);
    if (!action) {
      this.fail("EmptyHistory", "Nothing to redo");
      return;
    }
    this.buffer.dirty = true;
    this.viewport.reveal(this.viewport.clampOffset(action.offset, allowsPastEnd(this.mode)));
  }

  /** Writes the buffer back to its file; false when that failed. */
  write(): boolean {
    const name = this.buffer.filename;
    if (!name) {
      this.fail("IOFailure", "No file name");
      return false;
    }
    try {
      this.io.writeBytes(name, this.buffer.contents());
    } catch (err) {
      this.fail("IOFailure", describeError(err));
      return false;
    }
    this.buffer.markSaved();
    this.setStatus("info", `"${name}" ${this.buffer.length} bytes written`);
    return true;
  }

  quit(force: boolean) {
    if (!force && this.buffer.dirty) {
      this.setStatus("warning", "No write since last change (add ! to override)");
      return;
    }
    this.quitRequested = true;
  }

  /** Replaces the substitution table with the rules in `path`. */
  loadTable(path: string): TableLoadResult | null {
    let text: string;
    try {
      text = this.io.readText(path);
    } catch (err) {
      this.fail("IOFailure", describeError(err));
      return null;
    }
    const table = new SubstitutionTable();
    const result = table.loadFromText(text);
    this.table = table;
    if (result.skipped.length > 0) {
      this.fail(
        "TableLoadPartial",
        `Loaded ${result.loaded} substitutions, skipped line(s) ${result.skipped.join(", ")}`,
      );
    } else {
      this.setStatus("info", `Loaded ${result.loaded} substitutions`);
    }
    return result;
  }

  // --- search --------------------------------------------------------------

  /** Parses and remembers `pattern`, then looks for it forward. */
  submitSearch(pattern: string) {
    const text = pattern === "" ? this.lastSearch : pattern;
    if (text === null) {
      this.setStatus("warning", "No previous search");
      return;
    }
    const parsed = parseSearchString(text);
    if (!parsed.ok) {
      const what =
        parsed.error === "InvalidHex"
          ? `Invalid hex value "${parsed.span}"`
          : `Invalid escape "\\${parsed.span}"`;
      this.fail(parsed.error, `${what} at column ${parsed.index + 1}`);
      return;
    }
    this.lastSearch = text;
    this.find("forward");
  }

  find(direction: SearchDirection) {
    if (this.lastSearch === null) {
      this.setStatus("warning", "No previous search");
      return;
    }
    const parsed = parseSearchString(this.lastSearch);
    if (!parsed.ok) return;

    const haystack = this.buffer.slice(0, this.buffer.length);
    const hit = search(haystack, parsed.bytes, this.offset, direction);
    if (!hit) {
      this.fail("NotFound", `Pattern not found: ${this.lastSearch}`);
      return;
    }
    this.viewport.scrollToOffset(hit.offset);
    if (hit.wrapped) {
      this.setStatus("info", direction === "forward" ? "Search wrapped to top" : "Search wrapped to bottom");
    } else {
      this.status = null;
    }
  }

  // --- commands ------------------------------------------------------------

  executeCommand(text: string) {
    if (text.trim() === "") return;
    const command = parseCommand(text);
    switch (command.kind) {
      case "write":
        this.write();
        return;
      case "quit":
        this.quit(command.force);
        return;
      case "writeQuit":
        if (this.write()) this.quitRequested = true;
        return;
      case "goto":
        if (command.offset > this.buffer.length) {
          this.fail(
            "OutOfRange",
            `Offset ${command.offset} is past the end (${this.buffer.length} bytes)`,
          );
          return;
        }
        this.viewport.scrollToOffset(this.viewport.clampOffset(command.offset, false));
        return;
      case "set": {
        const parsed = layoutValueSchema.safeParse(command.value);
        if (!parsed.success) {
          const issue = parsed.error.issues[0]?.message ?? "invalid value";
          this.setStatus("error", `Invalid ${command.option} "${command.value}": ${issue}`);
          return;
        }
        const layout: Layout = {
          octetsPerLine: this.viewport.octetsPerLine,
          grouping: this.viewport.grouping,
        };
        if (command.option === "octets") layout.octetsPerLine = parsed.data;
        else layout.grouping = parsed.data;
        this.viewport.setLayout(layout);
        this.setStatus("info", `${command.option} = ${parsed.data}`);
        return;
      }
      case "help":
        this.showHelp = !this.showHelp;
        return;
      case "table":
        this.loadTable(command.path);
        return;
      case "unknown": {
        const hint = command.suggestion ? ` (did you mean :${command.suggestion}?)` : "";
        this.setStatus("error", `Unknown command: ${command.text}${hint}`);
        return;
      }
    }
  }

  // --- key handling per mode -----------------------------------------------

  private normalKey(key: Key) {
    if (key.name === "escape") {
      if (this.pendingKeys.length > 0) this.status = null;
      this.pendingNode = normalMap;
      this.pendingKeys = [];
      return;
    }

    const next = stepKey(this.pendingNode, key.name);
    if (!next) {
      const seq = [...this.pendingKeys, key.name].join(" ");
      this.pendingNode = normalMap;
      this.pendingKeys = [];
      this.setStatus("warning", `No binding for: ${seq}`);
      return;
    }

    if (next.kind === "bind") {
      if (this.pendingKeys.length > 0) this.status = null;
      this.pendingNode = normalMap;
      this.pendingKeys = [];
      this.commands[next.command].run();
      return;
    }

    this.pendingNode = next;
    this.pendingKeys.push(key.name);
    this.setStatus("info", `${this.pendingKeys.join(" ")}: ${prefixHints(next)}`);
  }

  private entryKey(key: Key) {
    if (key.name === "escape") return this.setMode("NORMAL");

    if (key.name === "backspace") {
      if (this.hexInput.pending !== null) return this.hexInput.reset();
      if (this.mode === "REPLACE" || this.mode === "REPLACE_ASCII") return this.move("left", 1);
      const offset = this.offset;
      if (this.mode === "APPEND" || this.mode === "APPEND_ASCII") {
        // appended bytes sit under the cursor
        if (this.buffer.delete(offset) === null) return;
        this.viewport.reveal(Math.max(0, offset - 1));
        return;
      }
      if (offset === 0) return;
      this.buffer.delete(offset - 1);
      this.viewport.reveal(offset - 1);
      return;
    }

    const arrow = Object.hasOwn(ARROWS, key.name) ? ARROWS[key.name] : undefined;
    if (arrow) {
      this.hexInput.reset();
      return this.move(arrow, 1);
    }

    const ch = key.char;
    if (ch === undefined) return;

    if (isAsciiMode(this.mode)) {
      const code = ch.codePointAt(0) ?? 0;
      if (ch.length !== 1 || code > 0xff) {
        this.setStatus("warning", `"${ch}" is not a single byte`);
        return;
      }
      this.commitByte(code);
      return;
    }

    const fed = this.hexInput.feed(ch);
    if (fed.kind === "invalid") {
      this.fail("InvalidHex", `Invalid hex character "${ch}"`);
    } else if (fed.kind === "byte") {
      this.commitByte(fed.value);
    } else {
      this.status = null;
    }
  }

  private commitByte(byte: number) {
    const offset = this.offset;
    switch (this.mode) {
      case "INSERT":
      case "INSERT_ASCII": {
        const at = this.buffer.insert(offset, byte);
        if (at !== null) this.viewport.reveal(at + 1);
        return;
      }
      case "APPEND":
      case "APPEND_ASCII": {
        const at = this.buffer.insert(offset, byte, offset < this.buffer.length);
        if (at !== null) this.viewport.reveal(at);
        return;
      }
      case "REPLACE":
      case "REPLACE_ASCII":
        if (this.buffer.replace(offset, byte) === null) {
          this.fail("OutOfRange", "Nothing to replace here");
          return;
        }
        this.move("right", 1);
        return;
      default:
        return;
    }
  }

  private promptKey(key: Key) {
    if (key.name === "escape") return this.setMode("NORMAL");

    if (key.name === "enter") {
      const text = this.input.value;
      const wasCommand = this.mode === "COMMAND";
      this.setMode("NORMAL");
      if (wasCommand) this.executeCommand(text);
      else this.submitSearch(text);
      return;
    }

    if (key.name === "backspace") {
      if (this.input.length === 0) return this.setMode("NORMAL");
      this.input.backspace();
      return;
    }

    const ch = key.char;
    if (ch === undefined) return;
    if (!this.input.push(ch)) {
      this.setStatus("warning", `Input is limited to ${this.input.capacity} characters`);
    }
  }

  private move(direction: Direction, amount: number) {
    this.viewport.moveCursor(direction, amount, allowsPastEnd(this.mode));
  }

  private pageBy(lines: number) {
    const before = this.offset;
    this.viewport.scroll(lines);
    if (this.offset === before) this.move(lines > 0 ? "down" : "up", Math.abs(lines));
    this.viewport.clampCursor(allowsPastEnd(this.mode));
  }

  private buildCommands(): Record<CommandId, Command> {
    const command = (id: CommandId, title: string, run: () => void): Command => ({
      id,
      title,
      run,
    });
    const halfPage = () => Math.max(1, Math.floor(this.viewport.screenRows / 2));

    return {
      "cursor.left": command("cursor.left", "Move left", () => this.move("left", 1)),
      "cursor.right": command("cursor.right", "Move right", () => this.move("right", 1)),
      "cursor.up": command("cursor.up", "Move up", () => this.move("up", 1)),
      "cursor.down": command("cursor.down", "Move down", () => this.move("down", 1)),
      "cursor.nextGroup": command("cursor.nextGroup", "Next group", () => {
        const g = this.viewport.grouping;
        this.move("right", g - (this.viewport.cursor.col % g));
      }),
      "cursor.prevGroup": command("cursor.prevGroup", "Previous group", () => {
        const g = this.viewport.grouping;
        const into = this.viewport.cursor.col % g;
        this.move("left", into === 0 ? g : into);
      }),
      "cursor.lineStart": command("cursor.lineStart", "Start of line", () =>
        this.viewport.reveal(this.offset - this.viewport.cursor.col),
      ),
      "cursor.lineEnd": command("cursor.lineEnd", "End of line", () => {
        const end = this.offset - this.viewport.cursor.col + this.viewport.octetsPerLine - 1;
        this.viewport.reveal(this.viewport.clampOffset(end, false));
      }),
      "cursor.fileStart": command("cursor.fileStart", "Start of file", () =>
        this.viewport.scrollToOffset(0),
      ),
      "cursor.fileEnd": command("cursor.fileEnd", "End of file", () =>
        this.viewport.scrollToOffset(this.viewport.clampOffset(this.buffer.length, false)),
      ),
      "cursor.pageDown": command("cursor.pageDown", "Page down", () =>
        this.pageBy(this.viewport.screenRows),
      ),
      "cursor.pageUp": command("cursor.pageUp", "Page up", () =>
        this.pageBy(-this.viewport.screenRows),
      ),
      "cursor.halfPageDown": command("cursor.halfPageDown", "Half page down", () =>
        this.move("down", halfPage()),
      ),
      "cursor.halfPageUp": command("cursor.halfPageUp", "Half page up", () =>
        this.move("up", halfPage()),
      ),
      "byte.delete": command("byte.delete", "Delete byte", () => this.deleteAtCursor()),
      "byte.increment": command("byte.increment", "Increment byte", () => this.incrementByte(1)),
      "byte.decrement": command("byte.decrement", "Decrement byte", () => this.incrementByte(-1)),
      "mode.insert": command("mode.insert", "Insert (hex)", () => this.setMode("INSERT")),
      "mode.insertAscii": command("mode.insertAscii", "Insert (ascii)", () =>
        this.setMode("INSERT_ASCII"),
      ),
      "mode.append": command("mode.append", "Append (hex)", () => this.setMode("APPEND")),
      "mode.appendAscii": command("mode.appendAscii", "Append (ascii)", () =>
        this.setMode("APPEND_ASCII"),
      ),
      "mode.replace": command("mode.replace", "Replace (hex)", () => this.setMode("REPLACE")),
      "mode.replaceAscii": command("mode.replaceAscii", "Replace (ascii)", () =>
        this.setMode("REPLACE_ASCII"),
      ),
      "mode.command": command("mode.command", "Command", () => this.setMode("COMMAND")),
      "mode.search": command("mode.search", "Search", () => this.setMode("SEARCH")),
      "search.next": command("search.next", "Next match", () => this.find("forward")),
      "search.prev": command("search.prev", "Previous match", () => this.find("backward")),
      "history.undo": command("history.undo", "Undo", () => this.undo()),
      "history.redo": command("history.redo", "Redo", () => this.redo()),
      "help.toggle": command("help.toggle", "Toggle help", () => {
        this.showHelp = !this.showHelp;
      }),
      quit: command("quit", "Quit", () => this.quit(false)),
    };
  }
}
