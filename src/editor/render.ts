import type { ByteBuffer } from "./buffer.js";
import { COMMAND_WORDS } from "./commands.js";
import { escapeTags, Frame } from "./frame.js";
import { flattenBindings, normalMap } from "./keymap.js";
import type { Mode, Severity, Status } from "./state.js";
import { modeLabel } from "./state.js";
import type { SubstitutionTable } from "./substitution.js";
import type { Viewport } from "./viewport.js";

export type RenderView = {
  buffer: ByteBuffer;
  table: SubstitutionTable;
  viewport: Viewport;
  mode: Mode;
  status: Status | null;
  /** Prompt line contents (":w", "/abc") while in a prompt mode. */
  prompt: string | null;
  showHelp: boolean;
  pendingNibble: number | null;
};

const SEVERITY_STYLE: Record<Severity, string> = {
  info: "{white-bg}{black-fg}",
  warning: "{yellow-bg}{black-fg}",
  error: "{red-bg}{white-fg}",
};

export function hex(value: number, width: number): string {
  return value.toString(16).padStart(width, "0");
}

function inverse(text: string): string {
  return `{inverse}${text}{/inverse}`;
}

function glyph(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : ".";
}

/** Control characters inside substitution values would break the row. */
function displayValue(value: string): string {
  return value.replace(/[\u0000-\u001f\u007f]/g, ".");
}

/**
 * ASCII column for `row` (the bytes of one screen line starting at `start`).
 * At each position the longest substitution that fits in the row wins;
 * otherwise the byte's own glyph is drawn.
 */
export function renderAscii(
  row: Uint8Array,
  start: number,
  cursor: number,
  table: SubstitutionTable,
): string {
  let out = "";
  let i = 0;
  while (i < row.length) {
    const hit = table.match(row, i, row.length);
    const span = hit ? hit.length : 1;
    const text = escapeTags(hit ? displayValue(hit.value) : glyph(row[i]));
    const covers = cursor >= start + i && cursor < start + i + span;
    out += covers ? inverse(text) : text;
    i += span;
  }
  return out;
}

function renderRow(view: RenderView, line: number, frame: Frame) {
  const { buffer, viewport } = view;
  const opl = viewport.octetsPerLine;
  const start = line * opl;
  const cursor = viewport.offset;

  frame.line(`${hex(start, 8)}: `);
  for (let i = 0; i < opl; i++) {
    const offset = start + i;
    const byte = buffer.read(offset);
    let cell = byte === undefined ? "  " : hex(byte, 2);
    if (offset === cursor) {
      if (view.pendingNibble !== null) cell = `${hex(view.pendingNibble, 1)}_`;
      cell = inverse(cell);
    }
    frame.append(cell);
    if ((i + 1) % viewport.grouping === 0) frame.append(" ");
  }
  if (opl % viewport.grouping !== 0) frame.append(" ");

  frame.append(renderAscii(buffer.slice(start, start + opl), start, cursor, view.table));
}

export function renderContents(view: RenderView, frame: Frame) {
  const { buffer, viewport } = view;
  const cursor = viewport.offset;
  for (let r = 0; r < viewport.screenRows; r++) {
    const line = viewport.scrollTop + r;
    const start = line * viewport.octetsPerLine;
    if (start < buffer.length || (start === buffer.length && cursor === start)) {
      renderRow(view, line, frame);
    } else {
      frame.line("~");
    }
  }
}

/** Offset in hex and decimal, byte under the cursor, position in the file. */
export function renderRuler(view: RenderView): string {
  const { buffer, viewport } = view;
  const offset = viewport.offset;
  const byte = buffer.read(offset);
  const percent =
    buffer.length === 0 ? 0 : Math.min(100, Math.floor(((offset + 1) * 100) / buffer.length));
  const value = byte === undefined ? "--" : hex(byte, 2);
  return `0x${hex(offset, 8)} (${offset})  byte 0x${value}  ${percent}%`;
}

type Segment = { text: string; style: string };

function leftOfStatusLine(view: RenderView): Segment[] {
  const status: Segment[] = view.status
    ? [{ text: view.status.message, style: SEVERITY_STYLE[view.status.severity] }]
    : [];
  if (view.prompt !== null) {
    return status.length > 0
      ? [{ text: `${view.prompt}  `, style: "" }, ...status]
      : [{ text: view.prompt, style: "" }];
  }
  if (status.length > 0) return status;
  if (view.mode !== "NORMAL") return [{ text: `-- ${modeLabel(view.mode)} --`, style: "" }];
  const name = view.buffer.filename ?? "[No File]";
  return [{ text: `${name}${view.buffer.dirty ? " [+]" : ""}`, style: "" }];
}

/** Status (or prompt) on the left, ruler on the right, cut to the screen width. */
export function renderStatusLine(view: RenderView): string {
  const cols = view.viewport.screenCols;
  const ruler = renderRuler(view);
  let room = Math.max(0, cols - ruler.length - 1);

  let out = "";
  let used = 0;
  for (const seg of leftOfStatusLine(view)) {
    const text = seg.text.slice(0, room);
    room -= text.length;
    used += text.length;
    out += seg.style && text ? `${seg.style}${escapeTags(text)}{/}` : escapeTags(text);
  }
  return out + " ".repeat(Math.max(1, cols - used - ruler.length)) + ruler;
}

const HELP_COLUMN_WIDTH = 40;

/** Help entries: key bindings sharing a title are listed together. */
export function helpLines(): string[] {
  const byTitle = new Map<string, string[]>();
  for (const b of flattenBindings(normalMap)) {
    byTitle.set(b.title, [...(byTitle.get(b.title) ?? []), b.keys]);
  }

  const lines = ["Keys"];
  for (const [title, keys] of byTitle) {
    lines.push(` ${keys.join(", ").padEnd(14)} ${title}`);
  }
  lines.push("", "Commands");
  for (const c of COMMAND_WORDS) {
    lines.push(` :${c.word.padEnd(15)} ${c.title}`);
  }
  return lines;
}

export function renderHelp(view: RenderView, frame: Frame) {
  const lines = helpLines();
  const rows = view.viewport.screenRows;
  const columns = Math.max(1, Math.floor(view.viewport.screenCols / HELP_COLUMN_WIDTH));

  for (let r = 0; r < rows; r++) {
    let text = "";
    for (let c = 0; c < columns; c++) {
      const entry = lines[c * rows + r];
      if (entry === undefined) break;
      text += entry.slice(0, HELP_COLUMN_WIDTH - 1).padEnd(HELP_COLUMN_WIDTH);
    }
    frame.line(escapeTags(text.trimEnd()));
  }
  frame.line("Press any key to close help");
}

/** Composes the whole screen: data rows (or help) and the bottom line. */
export function renderFrame(view: RenderView): string {
  const frame = new Frame();
  if (view.showHelp) {
    renderHelp(view, frame);
  } else {
    renderContents(view, frame);
    frame.line(renderStatusLine(view));
  }
  return frame.toString();
}
