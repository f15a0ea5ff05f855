#!/usr/bin/env node
import blessed from "neo-blessed";

import { parseArgs, USAGE, VERSION } from "./config.js";
import { describeError } from "./editor/errors.js";
import { nodeFileIO } from "./editor/file-io.js";
import type { FrameWriter } from "./editor/frame.js";
import { toKey } from "./editor/keys.js";
import { EditorSession } from "./editor/session.js";

const args = parseArgs(process.argv.slice(2));
if (args.kind === "help") {
  console.log(USAGE);
  process.exit(0);
}
if (args.kind === "version") {
  console.log(`octed ${VERSION}`);
  process.exit(0);
}
if (args.kind === "error") {
  console.error(`octed: ${args.message}\n\n${USAGE}`);
  process.exit(1);
}
const { options } = args;

const session = new EditorSession(nodeFileIO, {
  layout: { octetsPerLine: options.octetsPerLine, grouping: options.grouping },
});

// Nothing is drawn until the document is in memory.
try {
  session.open(options.file);
} catch (err) {
  console.error(`octed: ${describeError(err)}`);
  process.exit(1);
}
if (options.table) session.loadTable(options.table);

const screen = blessed.screen({
  smartCSR: true,
  title: "octed",
  fullUnicode: true,
});

const editorBox = blessed.box({
  top: 0,
  left: 0,
  width: "100%",
  height: "100%",
  tags: true,
  wrap: false,
});
screen.append(editorBox);

const display: FrameWriter = {
  write(frame) {
    editorBox.setContent(frame);
    screen.render();
  },
};

function syncSize() {
  // the bottom line holds status and ruler
  session.resize(Number(screen.height) - 1, Number(screen.width));
}

function render() {
  session.refresh(display);
}

function shutdown(code: number) {
  screen.destroy();
  process.exit(code);
}

screen.on("keypress", (ch: string | undefined, key: blessed.Widgets.Events.IKeyEventArg) => {
  const k = toKey(ch, key);
  if (!k) return;
  session.handleKey(k);
  if (session.quitRequested) return shutdown(0);
  render();
});

screen.on("resize", () => {
  syncSize();
  render();
});

editorBox.enableMouse();
editorBox.on("click", (data: blessed.Widgets.Events.IMouseEventArg) => {
  session.pointAt(data.x, data.y);
  render();
});

editorBox.focus();
syncSize();
render();
