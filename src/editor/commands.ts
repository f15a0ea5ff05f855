import { closestMatch } from "./fuzzy.js";

export type ExCommand =
  | { kind: "write" }
  | { kind: "quit"; force: boolean }
  | { kind: "writeQuit" }
  | { kind: "goto"; offset: number }
  | { kind: "set"; option: "octets" | "grouping"; value: string }
  | { kind: "help" }
  | { kind: "table"; path: string }
  | { kind: "unknown"; text: string; suggestion: string | null };

/** Command words accepted at the `:` prompt, as shown in help. */
export const COMMAND_WORDS: Array<{ word: string; title: string }> = [
  { word: "w", title: "Write file" },
  { word: "q", title: "Quit" },
  { word: "q!", title: "Quit without saving" },
  { word: "wq", title: "Write and quit" },
  { word: "set octets=N", title: "Octets per line (alias o)" },
  { word: "set grouping=N", title: "Bytes per group (alias g)" },
  { word: "table PATH", title: "Load substitution table" },
  { word: "help", title: "Toggle help" },
  { word: "N / 0xN", title: "Go to offset" },
];

const OPTION_NAMES: Record<string, "octets" | "grouping"> = {
  o: "octets",
  octets: "octets",
  g: "grouping",
  grouping: "grouping",
};

function unknown(text: string): ExCommand {
  const word = text.split(/\s+/)[0] ?? text;
  const candidates = ["write", "quit", "wq", "set", "help", "table"];
  return { kind: "unknown", text, suggestion: closestMatch(word, candidates) };
}

export function parseCommand(input: string): ExCommand {
  const text = input.trim();

  if (/^(0x[0-9a-f]+|\d+)$/i.test(text)) {
    return { kind: "goto", offset: Number(text) };
  }

  const [word = "", ...rest] = text.split(/\s+/);
  const arg = rest.join(" ");

  switch (word) {
    case "w":
    case "write":
      return arg ? unknown(text) : { kind: "write" };
    case "q":
    case "quit":
      return { kind: "quit", force: false };
    case "q!":
    case "quit!":
      return { kind: "quit", force: true };
    case "wq":
    case "x":
      return { kind: "writeQuit" };
    case "help":
    case "h":
      return { kind: "help" };
    case "table":
      return arg ? { kind: "table", path: arg } : unknown(text);
    case "set": {
      const m = /^(\w+)\s*=\s*(\S*)$/.exec(arg);
      const option = m && Object.hasOwn(OPTION_NAMES, m[1]) ? OPTION_NAMES[m[1]] : undefined;
      if (!m || !option) return unknown(text);
      return { kind: "set", option, value: m[2] };
    }
    default:
      return unknown(text);
  }
}
