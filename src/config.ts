import { z } from "zod";

export const VERSION = "0.1.0";

/** Octets per line and grouping, both at startup and for `:set`. */
export const layoutValueSchema = z.coerce.number().int().min(1).max(64);

export const optionsSchema = z.object({
  file: z.string().min(1, "a file to open is required"),
  octetsPerLine: layoutValueSchema.default(16),
  grouping: layoutValueSchema.default(4),
  table: z.string().min(1).optional(),
});

export type Options = z.infer<typeof optionsSchema>;

export type ParsedArgs =
  | { kind: "run"; options: Options }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const USAGE = `usage: octed [options] <file>

  -o, --octets N     octets per line (default 16)
  -g, --grouping N   bytes per group (default 4)
  -t, --table PATH   substitution table file
  -h, --help         show this help
  -v, --version      show version`;

const VALUE_FLAGS: Record<string, "octetsPerLine" | "grouping" | "table"> = {
  "-o": "octetsPerLine",
  "--octets": "octetsPerLine",
  "-g": "grouping",
  "--grouping": "grouping",
  "-t": "table",
  "--table": "table",
};

/** Parses the arguments after the script name (process.argv.slice(2)). */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const raw: Record<string, unknown> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") return { kind: "help" };
    if (arg === "-v" || arg === "--version") return { kind: "version" };

    if (Object.hasOwn(VALUE_FLAGS, arg)) {
      const value = argv[i + 1];
      if (value === undefined) return { kind: "error", message: `${arg} needs a value` };
      raw[VALUE_FLAGS[arg]] = value;
      i++;
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      return { kind: "error", message: `unknown option ${arg}` };
    }
    positional.push(arg);
  }

  if (positional.length > 1) {
    return { kind: "error", message: "only one file can be opened" };
  }
  raw.file = positional[0] ?? "";

  const parsed = optionsSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    return { kind: "error", message };
  }
  return { kind: "run", options: parsed.data };
}
