/** Receives one fully composed frame per refresh. */
export interface FrameWriter {
  write(frame: string): void;
}

/**
 * Append-only accumulator for a frame. Nothing reaches the display until the
 * finished text is handed to a FrameWriter in one piece.
 */
export class Frame {
  private parts: string[] = [];
  private lines = 0;

  append(text: string): this {
    this.parts.push(text);
    return this;
  }

  /** Starts a new line holding `text`; `append` continues it. */
  line(text = ""): this {
    if (this.lines > 0) this.parts.push("\n");
    this.parts.push(text);
    this.lines++;
    return this;
  }

  toString(): string {
    return this.parts.join("");
  }
}

/** Escapes blessed tag delimiters in literal text. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (c) => (c === "{" ? "{open}" : "{close}"));
}
