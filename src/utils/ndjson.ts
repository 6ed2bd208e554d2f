/**
 * Newline-delimited JSON framing for socket streams.
 *
 * Chunks from a socket may split a line, or a multi-byte UTF-8 character, at
 * any byte; `NDJSONLineBuffer` holds the partial tail until its newline
 * arrives.
 */

/** Serialize a value to an NDJSON line (JSON + newline delimiter). */
export function serializeNDJSON(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}

export class NDJSONLineBuffer {
  private pending = "";
  private readonly decoder = new TextDecoder("utf-8", { fatal: false });

  /** Feed raw bytes or text; returns the complete, non-blank lines so far. */
  feed(chunk: string | Uint8Array): string[] {
    this.pending += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });

    const parts = this.pending.split("\n");
    this.pending = parts.pop() ?? "";

    return parts.map((line) => line.replace(/\r$/, "").trim()).filter((line) => line.length > 0);
  }

  /** Remaining unterminated text, if any; clears the buffer. */
  flush(): string | null {
    const rest = (this.pending + this.decoder.decode()).trim();
    this.pending = "";
    return rest || null;
  }
}
