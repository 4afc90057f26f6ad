/**
 * One `data:` payload pulled out of a `text/event-stream` block.
 */
export type Frame = {
  data: string;
};

const TERMINATOR = "\n\n";
const DATA_PREFIX = "data:";
const DONE_SENTINEL = "[DONE]";

/**
 * Incremental SSE framer. Bytes may arrive split at any boundary, including
 * inside a multi-byte character or between the two newlines of a terminator;
 * the frames produced are the same as for a single-shot feed.
 */
export class FrameReader {
  private buffer = "";
  private decoder = new TextDecoder();

  ingest(chunk: Uint8Array | string): Frame[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.append(text);
    return this.drain();
  }

  /**
   * Emit whatever is left once the transport has closed.
   */
  flush(): Frame[] {
    this.append(this.decoder.decode());
    const frames = this.drain();

    const rest = this.buffer;
    this.buffer = "";
    if (rest.length > 0) frames.push(...parseBlock(rest));
    return frames;
  }

  private append(text: string): void {
    if (!text) return;
    // A trailing "\r" stays in the buffer until its "\n" shows up.
    this.buffer = (this.buffer + text).replace(/\r\n/g, "\n");
  }

  private drain(): Frame[] {
    const frames: Frame[] = [];
    let idx: number;
    while ((idx = this.buffer.indexOf(TERMINATOR)) !== -1) {
      const block = this.buffer.slice(0, idx);
      this.buffer = this.buffer.slice(idx + TERMINATOR.length);
      frames.push(...parseBlock(block));
    }
    return frames;
  }
}

function parseBlock(block: string): Frame[] {
  const frames: Frame[] = [];
  for (const rawLine of block.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (!line.startsWith(DATA_PREFIX)) continue;

    // Field values drop a single leading space, nothing more.
    const rest = line.slice(DATA_PREFIX.length);
    const data = rest.startsWith(" ") ? rest.slice(1) : rest;
    if (data.trim().length === 0 || data.trim() === DONE_SENTINEL) continue;
    frames.push({ data });
  }
  return frames;
}
