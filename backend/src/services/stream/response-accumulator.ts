import { nanoid } from "nanoid";
import type { AssembledResponse, CitationFragment, Source } from "@lexstream/shared";
import { extractCitations, type ResponseDelta, type StreamPayload } from "./chunk-decoder.js";
import { log } from "../../middleware/logger.js";

export function sourceKey(source: Pick<Source, "url" | "title">): string {
  return `${source.url}\u0000${source.title}`;
}

/**
 * Running state of one streaming call: the text buffer, the ordered source
 * list (unique by url + title) and the last payload that decoded cleanly.
 */
export class ResponseAccumulator {
  private text = "";
  private sources: Source[] = [];
  private seen = new Set<string>();
  private lastPayload: StreamPayload | null = null;
  private frames = 0;

  apply(delta: ResponseDelta): void {
    this.frames++;
    if (delta.text) this.text += delta.text;
    this.merge(delta.citations);
    this.lastPayload = delta.payload;
  }

  get currentText(): string {
    return this.text;
  }

  get frameCount(): number {
    return this.frames;
  }

  /**
   * Some upstream responses only attach grounding metadata to the terminal
   * frame, so the last clean payload is scanned once more across all of its
   * candidates before the response is assembled.
   */
  finalize(lastFullPayload: StreamPayload | null = this.lastPayload): AssembledResponse {
    if (lastFullPayload) {
      const before = this.sources.length;
      this.merge(extractCitations(lastFullPayload));
      const recovered = this.sources.length - before;
      if (recovered > 0) {
        log.debug({ recovered }, "Recovered citations from final payload");
      }
    }

    return {
      fullText: this.text,
      sources: [...this.sources],
      followUpQuestions: [],
    };
  }

  private merge(fragments: CitationFragment[]): void {
    for (const fragment of fragments) {
      const candidate: Source = {
        id: nanoid(),
        title: fragment.title,
        url: fragment.uri,
        ...(fragment.snippet ? { snippet: fragment.snippet } : {}),
      };

      const key = sourceKey(candidate);
      if (this.seen.has(key)) continue;
      this.seen.add(key);
      this.sources.push(candidate);
    }
  }
}
