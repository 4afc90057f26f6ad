import type { SSEStreamingApi } from "hono/streaming";
import type { StreamEvent, TurnCompletion } from "@lexstream/shared";
import type { PresentationSink } from "../services/conversation-session.js";
import { log } from "../middleware/logger.js";

/**
 * Presentation sink over an SSE stream. Reveals arrive synchronously from
 * the playback loop, so writes are chained to keep them in order.
 */
export class SseChannel implements PresentationSink {
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private stream: SSEStreamingApi,
    private requestId: string,
  ) {}

  send(event: StreamEvent): void {
    const { event: name, ...data } = event;
    this.writes = this.writes
      .then(() => this.stream.writeSSE({ event: name, data: JSON.stringify(data) }))
      .catch((err: unknown) => {
        log.debug({ requestId: this.requestId, event: name, err: (err as Error).message }, "SSE write failed");
      });
  }

  reveal(_revealed: string, appended: string): void {
    this.send({ event: "token", content: appended });
  }

  complete(completion: TurnCompletion): void {
    this.send({ event: "complete", ...completion });
  }

  /** Settles once every queued event has been written. */
  flush(): Promise<void> {
    return this.writes;
  }
}
