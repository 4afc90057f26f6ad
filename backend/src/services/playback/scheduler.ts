import { nanoid } from "nanoid";
import { PLAYBACK_DELAYS, type PlaybackState, type PlaybackToken } from "@lexstream/shared";
import { tokenize } from "./tokenizer.js";
import { log } from "../../middleware/logger.js";

export interface RevealSink {
  reveal(revealed: string, appended: string): void;
}

export type FinalizeHook = (session: PlaybackSession) => void | Promise<void>;

export type PlaybackDelays = {
  wordMs: number;
  whitespaceMs: number;
};

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const finish = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal.addEventListener("abort", finish, { once: true });
  });
}

/**
 * One paced reveal of a finished answer. The cursor only moves forward;
 * the session ends `completed` after the last token or after a flush
 * (`flushed` tells the two apart), and its finalize hook runs exactly once.
 */
export class PlaybackSession {
  readonly id = nanoid();
  readonly tokens: PlaybackToken[];

  private _state: PlaybackState = "idle";
  private _cursor = 0;
  private _revealed = "";
  private controller = new AbortController();
  private finalized = false;
  private _flushed = false;
  private settle: () => void = () => undefined;
  private readonly settled: Promise<void>;

  constructor(
    readonly fullText: string,
    private sink: RevealSink,
    private onFinalize: FinalizeHook,
    private delays: PlaybackDelays,
  ) {
    this.tokens = tokenize(fullText);
    this.settled = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get state(): PlaybackState {
    return this._state;
  }

  get cursor(): number {
    return this._cursor;
  }

  get revealed(): string {
    return this._revealed;
  }

  /** True when the remaining text was revealed in one step by `cancel()`. */
  get flushed(): boolean {
    return this._flushed;
  }

  /** Settles once playback has stopped and the finalize hook has finished. */
  get done(): Promise<void> {
    return this.settled;
  }

  play(): void {
    if (this._state !== "idle") return;
    this._state = "playing";

    if (this.tokens.length === 0) {
      this.finish();
      return;
    }
    void this.run();
  }

  /**
   * Skip the remaining delays and reveal the rest of the text in one step.
   * Returns false when the session had already ended.
   */
  cancel(): boolean {
    if (this._state === "completed") return false;

    this._flushed = true;
    this.controller.abort();
    const remaining = this.fullText.slice(this._revealed.length);
    this._cursor = this.tokens.length;
    this._revealed = this.fullText;

    if (remaining) {
      try {
        this.sink.reveal(this._revealed, remaining);
      } catch (err) {
        log.error({ sessionId: this.id, err: (err as Error).message }, "Reveal sink failed during flush");
      }
    }

    this.finish();
    return true;
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    try {
      while (this._cursor < this.tokens.length) {
        if (signal.aborted) return;

        const token = this.tokens[this._cursor];
        this._cursor++;
        this._revealed += token.text;
        this.sink.reveal(this._revealed, token.text);

        if (this._cursor < this.tokens.length) {
          await sleep(this.delayFor(token), signal);
        }
      }
    } catch (err) {
      log.error({ sessionId: this.id, err: (err as Error).message }, "Playback aborted by sink error");
      this.cancel();
      return;
    }

    if (!signal.aborted) this.finish();
  }

  private delayFor(token: PlaybackToken): number {
    return token.kind === "whitespace" ? this.delays.whitespaceMs : this.delays.wordMs;
  }

  private finish(): void {
    this._state = "completed";
    if (this.finalized) return;
    this.finalized = true;

    log.debug({ sessionId: this.id, flushed: this._flushed, tokens: this.tokens.length }, "Playback finished");

    let finalization: Promise<void>;
    try {
      finalization = Promise.resolve(this.onFinalize(this));
    } catch (err) {
      finalization = Promise.reject(err);
    }
    void finalization
      .catch((err: unknown) => {
        log.error({ sessionId: this.id, err: (err as Error).message }, "Playback finalize hook failed");
      })
      .finally(this.settle);
  }
}

/**
 * Runs at most one playback session at a time; starting a new one
 * force-finalizes whatever is still playing.
 */
export class PlaybackScheduler {
  private current: PlaybackSession | null = null;
  private delays: PlaybackDelays;

  constructor(delays: Partial<PlaybackDelays> = {}) {
    this.delays = {
      wordMs: delays.wordMs ?? PLAYBACK_DELAYS.wordMs,
      whitespaceMs: delays.whitespaceMs ?? PLAYBACK_DELAYS.whitespaceMs,
    };
  }

  get active(): PlaybackSession | null {
    return this.current?.state === "playing" ? this.current : null;
  }

  start(fullText: string, sink: RevealSink, onFinalize: FinalizeHook): PlaybackSession {
    this.cancel();

    const session = new PlaybackSession(fullText, sink, onFinalize, this.delays);
    this.current = session;
    session.play();
    return session;
  }

  cancel(): boolean {
    return this.current?.cancel() ?? false;
  }
}
