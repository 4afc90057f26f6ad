import type { ChatMode, Source, TurnCompletion } from "@lexstream/shared";
import type { ChatMessage, StreamingModelClient } from "./llm/base.js";
import { ModelFallbackController, type ModelPair } from "./llm/model-fallback.js";
import { systemInstructionFor } from "./llm/prompts.js";
import { buildContextMessages } from "./context.service.js";
import { decodeFrame } from "./stream/chunk-decoder.js";
import { ResponseAccumulator } from "./stream/response-accumulator.js";
import type { CitationResolver } from "./citations/resolver.js";
import type { SourceFilter } from "./citations/source-filter.js";
import { splitResponse } from "./response-splitter.js";
import { deriveSources, sanitizeAnswer } from "./response-sanitizer.js";
import {
  PlaybackScheduler,
  type PlaybackDelays,
  type PlaybackSession,
  type RevealSink,
} from "./playback/scheduler.js";
import type { TurnSink } from "./turn.service.js";
import { withFavicon } from "../lib/source-display.js";
import {
  ConflictError,
  EmptyResponseError,
  QuotaExhaustedError,
  ValidationError,
} from "../lib/errors.js";
import { log } from "../middleware/logger.js";

export interface PresentationSink extends RevealSink {
  complete(completion: TurnCompletion): void | Promise<void>;
}

export type SessionDeps = {
  client: StreamingModelClient;
  resolver: CitationResolver;
  filter: SourceFilter;
  turns: TurnSink;
  models: ModelPair;
  playback?: Partial<PlaybackDelays>;
  simulateQuotaExhausted?: boolean;
};

type PendingMessage = { content: string; mode: ChatMode };

/**
 * One conversation: model tier, chat history and the playback slot.
 * A turn runs fetch, decode, resolve, filter and split, then hands the
 * cleaned answer to the scheduler; the finalize hook commits the turn and
 * completes the presentation sink.
 */
export class ConversationSession {
  readonly fallback: ModelFallbackController;

  private scheduler: PlaybackScheduler;
  private history: ChatMessage[] = [];
  private inFlight = false;
  private lastFailed: PendingMessage | null = null;

  constructor(
    readonly conversationId: string,
    private deps: SessionDeps,
  ) {
    this.fallback = new ModelFallbackController(deps.models);
    this.scheduler = new PlaybackScheduler(deps.playback);
  }

  get messages(): readonly ChatMessage[] {
    return this.history;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  get hasFailedMessage(): boolean {
    return this.lastFailed !== null;
  }

  get playback(): PlaybackSession | null {
    return this.scheduler.active;
  }

  async send(
    content: string,
    mode: ChatMode,
    sink: PresentationSink,
    signal?: AbortSignal,
  ): Promise<PlaybackSession> {
    if (this.inFlight) {
      throw new ConflictError("A response is already being generated for this conversation");
    }
    this.inFlight = true;

    const model = this.fallback.activeModel;
    try {
      const completion = await this.answer(content, mode, model, signal);
      this.lastFailed = null;
      this.history.push({ role: "user", content }, { role: "assistant", content: completion.text });

      return this.scheduler.start(completion.text, sink, async () => {
        await this.deps.turns.commit({
          conversationId: this.conversationId,
          userContent: content,
          content: completion.text,
          sources: completion.sources,
          followUpQuestions: completion.followUpQuestions,
          model,
          mode,
        });
        await sink.complete(completion);
      });
    } catch (err) {
      if (err instanceof QuotaExhaustedError) {
        this.lastFailed = { content, mode };
      }
      throw err;
    } finally {
      this.inFlight = false;
    }
  }

  /** Switch to the fallback model and send the message that hit the quota again. */
  retryWithFallback(sink: PresentationSink, signal?: AbortSignal): Promise<PlaybackSession> {
    const pending = this.lastFailed;
    if (!pending) {
      return Promise.reject(new ValidationError("There is no failed message to retry"));
    }
    this.fallback.markExhausted();
    return this.send(pending.content, pending.mode, sink, signal);
  }

  cancelPlayback(): boolean {
    return this.scheduler.cancel();
  }

  reset(): void {
    this.scheduler.cancel();
    this.history = [];
    this.lastFailed = null;
    this.fallback.reset();
  }

  private async answer(
    content: string,
    mode: ChatMode,
    model: string,
    signal?: AbortSignal,
  ): Promise<TurnCompletion> {
    if (this.deps.simulateQuotaExhausted && this.fallback.active === "primary") {
      log.warn({ conversationId: this.conversationId, model }, "Simulating quota exhaustion");
      throw new QuotaExhaustedError(model);
    }

    const systemInstruction = systemInstructionFor(mode);
    const messages = buildContextMessages(this.history, { role: "user", content }, systemInstruction);

    const accumulator = new ResponseAccumulator();
    for await (const frame of this.deps.client.streamFrames({ model, systemInstruction, messages }, signal)) {
      const delta = decodeFrame(frame);
      if (delta) accumulator.apply(delta);
    }

    const assembled = accumulator.finalize();
    const split = splitResponse(assembled.fullText);
    const text = sanitizeAnswer(split.mainText);
    if (!text) throw new EmptyResponseError();

    const sources = await this.collectSources(assembled.sources, text);

    log.info(
      {
        conversationId: this.conversationId,
        model,
        frames: accumulator.frameCount,
        sources: sources.length,
        followUps: split.followUpQuestions.length,
      },
      "Answer assembled",
    );

    return { text, sources, followUpQuestions: split.followUpQuestions };
  }

  private async collectSources(grounded: Source[], text: string): Promise<Source[]> {
    const resolved = this.deps.filter.apply(await this.deps.resolver.resolveAll(grounded));
    if (resolved.length > 0) return resolved.map(withFavicon);

    const derived = this.deps.filter.apply(deriveSources(text));
    if (derived.length > 0) {
      log.debug({ conversationId: this.conversationId, derived: derived.length }, "Sources derived from answer text");
    }
    return derived.map(withFavicon);
  }
}

/**
 * In-memory sessions keyed by conversation id, created on first use.
 */
export class SessionStore {
  private sessions = new Map<string, ConversationSession>();

  constructor(private deps: SessionDeps) {}

  get(conversationId: string): ConversationSession {
    let session = this.sessions.get(conversationId);
    if (!session) {
      session = new ConversationSession(conversationId, this.deps);
      this.sessions.set(conversationId, session);
    }
    return session;
  }

  peek(conversationId: string): ConversationSession | undefined {
    return this.sessions.get(conversationId);
  }

  drop(conversationId: string): boolean {
    const session = this.sessions.get(conversationId);
    if (!session) return false;
    session.reset();
    return this.sessions.delete(conversationId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
