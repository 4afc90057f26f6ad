import { Hono, type Context } from "hono";
import { streamSSE } from "hono/streaming";
import { zValidator } from "@hono/zod-validator";
import { sendMessageInputSchema } from "@lexstream/shared";
import { rateLimit } from "../middleware/rate-limiter.js";
import { trackStream, untrackStream } from "../lib/active-streams.js";
import { SseChannel } from "../lib/sse.js";
import { AppError, ConflictError, QuotaExhaustedError, ValidationError } from "../lib/errors.js";
import type { ConversationSession, PresentationSink } from "../services/conversation-session.js";
import type { PlaybackSession } from "../services/playback/scheduler.js";
import { log } from "../middleware/logger.js";
import { env } from "../env.js";
import type { AppDeps, AppEnv } from "../app.js";

type TurnRunner = (sink: PresentationSink, signal: AbortSignal) => Promise<PlaybackSession>;

export function createChatRoutes(deps: AppDeps) {
  const chat = new Hono<AppEnv>();

  const chatLimiter = rateLimit("chat", {
    windowMs: 60_000,
    max: deps.chatRateLimitPerMinute ?? env.RATE_LIMIT_CHAT_PER_MINUTE,
    keyFn: (c) => c.req.path,
  });

  chat.post(
    "/conversations/:conversationId/messages",
    chatLimiter,
    zValidator("json", sendMessageInputSchema),
    (c) => {
      const { conversationId } = c.req.param();
      const input = c.req.valid("json");
      const session = deps.sessions.get(conversationId);
      if (session.busy) throw new ConflictError("A response is already being generated for this conversation");

      const info =
        session.fallback.active === "fallback"
          ? `Using backup model ${session.fallback.activeModel}.`
          : undefined;

      return streamTurn(c, session, (sink, signal) => session.send(input.content, input.mode, sink, signal), info);
    },
  );

  // Re-send the message that hit quota exhaustion, on the fallback model
  chat.post("/conversations/:conversationId/retry-fallback", chatLimiter, (c) => {
    const { conversationId } = c.req.param();
    const session = deps.sessions.get(conversationId);
    if (session.busy) throw new ConflictError("A response is already being generated for this conversation");
    if (!session.hasFailedMessage) throw new ValidationError("There is no failed message to retry");

    return streamTurn(
      c,
      session,
      (sink, signal) => session.retryWithFallback(sink, signal),
      "Switching to backup model...",
    );
  });

  return chat;
}

/**
 * Run one turn over SSE: tokens while the answer plays back, then
 * `complete` and `done`. A client disconnect flushes playback so the turn is
 * still committed.
 */
function streamTurn(c: Context<AppEnv>, session: ConversationSession, run: TurnRunner, info?: string) {
  const requestId = c.get("requestId");
  const controller = new AbortController();
  trackStream(controller);

  return streamSSE(c, async (stream) => {
    const channel = new SseChannel(stream, requestId);
    let playback: PlaybackSession | null = null;

    stream.onAbort(() => {
      controller.abort();
      if (playback?.cancel()) {
        log.info({ requestId, conversationId: session.conversationId }, "Client disconnected, playback flushed");
      }
    });

    try {
      if (info) channel.send({ event: "info", message: info });

      playback = await run(channel, controller.signal);
      if (controller.signal.aborted) playback.cancel();
      await playback.done;

      channel.send({
        event: "done",
        model: session.fallback.activeModel,
        cancelled: playback.flushed,
      });
    } catch (err) {
      if (err instanceof QuotaExhaustedError) {
        channel.send({ event: "quota_exhausted", message: err.message, model: err.model });
      } else if (err instanceof AppError) {
        log.warn({ requestId, conversationId: session.conversationId, code: err.code, err: err.message }, "Turn failed");
        channel.send({ event: "error", error: err.message, code: err.code });
      } else {
        log.error(
          { requestId, conversationId: session.conversationId, err: err instanceof Error ? err.message : String(err) },
          "Unhandled error during turn",
        );
        channel.send({ event: "error", error: "Internal server error", code: "INTERNAL_ERROR" });
      }
    } finally {
      untrackStream(controller);
    }

    await channel.flush();
  });
}
