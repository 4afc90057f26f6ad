import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./env.js";
import { log } from "./middleware/logger.js";
import { createDatabase } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { abortAllStreams } from "./lib/active-streams.js";
import { GeminiStreamClient } from "./services/llm/gemini.js";
import { CitationResolver } from "./services/citations/resolver.js";
import { SourceFilter } from "./services/citations/source-filter.js";
import { SessionStore } from "./services/conversation-session.js";
import { SuggestionService } from "./services/suggestion.service.js";
import { TurnStore } from "./services/turn.service.js";

const { db, sqlite } = createDatabase(env.DATABASE_PATH);
runMigrations(sqlite);

const models = { primary: env.GEMINI_MODEL, fallback: env.GEMINI_FALLBACK_MODEL };
const client = new GeminiStreamClient({ apiKey: env.GEMINI_API_KEY, baseUrl: env.GEMINI_BASE_URL });
const turns = new TurnStore(db);

const sessions = new SessionStore({
  client,
  models,
  turns,
  resolver: new CitationResolver({
    timeoutMs: env.RESOLVER_TIMEOUT_MS,
    concurrency: env.RESOLVER_CONCURRENCY,
  }),
  filter: new SourceFilter(env.SOURCE_DENYLIST),
  playback: {
    wordMs: env.PLAYBACK_WORD_DELAY_MS,
    whitespaceMs: env.PLAYBACK_WHITESPACE_DELAY_MS,
  },
  simulateQuotaExhausted: env.SIMULATE_QUOTA_EXHAUSTED,
});

const app = createApp({
  db,
  sessions,
  turns,
  client,
  models,
  suggestions: new SuggestionService(env.GEMINI_API_KEY, models.fallback),
  chatRateLimitPerMinute: env.RATE_LIMIT_CHAT_PER_MINUTE,
});

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log.info(
    {
      port: info.port,
      env: env.NODE_ENV,
      model: models.primary,
      fallbackModel: models.fallback,
      simulateQuotaExhausted: env.SIMULATE_QUOTA_EXHAUSTED,
    },
    "Server started",
  );
});

// ── Graceful Shutdown ─────────────────────────────

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info({ signal }, "Graceful shutdown initiated");

  server.close(() => {
    log.info("HTTP server closed, no new connections");
  });

  const streamCount = abortAllStreams();
  if (streamCount > 0) {
    log.info({ aborted: streamCount }, "In-flight SSE streams aborted");
  }

  try {
    sqlite.close();
    log.info("Database connection closed");
  } catch (err) {
    log.error({ err }, "Error closing database");
  }

  // Allow time for final log flush
  await new Promise((resolve) => setTimeout(resolve, 500));

  log.info("Shutdown complete");
  process.exit(0);
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("uncaughtException", (err) => {
  log.fatal({ err: err.message, stack: err.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  log.fatal({ reason: String(reason) }, "Unhandled rejection");
  process.exit(1);
});
