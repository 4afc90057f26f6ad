import { Hono } from "hono";
import { cors } from "hono/cors";
import { requestId } from "hono/request-id";
import { env } from "./env.js";
import { errorHandler } from "./middleware/error-handler.js";
import { requestLogger } from "./middleware/logger.js";
import { createRoutes } from "./routes/index.js";
import type { DB } from "./db/index.js";
import type { StreamingModelClient } from "./services/llm/base.js";
import type { ModelPair } from "./services/llm/model-fallback.js";
import type { SessionStore } from "./services/conversation-session.js";
import type { SuggestionService } from "./services/suggestion.service.js";
import type { TurnStore } from "./services/turn.service.js";

export type AppEnv = {
  Variables: {
    requestId: string;
  };
};

export type AppDeps = {
  db: DB;
  sessions: SessionStore;
  turns: TurnStore;
  suggestions: Pick<SuggestionService, "generate">;
  client: StreamingModelClient;
  models: ModelPair;
  chatRateLimitPerMinute?: number;
};

// FRONTEND_URL supports comma-separated values for multiple origins
const allowedOrigins = env.FRONTEND_URL.split(",").map((u) => u.trim());

export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();

  app.use("*", requestId());
  app.use("*", requestLogger);
  app.use(
    "*",
    cors({
      origin: (origin) => (allowedOrigins.includes(origin) ? origin : allowedOrigins[0]),
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    }),
  );

  app.onError(errorHandler);

  app.route("/api/v1", createRoutes(deps));

  return app;
}
