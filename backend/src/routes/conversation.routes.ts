import { Hono } from "hono";
import type { AppDeps, AppEnv } from "../app.js";
import type { ConversationSession } from "../services/conversation-session.js";

function modelState(session: ConversationSession) {
  return { active: session.fallback.active, model: session.fallback.activeModel };
}

export function createConversationRoutes(deps: AppDeps) {
  const convRouter = new Hono<AppEnv>();

  // ── Persisted turns ──────────────────────────────
  convRouter.get("/conversations/:id/turns", (c) => {
    return c.json({ data: deps.turns.list(c.req.param("id")) });
  });

  // ── Start over ───────────────────────────────────
  convRouter.delete("/conversations/:id", (c) => {
    const id = c.req.param("id");
    deps.sessions.drop(id);
    deps.turns.deleteConversation(id);
    return c.body(null, 204);
  });

  convRouter.post("/conversations/:id/playback/cancel", (c) => {
    const session = deps.sessions.peek(c.req.param("id"));
    return c.json({ data: { cancelled: session?.cancelPlayback() ?? false } });
  });

  // ── Model tier ───────────────────────────────────
  convRouter.post("/conversations/:id/model/fallback", (c) => {
    const session = deps.sessions.get(c.req.param("id"));
    session.fallback.markExhausted();
    return c.json({ data: modelState(session) });
  });

  convRouter.post("/conversations/:id/model/reset", (c) => {
    const session = deps.sessions.get(c.req.param("id"));
    session.fallback.reset();
    return c.json({ data: modelState(session) });
  });

  // ── On-demand follow-up suggestions ──────────────
  convRouter.post("/conversations/:id/suggestions", async (c) => {
    const session = deps.sessions.peek(c.req.param("id"));
    const questions = session
      ? await deps.suggestions.generate([...session.messages], c.get("requestId"))
      : [];
    return c.json({ data: { questions } });
  });

  return convRouter;
}
