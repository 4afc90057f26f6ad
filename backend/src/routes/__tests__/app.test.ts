import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { createApp, type AppDeps } from "../../app.js";
import { createDatabase } from "../../db/index.js";
import { runMigrations } from "../../db/migrate.js";
import { CitationResolver } from "../../services/citations/resolver.js";
import { SourceFilter } from "../../services/citations/source-filter.js";
import { SessionStore } from "../../services/conversation-session.js";
import { TurnStore } from "../../services/turn.service.js";
import type { StreamRequest, StreamingModelClient } from "../../services/llm/base.js";
import type { Frame } from "../../services/stream/frame-reader.js";
import { QuotaExhaustedError } from "../../lib/errors.js";

const MODELS = { primary: "gemini-2.5-flash", fallback: "gemini-2.5-flash-lite" };

class FakeClient implements StreamingModelClient {
  exhausted = false;

  async *streamFrames(request: StreamRequest): AsyncGenerator<Frame> {
    if (this.exhausted && request.model === MODELS.primary) throw new QuotaExhaustedError(request.model);
    yield { data: JSON.stringify({ candidates: [{ content: { parts: [{ text: "Hello world." }] } }] }) };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

type SseEvent = { event: string; data: Record<string, unknown> };

async function readEvents(res: Response): Promise<SseEvent[]> {
  const body = await res.text();
  return body
    .split("\n\n")
    .filter((block) => block.trim().length > 0)
    .map((block) => {
      const lines = block.split("\n");
      const event = lines.find((l) => l.startsWith("event: "))?.slice("event: ".length) ?? "message";
      const data = lines
        .filter((l) => l.startsWith("data: "))
        .map((l) => l.slice("data: ".length))
        .join("\n");
      return { event, data: JSON.parse(data) };
    });
}

function post(body?: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

describe("HTTP API", () => {
  let client: FakeClient;
  let deps: AppDeps;
  let generate: Mock<AppDeps["suggestions"]["generate"]>;

  beforeEach(() => {
    const { db, sqlite } = createDatabase(":memory:");
    runMigrations(sqlite);
    client = new FakeClient();
    const turns = new TurnStore(db);
    generate = vi.fn<AppDeps["suggestions"]["generate"]>().mockResolvedValue(["What is a tort in civil law?"]);
    deps = {
      db,
      turns,
      client,
      models: MODELS,
      suggestions: { generate },
      sessions: new SessionStore({
        client,
        turns,
        models: MODELS,
        resolver: new CitationResolver({ fetchFn: vi.fn<typeof fetch>() }),
        filter: new SourceFilter(),
        playback: { wordMs: 0, whitespaceMs: 0 },
      }),
    };
  });

  it("streams tokens, the completed turn and done", async () => {
    const app = createApp(deps);

    const res = await app.request("/api/v1/conversations/c1/messages", post({ content: "Say hello" }));
    const events = await readEvents(res);

    expect(res.headers.get("content-type")).toContain("text/event-stream");
    expect(events.map((e) => e.event)).toEqual(["token", "token", "token", "complete", "done"]);
    expect(events.slice(0, 3).map((e) => e.data.content)).toEqual(["Hello", " ", "world."]);
    expect(events[3].data).toEqual({ text: "Hello world.", sources: [], followUpQuestions: [] });
    expect(events[4].data).toEqual({ model: "gemini-2.5-flash", cancelled: false });

    const turns = await app.request("/api/v1/conversations/c1/turns");
    expect(await turns.json()).toMatchObject({ data: [{ content: "Hello world.", mode: "general" }] });
  });

  it("rejects an empty message", async () => {
    const res = await createApp(deps).request("/api/v1/conversations/c1/messages", post({ content: "   " }));

    expect(res.status).toBe(400);
  });

  it("reports quota exhaustion and retries on the fallback model", async () => {
    client.exhausted = true;
    const app = createApp(deps);

    const failed = await readEvents(await app.request("/api/v1/conversations/c2/messages", post({ content: "Q?" })));
    expect(failed).toHaveLength(1);
    expect(failed[0]).toMatchObject({ event: "quota_exhausted", data: { model: "gemini-2.5-flash" } });

    const retried = await readEvents(await app.request("/api/v1/conversations/c2/retry-fallback", post()));
    expect(retried[0]).toEqual({ event: "info", data: { message: "Switching to backup model..." } });
    expect(retried.at(-1)).toEqual({ event: "done", data: { model: "gemini-2.5-flash-lite", cancelled: false } });
  });

  it("refuses a retry when nothing failed", async () => {
    const res = await createApp(deps).request("/api/v1/conversations/c3/retry-fallback", post());

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("switches the model tier on request", async () => {
    const app = createApp(deps);

    const fallback = await app.request("/api/v1/conversations/c4/model/fallback", post());
    expect(await fallback.json()).toEqual({ data: { active: "fallback", model: "gemini-2.5-flash-lite" } });

    const reset = await app.request("/api/v1/conversations/c4/model/reset", post());
    expect(await reset.json()).toEqual({ data: { active: "primary", model: "gemini-2.5-flash" } });
  });

  it("generates suggestions only for a known conversation", async () => {
    const app = createApp(deps);

    const unknown = await app.request("/api/v1/conversations/none/suggestions", post());
    expect(await unknown.json()).toEqual({ data: { questions: [] } });
    expect(generate).not.toHaveBeenCalled();

    await (await app.request("/api/v1/conversations/c5/messages", post({ content: "Torts?" }))).text();
    const known = await app.request("/api/v1/conversations/c5/suggestions", post());

    expect(await known.json()).toEqual({ data: { questions: ["What is a tort in civil law?"] } });
    expect(generate.mock.calls[0][0]).toEqual([
      { role: "user", content: "Torts?" },
      { role: "assistant", content: "Hello world." },
    ]);
  });

  it("reports nothing to cancel when no playback is running", async () => {
    const res = await createApp(deps).request("/api/v1/conversations/c6/playback/cancel", post());

    expect(await res.json()).toEqual({ data: { cancelled: false } });
  });

  it("deletes a conversation", async () => {
    const app = createApp(deps);
    await (await app.request("/api/v1/conversations/c7/messages", post({ content: "Q?" }))).text();

    const res = await app.request("/api/v1/conversations/c7", { method: "DELETE" });

    expect(res.status).toBe(204);
    expect(deps.sessions.peek("c7")).toBeUndefined();
    expect(await (await app.request("/api/v1/conversations/c7/turns")).json()).toEqual({ data: [] });
  });

  it("reports health and readiness", async () => {
    const app = createApp(deps);

    const health = await app.request("/api/v1/health");
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({
      status: "ok",
      checks: { database: { status: "ok" }, model: { status: "ok" }, fallbackModel: { status: "ok" } },
    });

    expect(await (await app.request("/api/v1/ready")).json()).toEqual({ ready: true });
  });
});
