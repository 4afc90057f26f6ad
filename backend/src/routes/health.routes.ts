import { Hono } from "hono";
import { sql } from "drizzle-orm";
import { log } from "../middleware/logger.js";
import type { AppDeps, AppEnv } from "../app.js";

type CheckResult = { status: "ok" | "degraded" | "error"; latency?: number; detail?: string };

const MODEL_CHECK_TIMEOUT_MS = 5000;

function withTimeout(check: Promise<boolean>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  return Promise.race([check, timeout]).finally(() => clearTimeout(timer));
}

export function createHealthRoutes(deps: AppDeps) {
  const health = new Hono<AppEnv>();
  const startTime = Date.now();

  const checkModel = async (model: string): Promise<CheckResult> => {
    const start = Date.now();
    try {
      const healthy = await withTimeout(deps.client.healthCheck(model), MODEL_CHECK_TIMEOUT_MS);
      return {
        status: healthy ? "ok" : "degraded",
        latency: Date.now() - start,
        detail: healthy ? model : "Health check failed or timed out",
      };
    } catch (err) {
      return { status: "degraded", detail: err instanceof Error ? err.message : "Health check failed" };
    }
  };

  // Detailed health check: returns subsystem statuses
  health.get("/health", async (c) => {
    const requestId = c.get("requestId");
    const checks: Record<string, CheckResult> = {};

    const dbStart = Date.now();
    try {
      deps.db.run(sql`SELECT 1`);
      checks.database = { status: "ok", latency: Date.now() - dbStart };
    } catch (err) {
      checks.database = {
        status: "error",
        latency: Date.now() - dbStart,
        detail: err instanceof Error ? err.message : "Database unreachable",
      };
    }

    const [primary, fallback] = await Promise.all([
      checkModel(deps.models.primary),
      checkModel(deps.models.fallback),
    ]);
    checks.model = primary;
    checks.fallbackModel = fallback;

    const statuses = Object.values(checks).map((check) => check.status);
    const overallStatus = statuses.includes("error")
      ? "error"
      : statuses.includes("degraded")
        ? "degraded"
        : "ok";

    const response = {
      status: overallStatus,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
      sessions: deps.sessions.size,
      checks,
    };

    // Model outages degrade; only a dead database is fatal
    const statusCode = checks.database.status === "error" ? 503 : 200;

    if (overallStatus !== "ok") {
      log.warn({ requestId, health: response }, "Health check returned non-ok status");
    }

    return c.json(response, statusCode);
  });

  health.get("/ready", (c) => {
    try {
      deps.db.run(sql`SELECT 1`);
      return c.json({ ready: true });
    } catch {
      return c.json({ ready: false }, 503);
    }
  });

  return health;
}
