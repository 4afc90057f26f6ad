import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { RateLimitError } from "../lib/errors.js";
import type { AppEnv } from "../app.js";

type RateLimitConfig = {
  windowMs: number;
  max: number;
  keyFn: (c: Context<AppEnv>) => string;
  message?: string;
};

type Window = { count: number; resetAt: number };

const stores = new Map<string, Map<string, Window>>();

/**
 * Fixed-window limiter. Each call gets a fresh store registered under `name`,
 * so an app built twice does not share counters.
 */
export function rateLimit(name: string, config: RateLimitConfig) {
  const store = new Map<string, Window>();
  stores.set(name, store);

  return createMiddleware<AppEnv>(async (c, next) => {
    const key = config.keyFn(c);
    const now = Date.now();

    let entry = store.get(key);
    if (!entry || now > entry.resetAt) {
      entry = { count: 0, resetAt: now + config.windowMs };
      store.set(key, entry);
    }

    entry.count++;

    c.header("X-RateLimit-Limit", String(config.max));
    c.header("X-RateLimit-Remaining", String(Math.max(0, config.max - entry.count)));
    c.header("X-RateLimit-Reset", String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count > config.max) {
      throw new RateLimitError(config.message ?? "Too many requests. Please try again later.");
    }

    await next();
  });
}

// Cleanup stale entries every 5 minutes
setInterval(() => {
  const now = Date.now();
  for (const store of stores.values()) {
    for (const [key, entry] of store) {
      if (now > entry.resetAt) store.delete(key);
    }
  }
}, 5 * 60 * 1000).unref();
