import { z } from "zod";
import "dotenv/config";
import {
  PRIMARY_MODEL,
  FALLBACK_MODEL,
  PLAYBACK_DELAYS,
  RESOLVER_LIMITS,
  LIMITS,
} from "@lexstream/shared";

const envSchema = z.object({
  // App
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(8000),

  // Gemini
  GEMINI_API_KEY: z.string().min(1, "GEMINI_API_KEY is required"),
  GEMINI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),
  GEMINI_MODEL: z.string().default(PRIMARY_MODEL),
  GEMINI_FALLBACK_MODEL: z.string().default(FALLBACK_MODEL),

  // Debug: make the primary model answer with quota exhaustion
  SIMULATE_QUOTA_EXHAUSTED: z
    .string()
    .default("false")
    .transform((v) => v === "true"),

  // Database
  DATABASE_PATH: z.string().default("./data/lexstream.db"),

  // CORS: comma-separated URLs for multiple origins
  FRONTEND_URL: z.string().default("http://localhost:3000"),

  // Citation resolution
  RESOLVER_TIMEOUT_MS: z.coerce.number().int().positive().default(RESOLVER_LIMITS.timeoutMs),
  RESOLVER_CONCURRENCY: z.coerce.number().int().positive().default(RESOLVER_LIMITS.concurrency),
  // Comma-separated; replaces the built-in denylist when set
  SOURCE_DENYLIST: z
    .string()
    .optional()
    .transform((v) =>
      v
        ?.split(",")
        .map((p) => p.trim().toLowerCase())
        .filter((p) => p.length > 0),
    ),

  // Playback pacing
  PLAYBACK_WORD_DELAY_MS: z.coerce.number().int().min(0).default(PLAYBACK_DELAYS.wordMs),
  PLAYBACK_WHITESPACE_DELAY_MS: z.coerce.number().int().min(0).default(PLAYBACK_DELAYS.whitespaceMs),

  // Rate limiting
  RATE_LIMIT_CHAT_PER_MINUTE: z.coerce.number().default(LIMITS.RATE_LIMIT_CHAT_PER_MINUTE),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(JSON.stringify(result.error.flatten().fieldErrors, null, 2));
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();
