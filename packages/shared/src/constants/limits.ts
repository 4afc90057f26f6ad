export const LIMITS = {
  MESSAGE_MAX_LENGTH: 32_000,
  HISTORY_MAX_MESSAGES: 50,
  RATE_LIMIT_CHAT_PER_MINUTE: 30,
} as const;

// Must match, byte for byte, the delimiter the system instruction asks for.
export const FOLLOW_UP_SENTINEL = "---FOLLOW_UP_QUESTIONS---";

export const FOLLOW_UP_LIMITS = {
  maxQuestions: 5,
  minLength: 10,
} as const;

export const PLAYBACK_DELAYS = {
  wordMs: 40,
  whitespaceMs: 10,
} as const;

export const RESOLVER_LIMITS = {
  timeoutMs: 10_000,
  concurrency: 4,
} as const;
