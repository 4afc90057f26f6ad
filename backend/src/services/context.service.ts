import { LIMITS } from "@lexstream/shared";
import type { ChatMessage } from "./llm/base.js";
import { log } from "../middleware/logger.js";

// Gemini uses ~1 token per 4 characters for English text.
const CHARS_PER_TOKEN = 4;

// Reserve reasonable budget within Gemini 2.5 Flash's 1M window
const DEFAULT_MAX_CONTEXT_TOKENS = 128_000;
const RESPONSE_RESERVE_TOKENS = 8_192;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Build a context-window-aware message list for the model.
 *
 * Strategy:
 * 1. Count the system instruction against the budget (it travels separately).
 * 2. Always include the new user message.
 * 3. Fill remaining budget with history from most-recent to oldest, capped
 *    at the history message limit.
 * 4. If even the instruction + latest message exceed the budget, send them
 *    anyway (the model handles truncation internally).
 */
export function buildContextMessages(
  history: ChatMessage[],
  latest: ChatMessage,
  systemInstruction: string,
  options?: {
    maxContextTokens?: number;
    responseReserveTokens?: number;
  },
): ChatMessage[] {
  const maxTokens = options?.maxContextTokens ?? DEFAULT_MAX_CONTEXT_TOKENS;
  const reserveTokens = options?.responseReserveTokens ?? RESPONSE_RESERVE_TOKENS;
  const budget = maxTokens - reserveTokens;

  let usedTokens = estimateTokens(systemInstruction) + estimateTokens(latest.content);

  const recent = history.slice(-LIMITS.HISTORY_MAX_MESSAGES);
  const includedHistory: ChatMessage[] = [];

  for (let i = recent.length - 1; i >= 0; i--) {
    const msg = recent[i];
    const msgTokens = estimateTokens(msg.content);

    if (usedTokens + msgTokens > budget) {
      log.debug(
        {
          truncatedAt: i,
          totalMessages: history.length,
          usedTokens,
          budget,
        },
        "Context window truncated",
      );
      break;
    }

    includedHistory.unshift(msg);
    usedTokens += msgTokens;
  }

  return [...includedHistory, latest];
}
