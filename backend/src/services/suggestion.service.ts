import { GoogleGenAI } from "@google/genai";
import { FOLLOW_UP_LIMITS } from "@lexstream/shared";
import type { ChatMessage } from "./llm/base.js";
import { log } from "../middleware/logger.js";

const SUGGESTION_PROMPT = `Generate 3-5 concise, educational follow-up questions that help the user learn more about the legal topic of the conversation.
Questions must explore the legal topic itself, never the user's own situation ("Do you have a case?" is not acceptable).
Keep each question under 15 words. Return only the questions, one per line, without numbering or bullets.`;

const ERROR_PREFIXES = ["QUOTA_EXHAUSTED:", "I apologize, but I encountered an error"];

/**
 * Strip numbering and bullets, drop short or error-looking lines, keep at most five.
 */
export function parseSuggestions(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) =>
      line
        .trim()
        .replace(/^\d+[.)]\s*/, "")
        .replace(/^[-*•]\s*/, "")
        .trim(),
    )
    .filter((line) => Array.from(line).length > FOLLOW_UP_LIMITS.minLength)
    .filter((line) => !ERROR_PREFIXES.some((prefix) => line.startsWith(prefix)))
    .slice(0, FOLLOW_UP_LIMITS.maxQuestions);
}

function buildContext(history: ChatMessage[]): string {
  return history
    .slice(-4)
    .map((msg) => `${msg.role === "user" ? "User" : "Assistant"}: ${msg.content}`)
    .join("\n\n");
}

/**
 * On-demand follow-up questions through a non-streaming generateContent call.
 * Returns an empty list on any failure.
 */
export class SuggestionService {
  private client: GoogleGenAI;

  constructor(
    apiKey: string,
    private model: string,
  ) {
    this.client = new GoogleGenAI({ apiKey });
  }

  async generate(history: ChatMessage[], requestId: string): Promise<string[]> {
    if (history.length === 0) return [];

    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: [{ role: "user", parts: [{ text: `Conversation context:\n${buildContext(history)}` }] }],
        config: {
          temperature: 0.5,
          maxOutputTokens: 300,
          systemInstruction: SUGGESTION_PROMPT,
        },
      });

      const questions = parseSuggestions(response.text ?? "");
      log.debug({ requestId, count: questions.length }, "Follow-up suggestions generated");
      return questions;
    } catch (err) {
      log.warn({ requestId, err: (err as Error).message }, "Suggestion generation failed");
      return [];
    }
  }
}
