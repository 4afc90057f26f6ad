import type { ChatMessage, StreamRequest, StreamingModelClient } from "./base.js";
import { FrameReader, type Frame } from "../stream/frame-reader.js";
import { AppError, QuotaExhaustedError, TransportError } from "../../lib/errors.js";
import { log } from "../../middleware/logger.js";

export type GeminiClientOptions = {
  apiKey: string;
  baseUrl: string;
  fetchFn?: typeof fetch;
};

/**
 * Gemini REST client for `streamGenerateContent?alt=sse` with Google Search
 * grounding. The response body is read chunk by chunk and framed here; the
 * caller decodes the frames.
 */
export class GeminiStreamClient implements StreamingModelClient {
  private apiKey: string;
  private baseUrl: string;
  private fetchFn: typeof fetch;

  constructor(options: GeminiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async *streamFrames(request: StreamRequest, signal?: AbortSignal): AsyncGenerator<Frame> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(request.model)}:streamGenerateContent?alt=sse`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.apiKey,
        },
        body: JSON.stringify(buildPayload(request)),
        signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      log.error({ model: request.model, error: message }, "Gemini request failed");
      throw new TransportError(`Network error: ${message}`);
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "");
      if (response.status === 429 || errorBody.includes("RESOURCE_EXHAUSTED")) {
        log.warn({ model: request.model, status: response.status }, "Gemini quota exhausted");
        throw new QuotaExhaustedError(request.model);
      }
      log.error({ model: request.model, status: response.status, body: errorBody.slice(0, 500) }, "Gemini API error");
      throw new TransportError(`HTTP Error ${response.status}: ${errorBody}`.trim(), response.status);
    }

    const reader = response.body?.getReader();
    if (!reader) throw new TransportError("No response body");

    const frames = new FrameReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        yield* frames.ingest(value);
      }
      yield* frames.flush();
    } catch (err) {
      if (err instanceof AppError) throw err;
      const message = err instanceof Error ? err.message : "Unknown error";
      log.error({ model: request.model, error: message }, "Gemini stream interrupted");
      throw new TransportError(`Stream interrupted: ${message}`);
    } finally {
      reader.releaseLock();
    }
  }

  async healthCheck(model: string): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.baseUrl}/models/${encodeURIComponent(model)}`, {
        headers: { "x-goog-api-key": this.apiKey },
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}

function toContents(messages: ChatMessage[]) {
  return messages.map((msg) => ({
    role: msg.role === "user" ? "user" : "model",
    parts: [{ text: msg.content }],
  }));
}

export function buildPayload(request: StreamRequest) {
  return {
    systemInstruction: { parts: [{ text: request.systemInstruction }] },
    contents: toContents(request.messages),
    generationConfig: {
      temperature: request.temperature ?? 0.7,
      topP: 0.95,
      topK: 40,
      maxOutputTokens: request.maxTokens ?? 8192,
    },
    tools: [{ google_search: {} }],
  };
}
