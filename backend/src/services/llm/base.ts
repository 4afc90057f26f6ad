import type { Frame } from "../stream/frame-reader.js";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export type StreamRequest = {
  model: string;
  systemInstruction: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
};

export interface StreamingModelClient {
  /**
   * Raw SSE frames of one grounded generation. Throws TransportError or
   * QuotaExhaustedError; never retries.
   */
  streamFrames(request: StreamRequest, signal?: AbortSignal): AsyncGenerator<Frame>;

  healthCheck(model: string): Promise<boolean>;
}
