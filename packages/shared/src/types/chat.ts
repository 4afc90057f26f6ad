import type { Source } from "./source.js";

export type ChatMode = "general" | "contracts" | "caseLaw" | "regulations";

export type ModelTier = "primary" | "fallback";

export type Turn = {
  id: string;
  conversationId: string;
  userContent: string;
  content: string;
  sources: Source[];
  followUpQuestions: string[];
  model: string;
  mode: ChatMode;
  createdAt: string;
};

export type TurnCompletion = {
  text: string;
  sources: Source[];
  followUpQuestions: string[];
};

export type StreamEvent =
  | { event: "info"; message: string }
  | { event: "token"; content: string }
  | { event: "complete"; text: string; sources: Source[]; followUpQuestions: string[] }
  | { event: "quota_exhausted"; message: string; model: string }
  | { event: "error"; error: string; code: string }
  | { event: "done"; model: string; cancelled: boolean };
