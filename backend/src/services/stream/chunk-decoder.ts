import { z } from "zod";
import type { CitationFragment } from "@lexstream/shared";
import type { Frame } from "./frame-reader.js";
import { log } from "../../middleware/logger.js";

// Every leaf is optional and falls back to undefined when mistyped.
const optionalString = z.string().optional().catch(undefined);

const webSchema = z.object({
  uri: optionalString,
  title: optionalString,
  snippet: optionalString,
  originalUrl: optionalString,
  sourceUrl: optionalString,
  link: optionalString,
  url: optionalString,
});

const groundingChunkSchema = z.object({
  web: webSchema.optional().catch(undefined),
});

const candidateSchema = z.object({
  content: z
    .object({
      parts: z
        .array(z.object({ text: optionalString, thought: z.boolean().optional().catch(undefined) }))
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
  groundingMetadata: z
    .object({
      groundingChunks: z.array(groundingChunkSchema).optional().catch(undefined),
      webSearchQueries: z.array(z.string()).optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
  finishReason: optionalString,
});

export const streamPayloadSchema = z.object({
  candidates: z.array(candidateSchema).optional().catch(undefined),
  modelVersion: optionalString,
});

export type StreamPayload = z.infer<typeof streamPayloadSchema>;
type Candidate = z.infer<typeof candidateSchema>;

export type ResponseDelta = {
  text?: string;
  citations: CitationFragment[];
  finishReason?: string;
  payload: StreamPayload;
};

/**
 * Decode one frame into a text delta and citation fragments. Returns null
 * when the payload is not a JSON object of the expected shape; the caller
 * drops the frame and keeps reading.
 */
export function decodeFrame(frame: Frame): ResponseDelta | null {
  let json: unknown;
  try {
    json = JSON.parse(frame.data);
  } catch (err) {
    log.debug({ err: (err as Error).message, size: frame.data.length }, "Dropping undecodable frame");
    return null;
  }

  const parsed = streamPayloadSchema.safeParse(json);
  if (!parsed.success) {
    log.debug({ issues: parsed.error.issues.length }, "Dropping frame with unexpected shape");
    return null;
  }

  const payload = parsed.data;
  const first = payload.candidates?.[0];
  const text = first ? candidateText(first) : "";

  return {
    text: text || undefined,
    citations: first ? candidateCitations(first) : [],
    finishReason: first?.finishReason,
    payload,
  };
}

/**
 * Citation fragments from every candidate of a payload, in candidate order.
 */
export function extractCitations(payload: StreamPayload): CitationFragment[] {
  return (payload.candidates ?? []).flatMap(candidateCitations);
}

function candidateText(candidate: Candidate): string {
  const parts = candidate.content?.parts ?? [];
  return parts
    .filter((p) => !p.thought)
    .map((p) => p.text ?? "")
    .join("");
}

function candidateCitations(candidate: Candidate): CitationFragment[] {
  const chunks = candidate.groundingMetadata?.groundingChunks ?? [];
  const fragments: CitationFragment[] = [];

  for (const chunk of chunks) {
    const web = chunk.web;
    if (!web) continue;

    const title = web.title?.trim();
    if (!title) continue;

    // Alternative URL fields carry the original page when present.
    const uri = (web.originalUrl ?? web.sourceUrl ?? web.link ?? web.url ?? web.uri ?? "").trim();
    fragments.push(web.snippet ? { title, uri, snippet: web.snippet } : { title, uri });
  }

  return fragments;
}
