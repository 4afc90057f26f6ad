import { describe, it, expect } from "vitest";
import { ResponseAccumulator } from "../response-accumulator.js";
import { decodeFrame, type ResponseDelta } from "../chunk-decoder.js";

function delta(payload: unknown): ResponseDelta {
  const decoded = decodeFrame({ data: JSON.stringify(payload) });
  if (!decoded) throw new Error("fixture did not decode");
  return decoded;
}

function chunk(text: string, web: { uri: string; title: string }[] = []) {
  return delta({
    candidates: [
      {
        content: { parts: [{ text }] },
        groundingMetadata: { groundingChunks: web.map((w) => ({ web: w })) },
      },
    ],
  });
}

describe("ResponseAccumulator", () => {
  it("concatenates text and dedupes sources by url and title", () => {
    const acc = new ResponseAccumulator();
    acc.apply(chunk("Contracts ", [{ uri: "https://a.example", title: "A" }]));
    acc.apply(chunk("need consideration.", [
      { uri: "https://a.example", title: "A" },
      { uri: "https://a.example", title: "A, again" },
    ]));

    const result = acc.finalize();

    expect(result.fullText).toBe("Contracts need consideration.");
    expect(result.sources.map((s) => [s.url, s.title])).toEqual([
      ["https://a.example", "A"],
      ["https://a.example", "A, again"],
    ]);
    expect(result.followUpQuestions).toEqual([]);
    expect(acc.frameCount).toBe(2);
  });

  it("recovers citations attached only to a later candidate of the last payload", () => {
    const acc = new ResponseAccumulator();
    acc.apply(chunk("Text"));
    acc.apply(
      delta({
        candidates: [
          { content: { parts: [{ text: "." }] } },
          { groundingMetadata: { groundingChunks: [{ web: { uri: "https://late.example", title: "Late" } }] } },
        ],
      }),
    );

    const result = acc.finalize();

    expect(result.fullText).toBe("Text.");
    expect(result.sources.map((s) => s.url)).toEqual(["https://late.example"]);
  });

  it("finalizes an empty stream", () => {
    expect(new ResponseAccumulator().finalize()).toEqual({ fullText: "", sources: [], followUpQuestions: [] });
  });
});
