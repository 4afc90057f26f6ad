import { describe, it, expect } from "vitest";
import { deriveSources, sanitizeAnswer } from "../response-sanitizer.js";

describe("sanitizeAnswer", () => {
  it("removes a trailing sources section", () => {
    const text = "Contracts need consideration[1].\n\nSources:\n1. https://x.example\n2. https://y.example";

    expect(sanitizeAnswer(text)).toBe("Contracts need consideration[1].");
  });

  it("removes a markdown sources heading", () => {
    expect(sanitizeAnswer("Body text.\n\n## **Sources**\n- one")).toBe("Body text.");
  });

  it("keeps a sentence that merely starts with the word Sources", () => {
    const text = "Sources of contract law include statutes.";

    expect(sanitizeAnswer(text)).toBe(text);
  });

  it("strips placeholders and URL labels and collapses spacing", () => {
    const text = "See the statute (URL unavailable) for details. URL: https://a.example\n\n\n\nNext.";

    expect(sanitizeAnswer(text)).toBe("See the statute for details. https://a.example\n\nNext.");
  });

  it("never returns an empty answer for non-empty input", () => {
    expect(sanitizeAnswer("Sources:")).toBe("Sources:");
    expect(sanitizeAnswer("   ")).toBe("");
  });
});

describe("deriveSources", () => {
  it("turns URLs and bare domains in the answer into sources", () => {
    const sources = deriveSources("See https://www.courts.example.gov/opinion. Also law.example.edu.");

    expect(sources.map((s) => [s.title, s.url])).toEqual([
      ["www.courts.example.gov", "https://www.courts.example.gov/opinion"],
      ["law.example.edu", "https://law.example.edu"],
    ]);
  });

  it("does not repeat a URL", () => {
    expect(deriveSources("a.example.com and A.example.com")).toHaveLength(1);
  });

  it("returns nothing for plain prose", () => {
    expect(deriveSources("No links in this answer")).toEqual([]);
  });
});
