import { describe, it, expect } from "vitest";
import { tokenize } from "../tokenizer.js";

describe("tokenize", () => {
  it("splits words, whitespace and adjacent citation markers", () => {
    expect(tokenize("text [1][2] more")).toEqual([
      { kind: "word", text: "text" },
      { kind: "whitespace", text: " " },
      { kind: "citation", text: "[1]" },
      { kind: "citation", text: "[2]" },
      { kind: "whitespace", text: " " },
      { kind: "word", text: "more" },
    ]);
  });

  it("treats a marker glued to a word as its own token", () => {
    expect(tokenize("years[1].")).toEqual([
      { kind: "word", text: "years" },
      { kind: "citation", text: "[1]" },
      { kind: "word", text: "." },
    ]);
  });

  it("coalesces whitespace runs", () => {
    expect(tokenize("a \n\t b")).toEqual([
      { kind: "word", text: "a" },
      { kind: "whitespace", text: " \n\t " },
      { kind: "word", text: "b" },
    ]);
  });

  it("keeps an unterminated marker as a word", () => {
    expect(tokenize("see [3 and more")).toEqual([
      { kind: "word", text: "see" },
      { kind: "whitespace", text: " " },
      { kind: "word", text: "[3 and more" },
    ]);
  });

  it("always joins back to the input", () => {
    for (const text of ["", "   ", "[1]", "a[1][2", "émoji 👍 [x] y", "line\r\nbreak [2]"]) {
      expect(tokenize(text).map((t) => t.text).join("")).toBe(text);
    }
  });
});
