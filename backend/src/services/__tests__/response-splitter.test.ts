import { describe, it, expect } from "vitest";
import { FOLLOW_UP_SENTINEL } from "@lexstream/shared";
import { splitResponse } from "../response-splitter.js";

describe("splitResponse", () => {
  it("separates the answer from the follow-up block", () => {
    const text = `Answer body\n\n${FOLLOW_UP_SENTINEL}\nWhat is the standard of proof for negligence?\nHow is breach of contract proven in court?`;

    expect(splitResponse(text)).toEqual({
      mainText: "Answer body",
      followUpQuestions: [
        "What is the standard of proof for negligence?",
        "How is breach of contract proven in court?",
      ],
    });
  });

  it("returns the text untouched when there is no sentinel", () => {
    expect(splitResponse("  Just an answer.\n")).toEqual({
      mainText: "  Just an answer.\n",
      followUpQuestions: [],
    });
  });

  it("drops blank and short lines and keeps at most five questions", () => {
    const questions = Array.from({ length: 7 }, (_, i) => `  Question number ${i + 1}?  `);
    const text = ["Body", FOLLOW_UP_SENTINEL, "", "Why?", "exactly10c", ...questions].join("\n");

    const result = splitResponse(text);

    expect(result.mainText).toBe("Body");
    expect(result.followUpQuestions).toEqual([
      "Question number 1?",
      "Question number 2?",
      "Question number 3?",
      "Question number 4?",
      "Question number 5?",
    ]);
  });

  it("yields an empty answer when the sentinel comes first", () => {
    const result = splitResponse(`${FOLLOW_UP_SENTINEL}\nWhat is promissory estoppel?`);

    expect(result.mainText).toBe("");
    expect(result.followUpQuestions).toEqual(["What is promissory estoppel?"]);
  });

  it("stops the follow-up block at a repeated sentinel", () => {
    const text = `Answer\n${FOLLOW_UP_SENTINEL}\nWhat does consideration mean in law?\n${FOLLOW_UP_SENTINEL}\nSome trailing stray text here`;

    expect(splitResponse(text)).toEqual({
      mainText: "Answer",
      followUpQuestions: ["What does consideration mean in law?"],
    });
  });

  it("measures question length in characters, not code units", () => {
    // Six scroll emoji: twelve UTF-16 code units, six characters.
    const scrolls = "\u{1F4DC}".repeat(6);
    const result = splitResponse(`Body\n${FOLLOW_UP_SENTINEL}\n${scrolls}\n${scrolls}tort?`);

    expect(result.followUpQuestions).toEqual([`${scrolls}tort?`]);
  });
});
