import { FOLLOW_UP_LIMITS, FOLLOW_UP_SENTINEL, type SplitResponse } from "@lexstream/shared";

type SplitOptions = {
  sentinel?: string;
  maxQuestions?: number;
  minLength?: number;
};

/**
 * Separate the answer from the follow-up block the system instruction asks
 * the model to append after the sentinel line.
 */
export function splitResponse(fullText: string, options: SplitOptions = {}): SplitResponse {
  const sentinel = options.sentinel ?? FOLLOW_UP_SENTINEL;
  const maxQuestions = options.maxQuestions ?? FOLLOW_UP_LIMITS.maxQuestions;
  const minLength = options.minLength ?? FOLLOW_UP_LIMITS.minLength;

  const at = fullText.indexOf(sentinel);
  if (at === -1) return { mainText: fullText, followUpQuestions: [] };

  // The block ends at a repeated sentinel, if the model emitted one.
  const block = fullText.slice(at + sentinel.length).split(sentinel)[0];
  const followUpQuestions = block
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => Array.from(line).length > minLength)
    .slice(0, maxQuestions);

  return { mainText: fullText.slice(0, at).trim(), followUpQuestions };
}
