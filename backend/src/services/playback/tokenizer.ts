import type { PlaybackToken } from "@lexstream/shared";

const WHITESPACE = /\s/;

/**
 * Split text into playback tokens. Bracketed citation markers are atomic,
 * each marker of a run like `[1][2]` becoming its own token; whitespace runs
 * collapse into a single token. Joining the token texts gives back the input.
 */
export function tokenize(text: string): PlaybackToken[] {
  const chars = Array.from(text);
  const tokens: PlaybackToken[] = [];
  let word = "";

  const flushWord = () => {
    if (word) tokens.push({ kind: "word", text: word });
    word = "";
  };

  // Index just past the "]" closing the marker opened at `start`, or -1.
  const closingBracket = (start: number): number => {
    for (let j = start + 1; j < chars.length; j++) {
      if (chars[j] === "]") return j + 1;
    }
    return -1;
  };

  let i = 0;
  while (i < chars.length) {
    const char = chars[i];

    if (char === "[") {
      flushWord();
      let end = closingBracket(i);
      if (end === -1) {
        // Unterminated marker: the rest of the text plays as one word.
        word = chars.slice(i).join("");
        break;
      }

      tokens.push({ kind: "citation", text: chars.slice(i, end).join("") });
      i = end;

      while (i < chars.length && chars[i] === "[") {
        end = closingBracket(i);
        if (end === -1) break;
        tokens.push({ kind: "citation", text: chars.slice(i, end).join("") });
        i = end;
      }
      continue;
    }

    if (WHITESPACE.test(char)) {
      flushWord();
      const last = tokens[tokens.length - 1];
      if (last?.kind === "whitespace") {
        last.text += char;
      } else {
        tokens.push({ kind: "whitespace", text: char });
      }
      i++;
      continue;
    }

    word += char;
    i++;
  }

  flushWord();
  return tokens;
}
