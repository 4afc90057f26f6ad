import type { Source } from "@lexstream/shared";
import { nanoid } from "nanoid";

// A "Sources" heading on its own line and everything after it.
const SOURCES_SECTION = /(^|\n)[ \t]*(?:#{1,6}[ \t]*)?\**Sources?\**:?\**[ \t]*(?:\n[\s\S]*)?$/i;
const URL_PLACEHOLDER = /\(?URL unavailable\)?/gi;
const URL_LABEL = /\bURL:\s*/gi;

/**
 * Strip what the model was told not to write: a trailing sources list,
 * "URL unavailable" placeholders and bare "URL:" labels.
 */
export function sanitizeAnswer(text: string): string {
  const cleaned = text
    .replace(SOURCES_SECTION, "$1")
    .replace(URL_PLACEHOLDER, "")
    .replace(URL_LABEL, "")
    .replace(/ {2,}/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();

  // Never let cleaning eat the whole answer.
  return cleaned || text.trim();
}

const URL_PATTERN = /https?:\/\/[A-Za-z0-9.\-/_?=#%&+:;,]+[A-Za-z0-9/#]/g;
const DOMAIN_PATTERN = /\b([A-Za-z0-9-]+\.(?:[A-Za-z0-9-]+\.)*[A-Za-z]{2,})\b/g;

/**
 * Sources named in the answer text itself, used only when the response
 * carried no grounding metadata. Absolute URLs first, then bare domains.
 */
export function deriveSources(text: string): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];

  const add = (url: string, title: string) => {
    if (seen.has(url)) return;
    seen.add(url);
    sources.push({ id: nanoid(), title, url });
  };

  const withoutUrls = text.replace(URL_PATTERN, (match) => {
    const url = match.replace(/[.,);\]]+$/, "");
    add(url, hostOf(url));
    return " ";
  });

  for (const match of withoutUrls.matchAll(DOMAIN_PATTERN)) {
    const domain = match[1].toLowerCase();
    add(`https://${domain}`, domain);
  }

  return sources;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}
