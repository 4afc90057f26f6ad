import { REDIRECT_MARKERS, REDIRECT_PARAM_NAMES } from "@lexstream/shared";

/**
 * A single resolution heuristic: the canonical URL for a citation URI, or
 * null when this heuristic has nothing to say.
 */
export type UrlTier = (uri: string) => string | null;

const ABSOLUTE_URL = /^https?:\/\//i;
const EMBEDDED_URL = /https?:\/\/[^\s)?&]+/g;

export function isAbsoluteUrl(value: string): boolean {
  return ABSOLUTE_URL.test(value);
}

export function isRedirectMarker(value: string): boolean {
  const lower = value.toLowerCase();
  return REDIRECT_MARKERS.some((marker) => lower.includes(marker));
}

export function isBareDomain(value: string): boolean {
  return !isAbsoluteUrl(value) && value.includes(".") && !/\s/.test(value);
}

function isCanonical(value: string): boolean {
  return isAbsoluteUrl(value) && !isRedirectMarker(value);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

// Values arrive decoded once by URLSearchParams; double-encoded ones need another pass.
function decodeCandidate(value: string): string {
  return isAbsoluteUrl(value) ? value : safeDecode(value);
}

export const acceptAbsolute: UrlTier = (uri) => (isCanonical(uri) ? uri : null);

export const promoteBareDomain: UrlTier = (uri) =>
  isBareDomain(uri) && !isRedirectMarker(uri) ? `https://${uri}` : null;

export const fromQueryParams: UrlTier = (uri) => {
  if (!isRedirectMarker(uri)) return null;
  const url = parseUrl(uri);
  if (!url) return null;

  const params = [...url.searchParams.entries()];
  const byName = (name: string) =>
    params.find(([key, value]) => key.toLowerCase() === name.toLowerCase() && value.length > 0)?.[1];

  for (const name of REDIRECT_PARAM_NAMES) {
    const value = byName(name);
    if (value === undefined) continue;
    const decoded = decodeCandidate(value);
    if (isCanonical(decoded)) return decoded;
  }

  for (const [, value] of params) {
    if (!value) continue;
    const decoded = decodeCandidate(value);
    if (isCanonical(decoded)) return decoded;
  }

  return null;
};

export const fromFragment: UrlTier = (uri) => {
  if (!isRedirectMarker(uri)) return null;
  const url = parseUrl(uri);
  if (!url || url.hash.length <= 1) return null;

  const decoded = safeDecode(url.hash.slice(1));
  return isCanonical(decoded) ? decoded : null;
};

function firstEmbeddedUrl(haystack: string): string | null {
  for (const match of haystack.matchAll(EMBEDDED_URL)) {
    if (!isRedirectMarker(match[0])) return match[0];
  }
  return null;
}

export const fromPath: UrlTier = (uri) => {
  if (!isRedirectMarker(uri)) return null;
  const url = parseUrl(uri);
  if (!url) return null;

  const path = safeDecode(url.pathname);
  return path.includes("http") ? firstEmbeddedUrl(path) : null;
};

export const fromUriString: UrlTier = (uri) => (isRedirectMarker(uri) ? firstEmbeddedUrl(uri) : null);

/**
 * Compose tiers so the first one returning a URL wins.
 */
export function firstSuccess(tiers: readonly UrlTier[]): UrlTier {
  return (uri) => {
    for (const tier of tiers) {
      const resolved = tier(uri);
      if (resolved !== null) return resolved;
    }
    return null;
  };
}

export const OFFLINE_TIERS: readonly UrlTier[] = [
  acceptAbsolute,
  promoteBareDomain,
  fromQueryParams,
  fromFragment,
  fromPath,
  fromUriString,
];

export const resolveOffline = firstSuccess(OFFLINE_TIERS);

/**
 * A URL for a fragment that arrived without one: an absolute URL quoted in
 * the title, or a title that is itself a bare domain.
 */
export function urlFromTitle(title: string): string | null {
  const trimmed = title.trim();
  const embedded = trimmed.match(/https?:\/\/[^\s)]+/);
  if (embedded && !isRedirectMarker(embedded[0])) return embedded[0];
  if (isBareDomain(trimmed) && !isRedirectMarker(trimmed)) return `https://${trimmed}`;
  return null;
}
