import { FAVICON_SERVICE, type Source } from "@lexstream/shared";

/** Host of a source URL without a leading `www.`; empty when the URL does not parse. */
export function sourceDomain(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./i, "");
  } catch {
    return "";
  }
}

export function faviconUrl(url: string): string | null {
  const domain = sourceDomain(url);
  if (!domain) return null;
  return `${FAVICON_SERVICE}?domain=${encodeURIComponent(domain)}&sz=64`;
}

export function withFavicon(source: Source): Source {
  if (source.favicon) return source;
  const favicon = faviconUrl(source.url);
  return favicon ? { ...source, favicon } : source;
}
