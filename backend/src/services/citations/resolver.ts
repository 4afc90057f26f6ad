import { nanoid } from "nanoid";
import { RESOLVER_LIMITS, type CitationFragment, type Source } from "@lexstream/shared";
import { isAbsoluteUrl, isRedirectMarker, resolveOffline, urlFromTitle } from "./url-tiers.js";
import { sourceKey } from "../stream/response-accumulator.js";
import { log } from "../../middleware/logger.js";

const PROBE_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (iPhone; CPU iPhone OS 16_6 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.6 Mobile/15E148 Safari/604.1",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
};

export type CitationResolverOptions = {
  fetchFn?: typeof fetch;
  timeoutMs?: number;
  concurrency?: number;
};

/**
 * Turns opaque grounding links into destination URLs. Offline heuristics run
 * first; only redirect links they cannot unwrap are probed over the network,
 * and a failed probe keeps the original link.
 */
export class CitationResolver {
  private fetchFn: typeof fetch;
  private timeoutMs: number;
  private concurrency: number;

  constructor(options: CitationResolverOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? RESOLVER_LIMITS.timeoutMs;
    this.concurrency = Math.max(1, options.concurrency ?? RESOLVER_LIMITS.concurrency);
  }

  async resolve(fragment: CitationFragment): Promise<Source | null> {
    const uri = fragment.uri || urlFromTitle(fragment.title);
    if (!uri) {
      log.debug({ title: fragment.title }, "Citation has no usable URL");
      return null;
    }

    return {
      id: nanoid(),
      title: fragment.title,
      url: await this.resolveUrl(uri),
      ...(fragment.snippet ? { snippet: fragment.snippet } : {}),
    };
  }

  async resolveUrl(uri: string): Promise<string> {
    const offline = resolveOffline(uri);
    if (offline !== null) return offline;
    if (!this.isProbeable(uri)) return uri;
    return (await this.probe(uri)) ?? uri;
  }

  /**
   * Resolve a whole source list. Probes run in batches of `concurrency`; the
   * returned list keeps input order and is deduplicated again, since two
   * redirect links can land on the same page.
   */
  async resolveAll(sources: Source[]): Promise<Source[]> {
    const resolved: Source[] = [];
    const pending: number[] = [];

    for (const source of sources) {
      const uri = source.url || urlFromTitle(source.title);
      if (!uri) continue;

      const offline = resolveOffline(uri);
      if (offline === null && this.isProbeable(uri)) pending.push(resolved.length);
      resolved.push({ ...source, url: offline ?? uri });
    }

    for (let i = 0; i < pending.length; i += this.concurrency) {
      const batch = pending.slice(i, i + this.concurrency);
      const urls = await Promise.all(batch.map((idx) => this.probe(resolved[idx].url)));
      batch.forEach((idx, n) => {
        const url = urls[n];
        if (url !== null) resolved[idx] = { ...resolved[idx], url };
      });
    }

    const seen = new Set<string>();
    const unique = resolved.filter((source) => {
      const key = sourceKey(source);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    log.debug(
      { total: sources.length, probed: pending.length, kept: unique.length },
      "Citation URLs resolved",
    );
    return unique;
  }

  private isProbeable(uri: string): boolean {
    return isAbsoluteUrl(uri) && isRedirectMarker(uri);
  }

  /**
   * Follow the redirect chain with HEAD, or GET when HEAD fails outright.
   * Never throws; null means the link could not be resolved.
   */
  async probe(uri: string): Promise<string | null> {
    try {
      const response = await this.request(uri, "HEAD");
      return destinationOf(response);
    } catch (err) {
      log.debug({ uri, err: (err as Error).message }, "HEAD probe failed, retrying with GET");
    }

    try {
      const response = await this.request(uri, "GET");
      await response.body?.cancel();
      return destinationOf(response);
    } catch (err) {
      log.warn({ uri, err: (err as Error).message }, "Could not resolve citation redirect");
      return null;
    }
  }

  private request(uri: string, method: "HEAD" | "GET"): Promise<Response> {
    return this.fetchFn(uri, {
      method,
      redirect: "follow",
      headers: method === "HEAD" ? PROBE_HEADERS : { "User-Agent": PROBE_HEADERS["User-Agent"] },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

function destinationOf(response: Response): string | null {
  const finalUrl = response.url;
  if (finalUrl && isAbsoluteUrl(finalUrl) && !isRedirectMarker(finalUrl)) return finalUrl;

  const location = response.headers.get("location");
  if (location && isAbsoluteUrl(location) && !isRedirectMarker(location)) return location;

  return null;
}
