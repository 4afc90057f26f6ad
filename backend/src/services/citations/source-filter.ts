import { DEFAULT_SOURCE_DENYLIST, type Source } from "@lexstream/shared";

/**
 * Drops sources whose URL or title mentions a denylisted pattern
 * (case-insensitive substring match). Runs on resolved URLs.
 */
export class SourceFilter {
  private patterns: string[];

  constructor(patterns: readonly string[] = DEFAULT_SOURCE_DENYLIST) {
    this.patterns = patterns.map((p) => p.toLowerCase()).filter((p) => p.length > 0);
  }

  keep(source: Pick<Source, "url" | "title">): boolean {
    const url = source.url.toLowerCase();
    const title = source.title.toLowerCase();
    return !this.patterns.some((p) => url.includes(p) || title.includes(p));
  }

  apply<T extends Pick<Source, "url" | "title">>(sources: T[]): T[] {
    return sources.filter((s) => this.keep(s));
  }
}
