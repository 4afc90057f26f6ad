export const REDIRECT_MARKERS = ["vertexaisearch", "grounding-api-redirect"] as const;

// Checked in order; any remaining query parameter is tried afterwards.
export const REDIRECT_PARAM_NAMES = [
  "originalUrl",
  "url",
  "link",
  "source",
  "target",
  "redirect",
  "destination",
  "href",
  "source_url",
  "original_url",
] as const;

export const DEFAULT_SOURCE_DENYLIST = [
  "dr.oracle",
  "oracle.ai",
  "oracle.com",
  "google.com/search",
  "google.com/url",
  "internal",
  "tool",
  "generated",
] as const;

export const FAVICON_SERVICE = "https://www.google.com/s2/favicons";
