export type PlaybackToken =
  | { kind: "word"; text: string }
  | { kind: "whitespace"; text: string }
  | { kind: "citation"; text: string };

export type PlaybackState = "idle" | "playing" | "completed";
