// Schemas
export { sendMessageInputSchema, chatModeSchema } from "./schemas/chat.js";
export type { SendMessageInput } from "./schemas/chat.js";

// Types
export type { CitationFragment, Source, AssembledResponse, SplitResponse } from "./types/source.js";
export type { PlaybackToken, PlaybackState } from "./types/playback.js";
export type { ChatMode, ModelTier, Turn, TurnCompletion, StreamEvent } from "./types/chat.js";
export type { ApiError } from "./types/api.js";

// Constants
export { PRIMARY_MODEL, FALLBACK_MODEL } from "./constants/models.js";
export {
  LIMITS,
  FOLLOW_UP_SENTINEL,
  FOLLOW_UP_LIMITS,
  PLAYBACK_DELAYS,
  RESOLVER_LIMITS,
} from "./constants/limits.js";
export {
  REDIRECT_MARKERS,
  REDIRECT_PARAM_NAMES,
  DEFAULT_SOURCE_DENYLIST,
  FAVICON_SERVICE,
} from "./constants/sources.js";
