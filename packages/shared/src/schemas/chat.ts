import { z } from "zod";
import { LIMITS } from "../constants/limits.js";

export const chatModeSchema = z.enum(["general", "contracts", "caseLaw", "regulations"]);

export const sendMessageInputSchema = z.object({
  content: z.string().trim().min(1).max(LIMITS.MESSAGE_MAX_LENGTH),
  mode: chatModeSchema.default("general"),
});

export type SendMessageInput = z.infer<typeof sendMessageInputSchema>;
