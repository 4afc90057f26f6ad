import { sqliteTable, text, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ──────────────────────────────────────────────
// Turns: one committed answer per row
// ──────────────────────────────────────────────
export const turns = sqliteTable("turns", {
  id: text("id").primaryKey(),
  conversationId: text("conversation_id").notNull(),
  userContent: text("user_content").notNull(),
  content: text("content").notNull(),
  sources: text("sources").notNull().default("[]"),
  followUpQuestions: text("follow_up_questions").notNull().default("[]"),
  model: text("model").notNull(),
  mode: text("mode", { enum: ["general", "contracts", "caseLaw", "regulations"] }).notNull(),
  createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
}, (table) => [
  index("turns_conversation_created_idx").on(table.conversationId, table.createdAt),
]);
