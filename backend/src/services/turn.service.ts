import { asc, eq, sql } from "drizzle-orm";
import { nanoid } from "nanoid";
import { z } from "zod";
import type { ChatMode, Source, Turn } from "@lexstream/shared";
import type { DB } from "../db/index.js";
import { turns } from "../db/schema.js";
import { log } from "../middleware/logger.js";

export type TurnInput = Omit<Turn, "id" | "createdAt">;

/**
 * Receives one finished turn per conversation exchange.
 */
export interface TurnSink {
  commit(turn: TurnInput): void | Promise<void>;
}

const storedSourcesSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string(),
    url: z.string(),
    snippet: z.string().optional(),
    favicon: z.string().optional(),
  }),
);

const storedQuestionsSchema = z.array(z.string());

function parseJson<T>(raw: string, schema: z.ZodType<T>, fallback: T): T {
  try {
    const result = schema.safeParse(JSON.parse(raw));
    return result.success ? result.data : fallback;
  } catch {
    return fallback;
  }
}

export class TurnStore implements TurnSink {
  constructor(private db: DB) {}

  commit(turn: TurnInput): void {
    const id = nanoid();

    this.db
      .insert(turns)
      .values({
        id,
        conversationId: turn.conversationId,
        userContent: turn.userContent,
        content: turn.content,
        sources: JSON.stringify(turn.sources),
        followUpQuestions: JSON.stringify(turn.followUpQuestions),
        model: turn.model,
        mode: turn.mode,
      })
      .run();

    log.info(
      { conversationId: turn.conversationId, turnId: id, sources: turn.sources.length },
      "Turn committed",
    );
  }

  list(conversationId: string): Turn[] {
    const rows = this.db
      .select()
      .from(turns)
      .where(eq(turns.conversationId, conversationId))
      // rowid breaks ties between turns committed within the same second
      .orderBy(asc(turns.createdAt), sql`rowid`)
      .all();

    return rows.map((row) => ({
      id: row.id,
      conversationId: row.conversationId,
      userContent: row.userContent,
      content: row.content,
      sources: parseJson<Source[]>(row.sources, storedSourcesSchema, []),
      followUpQuestions: parseJson(row.followUpQuestions, storedQuestionsSchema, []),
      model: row.model,
      mode: row.mode satisfies ChatMode,
      createdAt: row.createdAt,
    }));
  }

  deleteConversation(conversationId: string): number {
    const result = this.db.delete(turns).where(eq(turns.conversationId, conversationId)).run();
    return result.changes;
  }
}
