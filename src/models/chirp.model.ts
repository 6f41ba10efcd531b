import { and, asc, desc, eq } from "drizzle-orm";
import type { Database } from "../config/databaseConnection";
import { chirps } from "../schemas/chirps.schema";
import type { ChirpModel, CreateChirpInput, ListChirpsInput } from "./types";

export const createChirpModel = (db: Database): ChirpModel => ({
  create: async (input: CreateChirpInput) => {
    const [chirp] = await db.insert(chirps).values(input).returning();
    return chirp;
  },

  list: async ({ authorId, sort }: ListChirpsInput) => {
    const rows = await db
      .select()
      .from(chirps)
      .where(authorId ? eq(chirps.userId, authorId) : undefined)
      .orderBy(sort === "desc" ? desc(chirps.createdAt) : asc(chirps.createdAt));
    return rows;
  },

  findById: async (id: string) => {
    const [chirp] = await db.select().from(chirps).where(eq(chirps.id, id)).limit(1);
    return chirp ?? null;
  },

  deleteOwned: async (id: string, userId: string) => {
    const deleted = await db
      .delete(chirps)
      .where(and(eq(chirps.id, id), eq(chirps.userId, userId)))
      .returning({ id: chirps.id });
    return deleted.length > 0;
  },
});
