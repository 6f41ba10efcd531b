import { DatabaseError } from "pg";
import { eq } from "drizzle-orm";
import type { Database } from "../config/databaseConnection";
import { users } from "../schemas/users.schema";
import { ConflictError } from "../utils/errors";
import type { CreateUserInput, UserModel } from "./types";

const UNIQUE_VIOLATION = "23505";

export const isUniqueViolation = (err: unknown): boolean => {
  if (err instanceof DatabaseError) {
    return err.code === UNIQUE_VIOLATION;
  }
  return err instanceof Error && err.cause !== undefined && isUniqueViolation(err.cause);
};

const rethrowConflict = (err: unknown): never => {
  if (isUniqueViolation(err)) {
    throw new ConflictError("Email is already registered");
  }
  throw err;
};

export const createUserModel = (db: Database): UserModel => ({
  /* ================================
     CREATE USER
  ================================ */
  create: async (input: CreateUserInput) => {
    try {
      const [user] = await db.insert(users).values(input).returning();
      return user;
    } catch (err) {
      return rethrowConflict(err);
    }
  },

  findByEmail: async (email: string) => {
    const [user] = await db
      .select()
      .from(users)
      .where(eq(users.email, email))
      .limit(1);
    return user ?? null;
  },

  findById: async (id: string) => {
    const [user] = await db.select().from(users).where(eq(users.id, id)).limit(1);
    return user ?? null;
  },

  /* ================================
     UPDATE USER
  ================================ */
  updateCredentials: async (id: string, input: CreateUserInput) => {
    try {
      const [user] = await db
        .update(users)
        .set({ ...input, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning();
      return user ?? null;
    } catch (err) {
      return rethrowConflict(err);
    }
  },

  upgradeToChirpyRed: async (id: string) => {
    const updated = await db
      .update(users)
      .set({ isChirpyRed: true, updatedAt: new Date() })
      .where(eq(users.id, id))
      .returning({ id: users.id });
    return updated.length > 0;
  },

  deleteAll: async () => {
    await db.delete(users);
  },
});
