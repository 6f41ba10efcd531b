import { and, eq, gt, isNull } from "drizzle-orm";
import type { Database } from "../config/databaseConnection";
import { refreshTokens } from "../schemas/refreshToken.schema";
import { users } from "../schemas/users.schema";
import type { CreateRefreshTokenInput, RefreshTokenModel } from "./types";

/* ================================
   QUERIES
================================ */

// owner of a token that is neither revoked nor expired at `now`
export const liveTokenOwnerQuery = (db: Database, token: string, now: Date) =>
  db
    .select({ user: users })
    .from(refreshTokens)
    .innerJoin(users, eq(refreshTokens.userId, users.id))
    .where(
      and(
        eq(refreshTokens.token, token),
        isNull(refreshTokens.revokedAt),
        gt(refreshTokens.expiresAt, now)
      )
    )
    .limit(1);

// single conditional UPDATE: a concurrent revoke cannot double-apply
export const revokeTokenQuery = (db: Database, token: string, now: Date) =>
  db
    .update(refreshTokens)
    .set({ revokedAt: now, updatedAt: now })
    .where(and(eq(refreshTokens.token, token), isNull(refreshTokens.revokedAt)))
    .returning({ token: refreshTokens.token });

export const createRefreshTokenModel = (db: Database): RefreshTokenModel => ({
  create: async (input: CreateRefreshTokenInput) => {
    const [row] = await db.insert(refreshTokens).values(input).returning();
    return row;
  },

  findUserByToken: async (token: string, now: Date) => {
    const [row] = await liveTokenOwnerQuery(db, token, now);
    return row?.user ?? null;
  },

  revoke: async (token: string, now: Date) => {
    const revoked = await revokeTokenQuery(db, token, now);
    return revoked.length > 0;
  },
});
