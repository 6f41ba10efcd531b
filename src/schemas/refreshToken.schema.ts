import { pgTable, uuid, varchar, timestamp, index } from "drizzle-orm/pg-core";
import { users } from "./users.schema";

export const refreshTokens = pgTable(
  "refresh_tokens",
  {
    // the raw 64-char hex token is the lookup key; one row per session
    token: varchar("token", { length: 64 }).primaryKey(),

    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),

    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),

    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),

    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),

    revokedAt: timestamp("revoked_at", { withTimezone: true }), // soft revoke, row kept for audit
  },
  (table) => ({
    userIdx: index("idx_refresh_tokens_user").on(table.userId),
  })
);
