import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  boolean,
} from "drizzle-orm/pg-core";

export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),

  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),

  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),

  email: varchar("email", { length: 255 }).notNull().unique(),

  hashedPassword: varchar("hashed_password", { length: 255 }).notNull(),

  isChirpyRed: boolean("is_chirpy_red").default(false).notNull(),
});
