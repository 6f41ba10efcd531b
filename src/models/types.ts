import type { users } from "../schemas/users.schema";
import type { chirps } from "../schemas/chirps.schema";
import type { refreshTokens } from "../schemas/refreshToken.schema";

/* ================================
   RECORDS
================================ */

export type User = typeof users.$inferSelect;
export type Chirp = typeof chirps.$inferSelect;
export type RefreshToken = typeof refreshTokens.$inferSelect;

export type SortOrder = "asc" | "desc";

export interface CreateUserInput {
  email: string;
  hashedPassword: string;
}

export interface CreateChirpInput {
  body: string;
  userId: string;
}

export interface ListChirpsInput {
  authorId?: string;
  sort: SortOrder;
}

export interface CreateRefreshTokenInput {
  token: string;
  userId: string;
  expiresAt: Date;
}

/* ================================
   MODELS
================================ */

export interface UserModel {
  /** @throws ConflictError when the email is already registered */
  create(input: CreateUserInput): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  /** @throws ConflictError when the new email belongs to another user */
  updateCredentials(id: string, input: CreateUserInput): Promise<User | null>;
  /** Returns false when no user has this id. */
  upgradeToChirpyRed(id: string): Promise<boolean>;
  /** Removes every user; chirps and refresh tokens go with them. */
  deleteAll(): Promise<void>;
}

export interface ChirpModel {
  create(input: CreateChirpInput): Promise<Chirp>;
  list(input: ListChirpsInput): Promise<Chirp[]>;
  findById(id: string): Promise<Chirp | null>;
  /** Deletes the chirp only if `userId` wrote it. */
  deleteOwned(id: string, userId: string): Promise<boolean>;
}

export interface RefreshTokenModel {
  create(input: CreateRefreshTokenInput): Promise<RefreshToken>;
  /**
   * Returns the owner of `token` when the token is neither revoked nor
   * expired at `now`.
   */
  findUserByToken(token: string, now: Date): Promise<User | null>;
  /**
   * Marks the token revoked if it exists and is not revoked yet, in one
   * conditional update. Returns whether a row changed.
   */
  revoke(token: string, now: Date): Promise<boolean>;
}

export interface Store {
  users: UserModel;
  chirps: ChirpModel;
  refreshTokens: RefreshTokenModel;
}
