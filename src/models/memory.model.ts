import crypto from "crypto";
import { ConflictError } from "../utils/errors";
import type {
  Chirp,
  CreateChirpInput,
  CreateRefreshTokenInput,
  CreateUserInput,
  ListChirpsInput,
  RefreshToken,
  Store,
  User,
} from "./types";

export interface MemoryStoreOptions {
  now?: () => Date;
}

/**
 * In-process store with the same contract as the Postgres one: unique emails,
 * cascade on user deletion, conditional revoke. Selected with
 * STORAGE_DRIVER=memory and used by the test suite.
 */
export const createMemoryStore = ({ now = () => new Date() }: MemoryStoreOptions = {}): Store => {
  const users = new Map<string, User>();
  const chirps = new Map<string, Chirp>();
  const refreshTokens = new Map<string, RefreshToken>();

  const emailTaken = (email: string, exceptId?: string) =>
    [...users.values()].some((u) => u.email === email && u.id !== exceptId);

  return {
    users: {
      create: async (input: CreateUserInput) => {
        if (emailTaken(input.email)) {
          throw new ConflictError("Email is already registered");
        }
        const timestamp = now();
        const user: User = {
          id: crypto.randomUUID(),
          createdAt: timestamp,
          updatedAt: timestamp,
          email: input.email,
          hashedPassword: input.hashedPassword,
          isChirpyRed: false,
        };
        users.set(user.id, user);
        return { ...user };
      },

      findByEmail: async (email: string) => {
        const user = [...users.values()].find((u) => u.email === email);
        return user ? { ...user } : null;
      },

      findById: async (id: string) => {
        const user = users.get(id);
        return user ? { ...user } : null;
      },

      updateCredentials: async (id: string, input: CreateUserInput) => {
        const user = users.get(id);
        if (!user) return null;
        if (emailTaken(input.email, id)) {
          throw new ConflictError("Email is already registered");
        }
        const updated: User = { ...user, ...input, updatedAt: now() };
        users.set(id, updated);
        return { ...updated };
      },

      upgradeToChirpyRed: async (id: string) => {
        const user = users.get(id);
        if (!user) return false;
        users.set(id, { ...user, isChirpyRed: true, updatedAt: now() });
        return true;
      },

      deleteAll: async () => {
        users.clear();
        chirps.clear();
        refreshTokens.clear();
      },
    },

    chirps: {
      create: async (input: CreateChirpInput) => {
        const timestamp = now();
        const chirp: Chirp = {
          id: crypto.randomUUID(),
          createdAt: timestamp,
          updatedAt: timestamp,
          body: input.body,
          userId: input.userId,
        };
        chirps.set(chirp.id, chirp);
        return { ...chirp };
      },

      list: async ({ authorId, sort }: ListChirpsInput) => {
        const direction = sort === "desc" ? -1 : 1;
        return [...chirps.values()]
          .filter((c) => !authorId || c.userId === authorId)
          .sort((a, b) => direction * (a.createdAt.getTime() - b.createdAt.getTime()))
          .map((c) => ({ ...c }));
      },

      findById: async (id: string) => {
        const chirp = chirps.get(id);
        return chirp ? { ...chirp } : null;
      },

      deleteOwned: async (id: string, userId: string) => {
        const chirp = chirps.get(id);
        if (!chirp || chirp.userId !== userId) return false;
        return chirps.delete(id);
      },
    },

    refreshTokens: {
      create: async (input: CreateRefreshTokenInput) => {
        if (refreshTokens.has(input.token)) {
          throw new ConflictError("Refresh token already exists");
        }
        const timestamp = now();
        const row: RefreshToken = {
          token: input.token,
          createdAt: timestamp,
          updatedAt: timestamp,
          userId: input.userId,
          expiresAt: input.expiresAt,
          revokedAt: null,
        };
        refreshTokens.set(row.token, row);
        return { ...row };
      },

      findUserByToken: async (token: string, at: Date) => {
        const row = refreshTokens.get(token);
        if (!row || row.revokedAt !== null || row.expiresAt <= at) {
          return null;
        }
        const user = users.get(row.userId);
        return user ? { ...user } : null;
      },

      revoke: async (token: string, at: Date) => {
        const row = refreshTokens.get(token);
        if (!row || row.revokedAt !== null) return false;
        refreshTokens.set(token, { ...row, revokedAt: at, updatedAt: at });
        return true;
      },
    },
  };
};
