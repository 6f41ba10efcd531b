import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError } from "../utils/errors";
import { createMemoryStore } from "./memory.model";
import type { Store } from "./types";

const HASH = "$2b$10$abcdefghijklmnopqrstuuABCDEFGHIJKLMNOPQRSTUVWXYZ01234";

describe("memory store", () => {
  let tick: number;
  let store: Store;

  beforeEach(() => {
    tick = 0;
    // every write lands one second after the previous one
    store = createMemoryStore({ now: () => new Date(Date.UTC(2025, 0, 1) + tick++ * 1000) });
  });

  describe("users", () => {
    it("rejects a second user with the same email", async () => {
      await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      await expect(
        store.users.create({ email: "a@example.com", hashedPassword: HASH })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("updates credentials and bumps updatedAt", async () => {
      const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      const updated = await store.users.updateCredentials(user.id, {
        email: "b@example.com",
        hashedPassword: "other",
      });

      expect(updated?.email).toBe("b@example.com");
      expect(updated?.createdAt).toEqual(user.createdAt);
      expect(updated?.updatedAt.getTime()).toBe(user.updatedAt.getTime() + 1000);
      expect(await store.users.findByEmail("a@example.com")).toBeNull();
    });

    it("refuses to take another user's email on update", async () => {
      await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      const other = await store.users.create({ email: "b@example.com", hashedPassword: HASH });

      await expect(
        store.users.updateCredentials(other.id, { email: "a@example.com", hashedPassword: HASH })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("upgrades an existing user only", async () => {
      const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });

      expect(await store.users.upgradeToChirpyRed(user.id)).toBe(true);
      expect((await store.users.findById(user.id))?.isChirpyRed).toBe(true);
      expect(await store.users.upgradeToChirpyRed("5b0c7a4e-2f8d-4e1a-9c3b-6d7e8f9a0b1c")).toBe(false);
    });

    it("hands out copies", async () => {
      const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      user.email = "mutated@example.com";
      expect((await store.users.findById(user.id))?.email).toBe("a@example.com");
    });
  });

  describe("chirps", () => {
    it("lists by creation time in either direction and filters by author", async () => {
      const alice = await store.users.create({ email: "alice@example.com", hashedPassword: HASH });
      const bob = await store.users.create({ email: "bob@example.com", hashedPassword: HASH });
      await store.chirps.create({ body: "first", userId: alice.id });
      await store.chirps.create({ body: "second", userId: bob.id });
      await store.chirps.create({ body: "third", userId: alice.id });

      const bodies = async (input: Parameters<Store["chirps"]["list"]>[0]) =>
        (await store.chirps.list(input)).map((c) => c.body);

      expect(await bodies({ sort: "asc" })).toEqual(["first", "second", "third"]);
      expect(await bodies({ sort: "desc" })).toEqual(["third", "second", "first"]);
      expect(await bodies({ sort: "asc", authorId: alice.id })).toEqual(["first", "third"]);
    });

    it("deletes a chirp only for its author", async () => {
      const alice = await store.users.create({ email: "alice@example.com", hashedPassword: HASH });
      const bob = await store.users.create({ email: "bob@example.com", hashedPassword: HASH });
      const chirp = await store.chirps.create({ body: "mine", userId: alice.id });

      expect(await store.chirps.deleteOwned(chirp.id, bob.id)).toBe(false);
      expect(await store.chirps.deleteOwned(chirp.id, alice.id)).toBe(true);
      expect(await store.chirps.findById(chirp.id)).toBeNull();
    });
  });

  describe("refresh tokens", () => {
    const TOKEN = "a".repeat(64);

    it("resolves the owner until expiry", async () => {
      const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      const expiresAt = new Date(Date.UTC(2025, 0, 2));
      await store.refreshTokens.create({ token: TOKEN, userId: user.id, expiresAt });

      expect((await store.refreshTokens.findUserByToken(TOKEN, new Date(expiresAt.getTime() - 1)))?.id).toBe(
        user.id
      );
      expect(await store.refreshTokens.findUserByToken(TOKEN, expiresAt)).toBeNull();
    });

    it("revokes once", async () => {
      const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      await store.refreshTokens.create({
        token: TOKEN,
        userId: user.id,
        expiresAt: new Date(Date.UTC(2025, 2, 1)),
      });
      const at = new Date(Date.UTC(2025, 0, 1, 1));

      expect(await store.refreshTokens.revoke(TOKEN, at)).toBe(true);
      expect(await store.refreshTokens.revoke(TOKEN, at)).toBe(false);
      expect(await store.refreshTokens.revoke("unknown", at)).toBe(false);
      expect(await store.refreshTokens.findUserByToken(TOKEN, at)).toBeNull();
    });

    it("rejects a duplicate token", async () => {
      const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });
      const input = { token: TOKEN, userId: user.id, expiresAt: new Date(Date.UTC(2025, 2, 1)) };
      await store.refreshTokens.create(input);
      await expect(store.refreshTokens.create(input)).rejects.toBeInstanceOf(ConflictError);
    });
  });

  it("deleteAll removes users, chirps and tokens", async () => {
    const user = await store.users.create({ email: "a@example.com", hashedPassword: HASH });
    const chirp = await store.chirps.create({ body: "gone soon", userId: user.id });
    await store.refreshTokens.create({
      token: "b".repeat(64),
      userId: user.id,
      expiresAt: new Date(Date.UTC(2025, 2, 1)),
    });

    await store.users.deleteAll();

    expect(await store.users.findById(user.id)).toBeNull();
    expect(await store.chirps.findById(chirp.id)).toBeNull();
    expect(
      await store.refreshTokens.findUserByToken("b".repeat(64), new Date(Date.UTC(2025, 0, 1)))
    ).toBeNull();
  });
});
