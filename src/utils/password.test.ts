import bcrypt from "bcrypt";
import { afterEach, describe, expect, it, vi } from "vitest";
import { HashingError } from "./errors";
import { hashPassword, verifyPassword } from "./password";

describe("password hashing", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("produces a bcrypt hash at cost 10", async () => {
    const hash = await hashPassword("pw1");
    expect(hash.startsWith("$2b$10$")).toBe(true);
    expect(hash).toHaveLength(60);
  });

  it("salts every hash", async () => {
    const [first, second] = await Promise.all([hashPassword("pw1"), hashPassword("pw1")]);
    expect(first).not.toBe(second);
  });

  it("verifies the matching password", async () => {
    const hash = await hashPassword("correct horse");
    await expect(verifyPassword("correct horse", hash)).resolves.toEqual({ ok: true });
  });

  it("reports a mismatch for a different password", async () => {
    const hash = await hashPassword("correct horse");
    await expect(verifyPassword("wrong horse", hash)).resolves.toEqual({
      ok: false,
      reason: "mismatch",
    });
  });

  it("reports a stored value that is not a bcrypt hash as malformed", async () => {
    await expect(verifyPassword("pw1", "not-a-hash")).resolves.toEqual({
      ok: false,
      reason: "malformed",
    });
  });

  it("refuses passwords bcrypt would truncate", async () => {
    await expect(hashPassword("a".repeat(72))).resolves.toMatch(/^\$2b\$10\$/);
    await expect(hashPassword("a".repeat(73))).rejects.toBeInstanceOf(HashingError);
    // 37 two-byte characters: 74 bytes
    await expect(hashPassword("é".repeat(37))).rejects.toBeInstanceOf(HashingError);
  });

  it("does not accept a longer password that shares the first 72 bytes", async () => {
    const hash = await hashPassword("a".repeat(72));
    await expect(verifyPassword(`${"a".repeat(72)}WRONG`, hash)).resolves.toEqual({
      ok: false,
      reason: "too_long",
    });
  });

  it("still runs one comparison when there is no usable stored hash", async () => {
    const compare = vi.spyOn(bcrypt, "compare");

    await expect(verifyPassword("pw1", undefined)).resolves.toEqual({
      ok: false,
      reason: "missing",
    });
    await expect(verifyPassword("pw1", "not-a-hash")).resolves.toEqual({
      ok: false,
      reason: "malformed",
    });

    expect(compare).toHaveBeenCalledTimes(2);
  });

  it("wraps hashing failures in HashingError", async () => {
    vi.spyOn(bcrypt, "hash").mockRejectedValueOnce(new Error("rng failure"));
    await expect(hashPassword("pw1")).rejects.toBeInstanceOf(HashingError);
  });
});
