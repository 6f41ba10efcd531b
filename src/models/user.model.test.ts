import { DatabaseError } from "pg";
import { describe, expect, it } from "vitest";
import { isUniqueViolation } from "./user.model";

const pgError = (code: string) => {
  const err = new DatabaseError("duplicate key value violates unique constraint", 0, "error");
  err.code = code;
  return err;
};

describe("isUniqueViolation", () => {
  it("matches SQLSTATE 23505", () => {
    expect(isUniqueViolation(pgError("23505"))).toBe(true);
    expect(isUniqueViolation(pgError("23503"))).toBe(false);
  });

  it("looks through wrapped causes", () => {
    const wrapped = new Error("Failed query", { cause: pgError("23505") });
    expect(isUniqueViolation(wrapped)).toBe(true);
  });

  it("ignores everything else", () => {
    expect(isUniqueViolation(new Error("boom"))).toBe(false);
    expect(isUniqueViolation("23505")).toBe(false);
  });
});
