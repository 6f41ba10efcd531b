import { describe, expect, it } from "vitest";
import { getApiKey, getBearerToken } from "./credentials";
import { CredentialError } from "./errors";

const reasonOf = (fn: () => unknown) => {
  try {
    fn();
  } catch (err) {
    if (err instanceof CredentialError) return err.reason;
    throw err;
  }
  throw new Error("expected a CredentialError");
};

describe("getBearerToken", () => {
  it("returns everything after the Bearer prefix", () => {
    expect(getBearerToken({ authorization: "Bearer abc.def.ghi" })).toBe("abc.def.ghi");
  });

  it("keeps trailing whitespace in the credential", () => {
    expect(getBearerToken({ authorization: "Bearer token " })).toBe("token ");
  });

  it("reports a missing or empty header", () => {
    expect(reasonOf(() => getBearerToken({}))).toBe("MissingCredential");
    expect(reasonOf(() => getBearerToken({ authorization: "" }))).toBe("MissingCredential");
  });

  it.each(["bearer abc", "Token abc", "Bearerabc", "ApiKey abc"])(
    "rejects %j as malformed",
    (authorization) => {
      expect(reasonOf(() => getBearerToken({ authorization }))).toBe("MalformedCredential");
    }
  );
});

describe("getApiKey", () => {
  it("returns everything after the ApiKey prefix", () => {
    expect(getApiKey({ authorization: "ApiKey test-polka-key" })).toBe("test-polka-key");
  });

  it("rejects a bearer credential", () => {
    expect(reasonOf(() => getApiKey({ authorization: "Bearer test-polka-key" }))).toBe(
      "MalformedCredential"
    );
  });

  it("reports a missing header", () => {
    expect(reasonOf(() => getApiKey({}))).toBe("MissingCredential");
  });
});
