import { describe, expect, it } from "vitest";
import { cleanProfanity } from "./profanity";

describe("cleanProfanity", () => {
  it("masks listed words regardless of case", () => {
    expect(cleanProfanity("I had something interesting for breakfast")).toBe(
      "I had something interesting for breakfast"
    );
    expect(cleanProfanity("This is a kerfuffle opinion")).toBe("This is a **** opinion");
    expect(cleanProfanity("Sharbert and FORNAX")).toBe("**** and ****");
  });

  it("leaves words with punctuation attached alone", () => {
    expect(cleanProfanity("Fornax! kerfuffle.")).toBe("Fornax! kerfuffle.");
  });

  it("preserves repeated spaces", () => {
    expect(cleanProfanity("a  sharbert  b")).toBe("a  ****  b");
  });
});
