const PROFANE_WORDS = new Set(["kerfuffle", "sharbert", "fornax"]);

const MASK = "****";

// Matches whole space-separated words only: "Fornax!" is left alone
export const cleanProfanity = (body: string): string =>
  body
    .split(" ")
    .map((word) => (PROFANE_WORDS.has(word.toLowerCase()) ? MASK : word))
    .join(" ");
