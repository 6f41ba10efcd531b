import bcrypt from "bcrypt";
import { HashingError } from "./errors";

// bcrypt's conventional default work factor
export const BCRYPT_COST = 10;

// bcrypt ignores everything past the 72nd byte
export const MAX_PASSWORD_BYTES = 72;

// $2a$ / $2b$ / $2y$, two-digit cost, 22 salt chars + 31 hash chars
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export type PasswordCheck =
  | { ok: true }
  | { ok: false; reason: "mismatch" | "malformed" | "missing" | "too_long" };

export const passwordFitsBcrypt = (password: string): boolean =>
  Buffer.byteLength(password, "utf8") <= MAX_PASSWORD_BYTES;

export const hashPassword = async (password: string): Promise<string> => {
  if (!passwordFitsBcrypt(password)) {
    throw new HashingError(`Password exceeds ${MAX_PASSWORD_BYTES} bytes`);
  }
  try {
    return await bcrypt.hash(password, BCRYPT_COST);
  } catch (err) {
    throw new HashingError("Failed to hash password", { cause: err });
  }
};

let dummyHash: Promise<string> | undefined;

// Stand-in hash compared against when there is no usable stored hash
const getDummyHash = (): Promise<string> => {
  if (!dummyHash) {
    dummyHash = bcrypt.hash("chirpy-dummy-password", BCRYPT_COST).catch((err: unknown) => {
      dummyHash = undefined;
      throw new HashingError("Failed to prepare dummy hash", { cause: err });
    });
  }
  return dummyHash;
};

const compare = async (password: string, passwordHash: string): Promise<boolean> => {
  try {
    return await bcrypt.compare(password, passwordHash);
  } catch (err) {
    throw new HashingError("Failed to verify password", { cause: err });
  }
};

/**
 * Compares a plaintext password against a stored bcrypt hash.
 *
 * Every path runs exactly one bcrypt comparison, so a missing user or a
 * corrupt hash takes as long as a wrong password. Callers must treat every
 * failure reason as the same authentication failure; the reason exists for
 * logging.
 */
export const verifyPassword = async (
  password: string,
  passwordHash: string | undefined
): Promise<PasswordCheck> => {
  const usable = passwordHash !== undefined && BCRYPT_HASH_PATTERN.test(passwordHash);
  const isMatch = await compare(password, usable ? passwordHash : await getDummyHash());

  if (passwordHash === undefined) return { ok: false, reason: "missing" };
  if (!usable) return { ok: false, reason: "malformed" };
  if (!passwordFitsBcrypt(password)) return { ok: false, reason: "too_long" };
  return isMatch ? { ok: true } : { ok: false, reason: "mismatch" };
};
