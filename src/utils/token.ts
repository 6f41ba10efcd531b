import jwt, {
  JsonWebTokenError,
  TokenExpiredError,
  type Algorithm,
  type Jwt,
  type JwtPayload,
} from "jsonwebtoken";
import crypto from "crypto";
import { z } from "zod";
import { AccessTokenError, EntropyError } from "./errors";

export const TOKEN_ISSUER = "chirpy";
export const ACCESS_TOKEN_TTL_SECONDS = 60 * 60; // 1 hour
export const REFRESH_TOKEN_TTL_MS = 60 * 24 * 60 * 60 * 1000; // 60 days
export const REFRESH_TOKEN_BYTES = 32;

const SIGNING_ALGORITHM: Algorithm = "HS256";

// anything outside this list is rejected before the signature is checked
export const HMAC_ALGORITHMS: readonly Algorithm[] = ["HS256", "HS384", "HS512"];

const NIL_UUID = "00000000-0000-0000-0000-000000000000";

const subjectSchema = z
  .string()
  .uuid()
  .refine((value) => value !== NIL_UUID);

const toUnixSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

/* ================================
   ACCESS TOKENS
================================ */

/**
 * Signs a short-lived access token for `userId`.
 *
 * A `ttlSeconds` of zero or less yields a token that is already expired.
 * Every token carries a random `jti`, so two tokens minted for the same user
 * within the same second are still distinct strings.
 */
export const issueAccessToken = (
  userId: string,
  secret: string,
  ttlSeconds: number,
  now: Date = new Date()
): string => {
  const issuedAt = toUnixSeconds(now);

  return jwt.sign(
    {
      iss: TOKEN_ISSUER,
      sub: userId,
      iat: issuedAt,
      exp: issuedAt + Math.trunc(ttlSeconds),
      jti: crypto.randomUUID(),
    },
    secret,
    { algorithm: SIGNING_ALGORITHM }
  );
};

const decodeStructure = (token: string) => {
  const segments = token.split(".");
  if (segments.length !== 3 || !segments[0] || !segments[1]) {
    throw new AccessTokenError("Malformed", "token must have three segments");
  }

  let decoded: Jwt | null;
  try {
    // jws parses a `typ: JWT` payload eagerly and throws on bad JSON
    decoded = jwt.decode(token, { complete: true });
  } catch (err) {
    throw new AccessTokenError("Malformed", "token payload is not valid JSON", { cause: err });
  }
  if (!decoded || typeof decoded.payload === "string") {
    throw new AccessTokenError("Malformed", "token header or payload is not valid JSON");
  }

  return decoded;
};

const toAccessTokenError = (err: unknown): AccessTokenError => {
  if (err instanceof TokenExpiredError) {
    return new AccessTokenError("Expired", "token has expired", { cause: err });
  }
  if (err instanceof JsonWebTokenError) {
    if (err.message.startsWith("jwt issuer invalid")) {
      return new AccessTokenError("InvalidIssuer", err.message, { cause: err });
    }
    if (err.message === "jwt malformed") {
      return new AccessTokenError("Malformed", err.message, { cause: err });
    }
    return new AccessTokenError("InvalidSignature", err.message, { cause: err });
  }
  throw err;
};

/**
 * Verifies an access token and returns the user id it was issued for.
 *
 * @throws AccessTokenError when the token is malformed, signed with anything
 * but an HMAC algorithm or another secret, expired (`exp <= now`), issued by
 * someone else, or carries a subject that is not a user id.
 */
export const validateAccessToken = (
  token: string,
  secret: string,
  now: Date = new Date()
): string => {
  const { header } = decodeStructure(token);

  if (!HMAC_ALGORITHMS.some((alg) => alg === header.alg)) {
    throw new AccessTokenError(
      "InvalidSignature",
      `unexpected signing method: ${String(header.alg)}`
    );
  }

  let payload: JwtPayload | string;
  try {
    payload = jwt.verify(token, secret, {
      algorithms: [...HMAC_ALGORITHMS],
      issuer: TOKEN_ISSUER,
      clockTimestamp: toUnixSeconds(now),
    });
  } catch (err) {
    throw toAccessTokenError(err);
  }

  if (typeof payload === "string" || typeof payload.exp !== "number") {
    throw new AccessTokenError("Malformed", "token has no expiry claim");
  }

  const subject = subjectSchema.safeParse(payload.sub);
  if (!subject.success) {
    throw new AccessTokenError("InvalidSubject", "invalid user id in token");
  }

  return subject.data;
};

/* ================================
   REFRESH TOKENS
================================ */

// 32 random bytes, hex encoded (64 lowercase chars)
export const generateRefreshToken = (): string => {
  let bytes: Buffer;
  try {
    bytes = crypto.randomBytes(REFRESH_TOKEN_BYTES);
  } catch (err) {
    throw new EntropyError("Random source failed", { cause: err });
  }

  if (bytes.length !== REFRESH_TOKEN_BYTES) {
    throw new EntropyError(
      `expected ${REFRESH_TOKEN_BYTES} random bytes, got ${bytes.length}`
    );
  }

  return bytes.toString("hex");
};
