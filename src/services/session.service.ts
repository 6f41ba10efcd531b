import type { IncomingHttpHeaders } from "http";
import type { RefreshTokenModel, User, UserModel } from "../models/types";
import { getBearerToken } from "../utils/credentials";
import {
  AccessTokenError,
  AuthenticationFailedError,
  CredentialError,
  UnauthorizedError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { verifyPassword } from "../utils/password";
import {
  ACCESS_TOKEN_TTL_SECONDS,
  REFRESH_TOKEN_TTL_MS,
  generateRefreshToken,
  issueAccessToken,
  validateAccessToken,
} from "../utils/token";

export interface SessionServiceDeps {
  users: Pick<UserModel, "findByEmail">;
  refreshTokens: RefreshTokenModel;
  jwtSecret: string;
  now?: () => Date;
  accessTokenTtlSeconds?: number;
  refreshTokenTtlMs?: number;
}

export interface LoginResult {
  user: User;
  accessToken: string;
  refreshToken: string;
}

export interface RefreshResult {
  userId: string;
  accessToken: string;
}

export type SessionService = ReturnType<typeof createSessionService>;

const INVALID_ACCESS_TOKEN = "Invalid or missing token";
const INVALID_REFRESH_TOKEN = "Invalid or missing refresh token";

/**
 * Login, refresh and revoke flows plus the bearer guard every protected
 * route goes through.
 *
 * Internal failure reasons (expired, malformed, wrong signature, unknown
 * email, bad password) are logged at debug level and collapsed into
 * `AuthenticationFailedError` or `UnauthorizedError` for the caller.
 */
export const createSessionService = ({
  users,
  refreshTokens,
  jwtSecret,
  now = () => new Date(),
  accessTokenTtlSeconds = ACCESS_TOKEN_TTL_SECONDS,
  refreshTokenTtlMs = REFRESH_TOKEN_TTL_MS,
}: SessionServiceDeps) => {
  /* ================================
     LOGIN
  ================================ */
  const login = async (email: string, password: string): Promise<LoginResult> => {
    const user = await users.findByEmail(email);

    // one bcrypt comparison on every path, unknown email included
    const check = await verifyPassword(password, user?.hashedPassword);
    if (!user) {
      logger.debug("Login rejected: unknown email");
      throw new AuthenticationFailedError();
    }
    if (!check.ok) {
      logger.debug(`Login rejected for user ${user.id}: password ${check.reason}`);
      throw new AuthenticationFailedError();
    }

    const issuedAt = now();
    const accessToken = issueAccessToken(user.id, jwtSecret, accessTokenTtlSeconds, issuedAt);
    const refreshToken = generateRefreshToken();

    // keyed by the token itself: a user holds one row per session
    await refreshTokens.create({
      token: refreshToken,
      userId: user.id,
      expiresAt: new Date(issuedAt.getTime() + refreshTokenTtlMs),
    });

    logger.debug(`Login successful for user ${user.id}`);

    return { user, accessToken, refreshToken };
  };

  /* ================================
     REFRESH
  ================================ */
  // The refresh token is neither rotated nor extended
  const refresh = async (refreshToken: string): Promise<RefreshResult> => {
    const at = now();
    const user = await refreshTokens.findUserByToken(refreshToken, at);
    if (!user) {
      // unknown, revoked and expired look the same to the caller
      throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
    }

    return {
      userId: user.id,
      accessToken: issueAccessToken(user.id, jwtSecret, accessTokenTtlSeconds, at),
    };
  };

  /* ================================
     REVOKE
  ================================ */
  const revoke = async (refreshToken: string): Promise<boolean> => {
    const revoked = await refreshTokens.revoke(refreshToken, now());
    if (!revoked) {
      logger.debug("Revoke was a no-op: token unknown or already revoked");
    }
    return revoked;
  };

  /* ================================
     GUARDS
  ================================ */
  const toUnauthorized = (err: unknown, message: string): never => {
    if (err instanceof CredentialError || err instanceof AccessTokenError) {
      logger.debug(`Request rejected: ${err.reason} (${err.message})`);
      throw new UnauthorizedError(message, { cause: err });
    }
    throw err;
  };

  /** Resolves the user id behind the request's bearer access token. */
  const authenticate = (headers: IncomingHttpHeaders): string => {
    try {
      return validateAccessToken(getBearerToken(headers), jwtSecret, now());
    } catch (err) {
      return toUnauthorized(err, INVALID_ACCESS_TOKEN);
    }
  };

  /** Reads the refresh token presented as a bearer credential. */
  const refreshTokenFrom = (headers: IncomingHttpHeaders): string => {
    try {
      return getBearerToken(headers);
    } catch (err) {
      return toUnauthorized(err, INVALID_REFRESH_TOKEN);
    }
  };

  return { login, refresh, revoke, authenticate, refreshTokenFrom };
};
