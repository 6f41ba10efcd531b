import crypto from "crypto";
import type { NextFunction, Request, Response } from "express";
import type { SessionService } from "../services/session.service";
import { getApiKey } from "../utils/credentials";
import { CredentialError, UnauthorizedError } from "../utils/errors";
import { logger } from "../utils/logger";

export const createRequireAuth =
  (sessions: Pick<SessionService, "authenticate">) =>
  (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.user = { id: sessions.authenticate(req.headers) };
      next();
    } catch (err) {
      next(err);
    }
  };

/** The authenticated principal; only valid behind `requireAuth`. */
export const currentUserId = (req: Request): string => {
  if (!req.user) {
    throw new UnauthorizedError("Authentication required");
  }
  return req.user.id;
};

const keysMatch = (presented: string, expected: string) => {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

// Webhook callers authenticate with `Authorization: ApiKey <key>`
export const createRequireApiKey =
  (expectedKey: string) =>
  (req: Request, _res: Response, next: NextFunction) => {
    let presented: string;
    try {
      presented = getApiKey(req.headers);
    } catch (err) {
      if (err instanceof CredentialError) {
        logger.debug(`Webhook rejected: ${err.reason}`);
        return next(new UnauthorizedError("Invalid or missing API key"));
      }
      return next(err);
    }

    if (!keysMatch(presented, expectedKey)) {
      logger.debug("Webhook rejected: API key mismatch");
      return next(new UnauthorizedError("Invalid or missing API key"));
    }

    next();
  };
