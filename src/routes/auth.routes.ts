import { Router } from "express";
import rateLimit from "express-rate-limit";
import type { AppConfig } from "../config/env";
import type { UserModel } from "../models/types";
import type { SessionService } from "../services/session.service";
import { createUserController } from "../controllers/user.controller";
import { rejectBody } from "../middlewares/request.middleware";
import { asyncHandler } from "../utils/asyncHandler";

export interface AuthRouteDeps {
  users: UserModel;
  sessions: SessionService;
  rateLimit: AppConfig["rateLimit"];
}

// mounted at /api
export const createAuthRoutes = ({ users, sessions, rateLimit: limits }: AuthRouteDeps) => {
  const router = Router();
  const { login, refreshAccessToken, revokeRefreshToken } = createUserController({
    users,
    sessions,
  });

  const loginRateLimit = rateLimit({
    windowMs: limits.windowMs,
    limit: limits.loginMax,
    message: { error: "Too many login attempts, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const refreshRateLimit = rateLimit({
    windowMs: limits.windowMs,
    limit: limits.refreshMax,
    message: { error: "Too many requests, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });

  router.post("/login", loginRateLimit, asyncHandler(login));

  // the refresh token travels as `Authorization: Bearer <token>`, never in a body
  router.post("/refresh", refreshRateLimit, rejectBody, asyncHandler(refreshAccessToken));
  router.post("/revoke", rejectBody, asyncHandler(revokeRefreshToken));

  return router;
};
