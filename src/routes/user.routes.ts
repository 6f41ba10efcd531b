import { Router, type RequestHandler } from "express";
import type { UserModel } from "../models/types";
import type { SessionService } from "../services/session.service";
import { createUserController } from "../controllers/user.controller";
import { asyncHandler } from "../utils/asyncHandler";

export interface UserRouteDeps {
  users: UserModel;
  sessions: SessionService;
  requireAuth: RequestHandler;
}

// mounted at /api/users
export const createUserRoutes = ({ users, sessions, requireAuth }: UserRouteDeps) => {
  const router = Router();
  const { registerUser, updateUser } = createUserController({ users, sessions });

  router.post("/", asyncHandler(registerUser));
  router.put("/", requireAuth, asyncHandler(updateUser));

  return router;
};
