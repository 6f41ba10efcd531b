import type { Request, Response } from "express";
import { z } from "zod";
import type { UserModel } from "../models/types";
import type { SessionService } from "../services/session.service";
import { currentUserId } from "../middlewares/auth.middleware";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { MAX_PASSWORD_BYTES, hashPassword, passwordFitsBcrypt } from "../utils/password";
import { toUserResponse } from "../utils/serialize";
import { parseWith } from "../utils/validation";

const emailSchema = z
  .string({ required_error: "Email is required", invalid_type_error: "Email must be a string" })
  .trim()
  .toLowerCase()
  .min(1, "Email is required")
  .email("Email is invalid");

const passwordSchema = z
  .string({ required_error: "Password is required", invalid_type_error: "Password must be a string" })
  .min(1, "Password is required")
  .refine(passwordFitsBcrypt, `Password must be at most ${MAX_PASSWORD_BYTES} bytes`);

const credentialsSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
});

export interface UserControllerDeps {
  users: UserModel;
  sessions: SessionService;
}

export const createUserController = ({ users, sessions }: UserControllerDeps) => ({
  /* ================================
     REGISTER
  ================================ */
  registerUser: async (req: Request, res: Response) => {
    const { email, password } = parseWith(credentialsSchema, req.body ?? {});

    const user = await users.create({
      email,
      hashedPassword: await hashPassword(password),
    });

    logger.info(`User created: ${user.id}`);
    res.status(201).json(toUserResponse(user));
  },

  /* ================================
     UPDATE OWN CREDENTIALS
  ================================ */
  updateUser: async (req: Request, res: Response) => {
    const userId = currentUserId(req);
    const { email, password } = parseWith(credentialsSchema, req.body ?? {});

    const user = await users.updateCredentials(userId, {
      email,
      hashedPassword: await hashPassword(password),
    });
    if (!user) {
      throw new NotFoundError("User not found");
    }

    res.json(toUserResponse(user));
  },

  /* ================================
     LOGIN
  ================================ */
  login: async (req: Request, res: Response) => {
    const { email, password } = parseWith(credentialsSchema, req.body ?? {});

    const { user, accessToken, refreshToken } = await sessions.login(email, password);

    res.json({
      ...toUserResponse(user),
      token: accessToken,
      refresh_token: refreshToken,
    });
  },

  /* ================================
     REFRESH ACCESS TOKEN
  ================================ */
  refreshAccessToken: async (req: Request, res: Response) => {
    const refreshToken = sessions.refreshTokenFrom(req.headers);
    const { accessToken } = await sessions.refresh(refreshToken);

    res.json({ token: accessToken });
  },

  /* ================================
     REVOKE (LOGOUT)
  ================================ */
  // 204 whether or not a live token matched, so token state is not observable
  revokeRefreshToken: async (req: Request, res: Response) => {
    const refreshToken = sessions.refreshTokenFrom(req.headers);
    await sessions.revoke(refreshToken);

    res.status(204).end();
  },
});
