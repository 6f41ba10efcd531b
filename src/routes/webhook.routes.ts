import { Router } from "express";
import type { UserModel } from "../models/types";
import { createWebhookController } from "../controllers/webhook.controller";
import { createRequireApiKey } from "../middlewares/auth.middleware";
import { asyncHandler } from "../utils/asyncHandler";

export interface WebhookRouteDeps {
  users: Pick<UserModel, "upgradeToChirpyRed">;
  polkaKey: string;
}

// mounted at /api/polka
export const createWebhookRoutes = ({ users, polkaKey }: WebhookRouteDeps) => {
  const router = Router();
  const { handlePolkaEvent } = createWebhookController({ users });

  router.post("/webhooks", createRequireApiKey(polkaKey), asyncHandler(handlePolkaEvent));

  return router;
};
