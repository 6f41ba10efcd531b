import type { Request, Response } from "express";
import { z } from "zod";
import type { UserModel } from "../models/types";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseWith } from "../utils/validation";

export const USER_UPGRADED_EVENT = "user.upgraded";

const eventSchema = z.object({
  event: z.string({ required_error: "Event is required" }),
  data: z.unknown(),
});

const upgradeSchema = z.object(
  {
    user_id: z.string({ required_error: "user_id is required" }).uuid("Invalid user_id"),
  },
  { required_error: "Event data is required", invalid_type_error: "Event data must be an object" }
);

export interface WebhookControllerDeps {
  users: Pick<UserModel, "upgradeToChirpyRed">;
}

export const createWebhookController = ({ users }: WebhookControllerDeps) => ({
  /* ================================
     POLKA SUBSCRIPTION WEBHOOK
  ================================ */
  // Unknown events are acknowledged and ignored
  handlePolkaEvent: async (req: Request, res: Response) => {
    const { event, data } = parseWith(eventSchema, req.body ?? {});

    if (event !== USER_UPGRADED_EVENT) {
      res.status(204).end();
      return;
    }

    const { user_id: userId } = parseWith(upgradeSchema, data);

    if (!(await users.upgradeToChirpyRed(userId))) {
      throw new NotFoundError("User not found");
    }

    logger.info(`User ${userId} upgraded to Chirpy Red`);
    res.status(204).end();
  },
});
