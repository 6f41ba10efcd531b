import type { Request, Response } from "express";
import type { UserModel } from "../models/types";
import { ForbiddenError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { RequestCounter } from "../utils/metrics";

export interface AdminControllerDeps {
  users: Pick<UserModel, "deleteAll">;
  counter: RequestCounter;
  platform: string;
}

const metricsPage = (hits: number) => `<html>
  <body>
    <h1>Welcome, Chirpy Admin</h1>
    <p>Chirpy has been visited ${hits} times!</p>
  </body>
</html>
`;

export const createAdminController = ({ users, counter, platform }: AdminControllerDeps) => ({
  getMetrics: (_req: Request, res: Response) => {
    res.type("html").send(metricsPage(counter.load()));
  },

  /* ================================
     RESET (dev only)
  ================================ */
  // wipes every user (chirps and refresh tokens cascade) and the hit counter
  reset: async (_req: Request, res: Response) => {
    if (platform !== "dev") {
      throw new ForbiddenError("Reset is only allowed in dev environment");
    }

    await users.deleteAll();
    counter.store(0);

    logger.warn("Database and metrics reset");
    res.status(200).json({ message: "Reset complete" });
  },
});
