import { Router } from "express";
import type { UserModel } from "../models/types";
import type { RequestCounter } from "../utils/metrics";
import { createAdminController } from "../controllers/admin.controller";
import { asyncHandler } from "../utils/asyncHandler";

export interface AdminRouteDeps {
  users: Pick<UserModel, "deleteAll">;
  counter: RequestCounter;
  platform: string;
}

// mounted at /admin
export const createAdminRoutes = (deps: AdminRouteDeps) => {
  const router = Router();
  const { getMetrics, reset } = createAdminController(deps);

  router.get("/metrics", getMetrics);
  router.post("/reset", asyncHandler(reset));

  return router;
};
