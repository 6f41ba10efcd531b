import { Router, type RequestHandler } from "express";
import type { ChirpModel } from "../models/types";
import { createChirpController } from "../controllers/chirp.controller";
import { asyncHandler } from "../utils/asyncHandler";

export interface ChirpRouteDeps {
  chirps: ChirpModel;
  requireAuth: RequestHandler;
}

// mounted at /api/chirps
export const createChirpRoutes = ({ chirps, requireAuth }: ChirpRouteDeps) => {
  const router = Router();
  const { createChirp, listChirps, getChirp, deleteChirp } = createChirpController({ chirps });

  /**
   * GET /api/chirps
   * Query params: author_id (uuid), sort (asc | desc, default asc)
   */
  router.get("/", asyncHandler(listChirps));
  router.get("/:chirpID", asyncHandler(getChirp));

  router.post("/", requireAuth, asyncHandler(createChirp));

  /**
   * DELETE /api/chirps/:chirpID
   * Access: the chirp's author only
   */
  router.delete("/:chirpID", requireAuth, asyncHandler(deleteChirp));

  return router;
};
