import type { Request, Response } from "express";
import { z } from "zod";
import type { ChirpModel } from "../models/types";
import { currentUserId } from "../middlewares/auth.middleware";
import { ForbiddenError, NotFoundError } from "../utils/errors";
import { cleanProfanity } from "../utils/profanity";
import { toChirpResponse } from "../utils/serialize";
import { parseWith } from "../utils/validation";

export const MAX_CHIRP_LENGTH = 140;

const createChirpSchema = z.object({
  body: z
    .string({ required_error: "Chirp body is required", invalid_type_error: "Chirp body must be a string" })
    .max(MAX_CHIRP_LENGTH, "Chirp is too long"),
});

const listQuerySchema = z.object({
  author_id: z.string().uuid("Invalid author_id").optional(),
  sort: z
    .enum(["asc", "desc"], { errorMap: () => ({ message: "Invalid sort parameter" }) })
    .default("asc"),
});

const chirpIdSchema = z.string().uuid("Invalid chirp ID");

const parseChirpId = (req: Request) =>
  parseWith(chirpIdSchema, req.params.chirpID);

export interface ChirpControllerDeps {
  chirps: ChirpModel;
}

export const createChirpController = ({ chirps }: ChirpControllerDeps) => ({
  /* ================================
     CREATE CHIRP
  ================================ */
  createChirp: async (req: Request, res: Response) => {
    const userId = currentUserId(req);
    const { body } = parseWith(createChirpSchema, req.body ?? {});

    const chirp = await chirps.create({ body: cleanProfanity(body), userId });

    res.status(201).json(toChirpResponse(chirp));
  },

  /* ================================
     LIST CHIRPS
  ================================ */
  // GET /api/chirps?author_id=<uuid>&sort=asc|desc
  listChirps: async (req: Request, res: Response) => {
    const { author_id: authorId, sort } = parseWith(listQuerySchema, req.query);

    const rows = await chirps.list({ authorId, sort });

    res.json(rows.map(toChirpResponse));
  },

  getChirp: async (req: Request, res: Response) => {
    const chirp = await chirps.findById(parseChirpId(req));
    if (!chirp) {
      throw new NotFoundError("Chirp not found");
    }

    res.json(toChirpResponse(chirp));
  },

  /* ================================
     DELETE CHIRP (author only)
  ================================ */
  deleteChirp: async (req: Request, res: Response) => {
    const userId = currentUserId(req);
    const chirpId = parseChirpId(req);

    const chirp = await chirps.findById(chirpId);
    if (!chirp) {
      throw new NotFoundError("Chirp not found");
    }
    if (chirp.userId !== userId) {
      throw new ForbiddenError("You are not allowed to delete this chirp");
    }

    // the ownership condition is repeated in the DELETE itself
    if (!(await chirps.deleteOwned(chirpId, userId))) {
      throw new NotFoundError("Chirp not found");
    }

    res.status(204).end();
  },
});
