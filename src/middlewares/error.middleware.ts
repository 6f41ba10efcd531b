import type { NextFunction, Request, Response } from "express";
import { HttpError } from "../utils/errors";
import { logger } from "../utils/logger";

const INTERNAL_MESSAGE = "Something went wrong";

// body-parser tags its failures with `type` and `status`
const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError &&
  "type" in err &&
  err.type === "entity.parse.failed";

export const notFoundHandler = (_req: Request, res: Response) => {
  res.status(404).json({ error: "Route not found" });
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by arity
  _next: NextFunction
) => {
  if (err instanceof HttpError && err.status < 500) {
    res.status(err.status).json({ error: err.message });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: "Invalid JSON body" });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  res.status(500).json({ error: INTERNAL_MESSAGE });
};
