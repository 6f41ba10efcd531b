import type { NextFunction, Request, Response } from "express";
import type { RequestCounter } from "../utils/metrics";
import { BadRequestError } from "../utils/errors";

// For endpoints whose only input is the Authorization header
export const rejectBody = (req: Request, _res: Response, next: NextFunction) => {
  const length = Number(req.headers["content-length"] ?? 0);
  if (length > 0 || req.headers["transfer-encoding"] !== undefined) {
    return next(new BadRequestError("Request body not allowed"));
  }
  next();
};

export const countRequests =
  (counter: RequestCounter) =>
  (_req: Request, _res: Response, next: NextFunction) => {
    counter.increment();
    next();
  };
