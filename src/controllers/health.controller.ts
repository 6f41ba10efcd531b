import type { Request, Response } from "express";

export const healthController = (_req: Request, res: Response) => {
  res.type("text/plain").send("OK");
};
