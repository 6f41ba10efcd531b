import { z } from "zod";
import { BadRequestError } from "./errors";

export const parseWith = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestError(parsed.error.issues[0]?.message ?? "Invalid request");
  }
  return parsed.data;
};
