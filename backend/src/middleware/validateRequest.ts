import { ZodError, type ZodTypeAny, type z } from "zod";

import { ValidationError } from "@/utils/errors";

export type RequestPart = "body" | "query" | "params";

/** Parses one part of a request, turning schema failures into a 422. */
export function parseRequest<S extends ZodTypeAny>(schema: S, value: unknown, part: RequestPart): z.infer<S> {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(`Invalid request ${part}`, error.flatten());
    }

    throw error;
  }
}
