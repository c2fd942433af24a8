import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";

import { formatError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  const formatted = formatError(error, request.id);
  const { statusCode, code } = formatted.error;
  const context = { requestId: request.id, method: request.method, url: request.url, code };

  if (statusCode >= 500) {
    logger.error("Unhandled server error", { ...context, error });
  } else {
    logger.warn("Request failed", { ...context, error: formatted.error });
  }

  if (!reply.sent) {
    void reply.status(statusCode).send(formatted);
  }
}
