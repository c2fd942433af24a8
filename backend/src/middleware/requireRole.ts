import type { FastifyReply, FastifyRequest } from "fastify";

import type { UserRole } from "@/types/user";
import { ForbiddenError } from "@/utils/errors";

/** Runs after `verifyJWT`. */
export function requireRole(...roles: UserRole[]) {
  return async (request: FastifyRequest, _reply: FastifyReply) => {
    if (!roles.includes(request.user.role)) {
      throw new ForbiddenError("Insufficient role", { required: roles });
    }
  };
}
