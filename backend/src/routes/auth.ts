import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { parseRequest } from "@/middleware/validateRequest";
import { verifyEmailVerificationToken } from "@/services/auth/jwtService";
import type { Notify } from "@/services/notification/notification.service";
import type { UserDirectory } from "@/services/user/userService";
import { InvalidTokenError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface AuthRouteOptions {
  users: UserDirectory;
  notify: Notify;
}

const verifyEmailQuerySchema = z.object({
  token: z.string({ required_error: "Verification token is required" }).min(1, "Verification token is required"),
});

export async function registerAuthRoutes(app: FastifyInstance, { users, notify }: AuthRouteOptions) {
  app.get("/verify-email", async (request) => {
    const { token } = parseRequest(verifyEmailQuerySchema, request.query, "query");
    const userId = verifyEmailVerificationToken(token);

    const contact = await users.getUserContact(userId);
    if (!contact) {
      throw new InvalidTokenError("Verification link is invalid");
    }

    if (contact.isVerified) {
      return { message: "Email has already been verified" };
    }

    const updated = await users.markEmailVerified(userId);
    if (updated) {
      try {
        await notify(userId, "email_verified", contact.email ? { email: contact.email } : {});
      } catch (error) {
        logger.error("Failed to enqueue email verified notification", { userId, error });
      }
    }

    return { message: "Email successfully verified" };
  });
}
