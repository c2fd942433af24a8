import type { FastifyReply, FastifyRequest } from "fastify";

import type { AuthenticatedUser, JwtPayload } from "@/types/user";
import { AuthError } from "@/utils/errors";

const BEARER_PREFIX = "Bearer ";

export async function verifyJWT(request: FastifyRequest, _reply: FastifyReply) {
  const authorization = request.headers.authorization;

  if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
    throw new AuthError("Authorization header is missing");
  }

  const token = authorization.slice(BEARER_PREFIX.length).trim();
  if (!token) {
    throw new AuthError("Authentication token is missing");
  }

  let payload: JwtPayload;
  try {
    payload = await request.jwtVerify<JwtPayload>();
  } catch (error) {
    throw new AuthError("Authentication token is invalid", { cause: error });
  }

  if (!payload.sub) {
    throw new AuthError("Authentication token is missing subject");
  }

  // Single-purpose tokens (email verification links) never authenticate a request.
  if (payload.purpose) {
    throw new AuthError("Authentication token is invalid");
  }

  const authenticatedUser: AuthenticatedUser = {
    id: payload.sub,
    email: payload.email,
    role: payload.role ?? "user",
  };

  request.user = authenticatedUser;
  request.accessToken = token;
}
