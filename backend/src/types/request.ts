import type { AuthenticatedUser, JwtPayload } from "./user";

export interface RequestContext {
  startTime: bigint;
}

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: JwtPayload;
    user: AuthenticatedUser;
  }
}

declare module "fastify" {
  interface FastifyRequest {
    accessToken?: string;
    requestContext?: RequestContext;
  }
}
