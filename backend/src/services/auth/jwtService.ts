import jwt, { type SignOptions } from "jsonwebtoken";

import { config } from "@/config/config";
import type { JwtPayload, UserRole } from "@/types/user";
import { AuthError, InvalidTokenError } from "@/utils/errors";

export const EMAIL_VERIFICATION_PURPOSE = "email_verification";

const ACCESS_TOKEN_TTL_SECONDS = 60 * 60; // 1 hour
const USER_ROLES: readonly UserRole[] = ["user", "service", "admin"];

interface TokenPayload {
  userId: string;
  email?: string;
  role?: UserRole;
  purpose?: string;
  expiresInSeconds?: number;
}

function buildClaims(payload: TokenPayload) {
  const claims: Record<string, unknown> = {
    sub: payload.userId,
  };

  if (payload.email) {
    claims.email = payload.email;
  }

  if (payload.role) {
    claims.role = payload.role;
  }

  if (payload.purpose) {
    claims.purpose = payload.purpose;
  }

  return claims;
}

function signToken(payload: TokenPayload, expiresInSeconds: number, secret: string) {
  const options: SignOptions = { algorithm: "HS256", expiresIn: payload.expiresInSeconds ?? expiresInSeconds };
  return jwt.sign(buildClaims(payload), secret, options);
}

/** Narrows a decoded token to the claims this service reads. */
export function toJwtPayload(decoded: string | jwt.JwtPayload): JwtPayload | null {
  if (typeof decoded === "string" || typeof decoded.sub !== "string" || decoded.sub.length === 0) {
    return null;
  }

  const role = USER_ROLES.find((candidate) => candidate === decoded.role);

  return {
    sub: decoded.sub,
    email: typeof decoded.email === "string" ? decoded.email : undefined,
    role,
    purpose: typeof decoded.purpose === "string" ? decoded.purpose : undefined,
    exp: decoded.exp,
    iat: decoded.iat,
  };
}

export function generateAccessToken(payload: TokenPayload, secret = config.security.jwtSecret) {
  return signToken(payload, ACCESS_TOKEN_TTL_SECONDS, secret);
}

export function verifyAccessToken(token: string, secret = config.security.jwtSecret): JwtPayload {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch (error) {
    throw new AuthError("Authentication token is invalid", { cause: error });
  }

  const payload = toJwtPayload(decoded);
  if (!payload) {
    throw new AuthError("Authentication token is missing subject");
  }

  if (payload.purpose) {
    throw new AuthError("Token cannot be used for authentication");
  }

  return payload;
}

export function generateEmailVerificationToken(userId: string, secret = config.security.jwtSecret) {
  return signToken({ userId, purpose: EMAIL_VERIFICATION_PURPOSE }, config.verification.tokenTtlSeconds, secret);
}

/** Resolves to the user id carried by a valid, unexpired verification token. */
export function verifyEmailVerificationToken(token: string, secret = config.security.jwtSecret): string {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch (error) {
    const expired = error instanceof jwt.TokenExpiredError;
    throw new InvalidTokenError(expired ? "Verification link has expired" : "Verification link is invalid");
  }

  const payload = toJwtPayload(decoded);
  if (!payload || payload.purpose !== EMAIL_VERIFICATION_PURPOSE) {
    throw new InvalidTokenError("Verification link is invalid");
  }

  return payload.sub;
}

export function buildVerificationUrl(userId: string) {
  const url = new URL("/api/v1/auth/verify-email", config.verification.baseUrl);
  url.searchParams.set("token", generateEmailVerificationToken(userId));
  return url.toString();
}

