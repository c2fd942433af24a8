export type UserRole = "user" | "service" | "admin";

export interface AuthenticatedUser {
  id: string;
  email?: string;
  role: UserRole;
}

/** Identity record owned by the account service; only the fields this service reads. */
export interface UserContact {
  id: string;
  email: string | null;
  isVerified: boolean;
}

export interface JwtPayload {
  sub: string;
  email?: string;
  role?: UserRole;
  purpose?: string;
  exp?: number;
  iat?: number;
}
