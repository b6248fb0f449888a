import jwt, { type JwtPayload } from "jsonwebtoken";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { StaffRole, type StaffRoleType } from "@shared/schema";

declare global {
  namespace Express {
    interface User {
      id: number;
      orgId: number;
      role: StaffRoleType | "client";
    }

    interface Request {
      user?: User;
    }
  }
}

const TOKEN_EXPIRY = "24h";

// Claims the login service puts in its HS256 access tokens
const accessTokenClaimsSchema = z.object({
  sub: z.string().optional(),
  user_id: z.number().int().positive(),
  org_id: z.number().int().positive(),
  role: z.enum([StaffRole.ADMIN, StaffRole.EMPLOYEE, StaffRole.MASTER_ADMIN, "client"]),
});

export type AccessTokenClaims = z.infer<typeof accessTokenClaimsSchema>;

export type AccessTokenResult =
  | { valid: true; user: Express.User }
  | { valid: false; error: "expired" | "invalid_token" | "invalid_claims" };

/**
 * Signs an access token the way the login service does. Used by tests and local tooling.
 */
export function generateAccessToken(
  user: Express.User & { email?: string },
  secret: string,
  now = Date.now(),
): string {
  const claims: AccessTokenClaims & { iat: number } = {
    ...(user.email ? { sub: user.email } : {}),
    user_id: user.id,
    org_id: user.orgId,
    role: user.role,
    iat: Math.floor(now / 1000),
  };
  return jwt.sign(claims, secret, { algorithm: "HS256", expiresIn: TOKEN_EXPIRY });
}

export function verifyAccessToken(token: string, secret: string, now = Date.now()): AccessTokenResult {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, {
      algorithms: ["HS256"],
      clockTimestamp: Math.floor(now / 1000),
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return { valid: false, error: "expired" };
    }
    if (error instanceof jwt.JsonWebTokenError) {
      return { valid: false, error: "invalid_token" };
    }
    throw error;
  }

  const parsed = accessTokenClaimsSchema.safeParse(decoded);
  if (!parsed.success) {
    return { valid: false, error: "invalid_claims" };
  }

  return {
    valid: true,
    user: { id: parsed.data.user_id, orgId: parsed.data.org_id, role: parsed.data.role },
  };
}

/**
 * Populates `req.user` from an `Authorization: Bearer` header. Requests without
 * a valid token continue anonymously; the role guards below reject them.
 */
export function authenticate(secret: string | undefined) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (secret && header?.startsWith("Bearer ")) {
      const result = verifyAccessToken(header.slice("Bearer ".length).trim(), secret);
      if (result.valid) {
        req.user = result.user;
      }
    }
    next();
  };
}

const STAFF_ROLES: ReadonlyArray<Express.User["role"]> = [
  StaffRole.ADMIN,
  StaffRole.EMPLOYEE,
  StaffRole.MASTER_ADMIN,
];

export function requireStaff(req: Request, res: Response, next: NextFunction) {
  if (!req.user) {
    return res.status(401).json({ error: "Not authenticated" });
  }
  if (!STAFF_ROLES.includes(req.user.role)) {
    return res.status(403).json({ error: "Staff access required" });
  }
  next();
}

export function requireMasterAdmin(req: Request, res: Response, next: NextFunction) {
  if (!req.user) {
    return res.status(401).json({ error: "Not authenticated" });
  }
  if (req.user.role !== StaffRole.MASTER_ADMIN) {
    return res.status(403).json({ error: "Master admin access required" });
  }
  next();
}

/**
 * The authenticated staff member, for handlers mounted behind `requireStaff`.
 */
export function currentUser(req: Request): Express.User {
  if (!req.user) {
    throw new Error("currentUser called on an unauthenticated request");
  }
  return req.user;
}
