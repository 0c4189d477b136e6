import type { Request, Response, NextFunction, RequestHandler } from "express";
import jwt, { type JwtPayload } from "jsonwebtoken";

export interface ApiUser extends JwtPayload {
  sub: string;
  email?: string;
  role?: string;
}

export interface AuthRequest extends Request {
  user?: ApiUser;
}

function isApiUser(decoded: string | JwtPayload): decoded is ApiUser {
  return typeof decoded !== "string" && typeof decoded.sub === "string" && decoded.sub !== "";
}

/**
 * Bearer-token guard for /api. With an empty secret the API stays open
 * (single-user local deployments).
 */
export const requireAuth = (secret: string): RequestHandler => {
  if (!secret) {
    return (_req, _res, next) => next();
  }

  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return res.status(401).json({ error: "Missing or invalid Authorization header" });
    }

    const token = authHeader.split(" ")[1];

    try {
      const decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });

      if (!isApiUser(decoded)) {
        return res.status(401).json({ error: "Invalid token payload" });
      }

      req.user = decoded;
      next();
    } catch {
      return res.status(401).json({ error: "Invalid or expired token" });
    }
  };
};
