import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createClerkClient } from "@clerk/clerk-sdk-node";
import { UnauthorizedError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";

// Extend Express Request to include user info
declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

/** Resolves a bearer token to a user id, or null when the token is not valid. */
export interface AuthVerifier {
  verify(token: string): Promise<string | null>;
}

export function createClerkVerifier(secretKey: string): AuthVerifier {
  const clerk = createClerkClient({ secretKey });
  return {
    async verify(token) {
      const payload = await clerk.verifyToken(token);
      return payload && payload.sub ? payload.sub : null;
    },
  };
}

/**
 * Middleware that requires authentication.
 * Returns 401 if no valid token is provided, otherwise sets req.userId.
 */
export function requireAuth(verifier: AuthVerifier): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      res.status(401).json({ error: "Authentication required", code: "UNAUTHORIZED" });
      return;
    }

    const token = authHeader.substring(7);
    if (!token || token === "undefined" || token === "null") {
      res.status(401).json({ error: "Invalid authentication token", code: "UNAUTHORIZED" });
      return;
    }

    let userId: string | null;
    try {
      userId = await verifier.verify(token);
    } catch (err: unknown) {
      logger.warn({ err: errorMessage(err) }, "Token verification failed");
      userId = null;
    }

    if (!userId) {
      res.status(401).json({ error: "Invalid authentication token", code: "UNAUTHORIZED" });
      return;
    }

    req.userId = userId;
    logger.debug({ userId }, "User authenticated");
    next();
  };
}

export function currentUserId(req: Request): string {
  if (!req.userId) throw new UnauthorizedError();
  return req.userId;
}
