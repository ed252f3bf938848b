import { createHash, timingSafeEqual } from "crypto";
import { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

const BEARER = /^Bearer (.+)$/;

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * Bearer-token guard for the protected routes. With no key configured every
 * protected request fails with 500 rather than passing through.
 */
export function createAuthMiddleware(expectedToken: string | undefined): RequestHandler {
  const expected = expectedToken ? digest(expectedToken) : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected) {
      logger.error(`Rejecting ${req.method} ${req.path}: SERVER_API_KEY not configured`);
      res.status(500).json({ error: "Server configuration error" });
      return;
    }

    const match = BEARER.exec(req.headers.authorization ?? "");
    if (!match) {
      logger.warn(`Unauthenticated ${req.method} ${req.path}`);
      res
        .status(401)
        .json({ error: "Unauthorized: missing or invalid authorization header" });
      return;
    }

    // digests are equal-length, as timingSafeEqual requires
    if (!timingSafeEqual(digest(match[1]), expected)) {
      logger.warn(`Invalid API key on ${req.method} ${req.path}`);
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
