/**
 * API key middleware
 * X-API-Key header must equal the configured key
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "@/config/logger";

function reject(res: Response, message: string): void {
  res.status(401).json({
    success: false,
    error: {
      code: "UNAUTHORIZED",
      message,
    },
  });
}

export function createAuthMiddleware(expectedKey: string): RequestHandler {
  if (!expectedKey) {
    logger.warn("[Auth] API_KEY is not set, every /api/v1 request will be rejected");
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.header("x-api-key");

    if (!apiKey) {
      logger.warn({ path: req.path, ip: req.ip }, "[Auth] missing API key");
      reject(res, "Missing API key. Provide the X-API-Key header.");
      return;
    }

    if (!expectedKey || apiKey !== expectedKey) {
      logger.warn({ path: req.path, ip: req.ip }, "[Auth] invalid API key");
      reject(res, "Invalid API key.");
      return;
    }

    next();
  };
}
