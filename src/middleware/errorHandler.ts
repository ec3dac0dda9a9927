/// <reference path="../types/express.d.ts" />
/**
 * Error handler middleware
 *
 * SOLID:
 * - SRP: error → HTTP response only
 */

import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { MulterError } from "multer";
import { AppError } from "@/core/errors/AppError";
import { logger } from "@/config/logger";

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

function send(res: Response, status: number, error: ErrorBody["error"]): void {
  const body: ErrorBody = { success: false, error };
  res.status(status).json(body);
}

/**
 * Global error handler (Express needs the 4-argument signature)
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const log = req.log ?? logger;

  if (err instanceof AppError) {
    const level = err.statusCode >= 500 ? "error" : "warn";
    log[level](
      { code: err.code, status: err.statusCode, details: err.details, request_id: req.id },
      `[ErrorHandler] ${err.message}`,
    );
    send(res, err.statusCode, {
      code: err.code,
      message: err.message,
      ...(err.details !== undefined && { details: err.details }),
    });
    return;
  }

  if (err instanceof ZodError) {
    send(res, 400, {
      code: "VALIDATION_FAILED",
      message: "Validation failed",
      details: err.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
    });
    return;
  }

  if (err instanceof MulterError) {
    send(res, 400, {
      code: "UPLOAD_REJECTED",
      message: err.message,
      details: { field: err.field },
    });
    return;
  }

  log.error(
    {
      error: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      request_id: req.id,
      method: req.method,
      path: req.path,
    },
    "[ErrorHandler] unhandled error",
  );

  send(res, 500, {
    code: "INTERNAL_ERROR",
    message: "Internal server error",
    ...(process.env.NODE_ENV === "development" && { details: { stack: err.stack } }),
  });
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  (req.log ?? logger).warn({ request_id: req.id }, "[NotFound] route not found");

  send(res, 404, {
    code: "NOT_FOUND",
    message: `Route not found: ${req.method} ${req.path}`,
  });
}
