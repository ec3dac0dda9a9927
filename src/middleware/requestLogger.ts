/// <reference path="../types/express.d.ts" />
/**
 * Request Logger middleware
 *
 * - request id (UUID) per request, echoed as X-Request-Id
 * - request / response logging with duration
 * - health checks stay out of the log files (console only)
 */

import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";

const SKIP_FILE_LOG_PATHS = ["/health"];

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const requestId = uuidv4();
  const startTime = Date.now();
  const skipFileLog = SKIP_FILE_LOG_PATHS.includes(req.path);

  const logger = createRequestLogger(requestId, req.method, req.path);
  req.log = logger;
  req.id = requestId;
  res.setHeader("X-Request-Id", requestId);

  logger.info(
    {
      query: req.query,
      ip: req.ip,
      skip_file_log: skipFileLog,
    },
    "request received",
  );

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const logLevel = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";

    logger[logLevel](
      {
        status: res.statusCode,
        duration_ms: duration,
        skip_file_log: skipFileLog,
      },
      "request completed",
    );
  });

  next();
}
