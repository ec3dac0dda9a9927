/**
 * Logger context utilities
 *
 * Child loggers carrying service, job and request ids
 */

import { logger, Logger } from "@/config/logger";

/**
 * Logger bound to a service name (routes to logs/<date>/<service>.log)
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service_name: serviceName });
}

/**
 * Status check job logger
 * @param jobId - check job id (UUID)
 */
export function createJobLogger(jobId: string): Logger {
  return logger.child({ service_name: "checker", job_id: jobId });
}

/**
 * Request logger
 * @param requestId - request id (UUID)
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * Important info (highlighted on the pretty console)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
