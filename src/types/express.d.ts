/**
 * Express Request augmentation
 *
 * - id: request id (UUID)
 * - log: per-request logger
 */

import { Logger } from "pino";

declare global {
  namespace Express {
    interface Request {
      /**
       * Request ID (UUID v4), set by requestLogger
       */
      id?: string;

      /**
       * Logger carrying request_id, method and path
       */
      log?: Logger;
    }
  }
}
