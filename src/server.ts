/**
 * Listing Status Tracker server
 */

import "dotenv/config";
import { createApp } from "@/app";
import { SupabaseCatalogRepository } from "@/repositories/SupabaseCatalogRepository";
import { PlaywrightSessionFactory } from "@/scanners/base/PlaywrightSessionFactory";
import { ExtractorRegistry } from "@/extractors/ExtractorRegistry";
import { CHECK_CONFIG, SERVER_CONFIG, SERVICE_NAMES, APP_METADATA } from "@/config/constants";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

const { app, checkJobService } = createApp({
  repository: new SupabaseCatalogRepository(),
  sessionFactory: new PlaywrightSessionFactory(),
  classifier: ExtractorRegistry.getInstance().get(CHECK_CONFIG.DEFAULT_MARKETPLACE),
  apiKey: SERVER_CONFIG.API_KEY,
});

const PORT = SERVER_CONFIG.PORT;
const BASE_URL = process.env.BASE_URL || `http://localhost:${PORT}`;

const server = app.listen(PORT, () => {
  logImportant(logger, `${APP_METADATA.NAME} server started`, {
    port: PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
    marketplace: CHECK_CONFIG.DEFAULT_MARKETPLACE,
  });

  logger.info(
    {
      baseUrl: BASE_URL,
      endpoints: {
        health: `${BASE_URL}/health`,
        products: "GET|POST /api/v1/products",
        checks: "POST /api/v1/checks",
        summary: "GET /api/v1/summary",
      },
    },
    "API v1 endpoints registered",
  );
});

// Graceful shutdown
function shutdown(signal: NodeJS.Signals): void {
  logger.warn(
    { signal, checkRunning: checkJobService.isRunning() },
    `${signal} received, shutting down`,
  );

  server.close(() => {
    logImportant(logger, "server stopped", {});
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
