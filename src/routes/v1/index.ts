/**
 * API v1 router
 *
 * SOLID:
 * - SRP: router assembly only
 * - DIP: controllers are injected
 */

import { Router } from "express";
import { ProductController } from "@/controllers/ProductController";
import { StatusCheckController } from "@/controllers/StatusCheckController";
import { SummaryController } from "@/controllers/SummaryController";
import { createAuthMiddleware } from "@/middleware/auth";
import { createProductsRouter } from "./products.router";
import { createChecksRouter } from "./checks.router";
import { createSummaryRouter } from "./summary.router";

export interface V1Controllers {
  products: ProductController;
  checks: StatusCheckController;
  summary: SummaryController;
}

export function createV1Router(controllers: V1Controllers, apiKey: string): Router {
  const router = Router();

  router.use(createAuthMiddleware(apiKey));

  router.use("/products", createProductsRouter(controllers.products));
  router.use("/checks", createChecksRouter(controllers.checks));
  router.use("/summary", createSummaryRouter(controllers.summary));

  return router;
}
