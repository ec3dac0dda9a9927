/**
 * Summary router
 * /api/v1/summary/*
 */

import { Router, Request, Response, NextFunction } from "express";
import { SummaryController } from "@/controllers/SummaryController";

export function createSummaryRouter(controller: SummaryController): Router {
  const router = Router();

  router.get("/customers", (req: Request, res: Response, next: NextFunction) =>
    controller.customers(req, res, next),
  );

  router.get("/", (req: Request, res: Response, next: NextFunction) =>
    controller.summary(req, res, next),
  );

  return router;
}
