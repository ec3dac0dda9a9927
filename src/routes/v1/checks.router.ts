/**
 * Status checks router
 * /api/v1/checks/* - start a batch, poll its job
 */

import { Router, Request, Response, NextFunction } from "express";
import { StatusCheckController } from "@/controllers/StatusCheckController";

export function createChecksRouter(controller: StatusCheckController): Router {
  const router = Router();

  router.post("/", (req: Request, res: Response, next: NextFunction) =>
    controller.start(req, res, next),
  );

  router.get("/:jobId", (req: Request, res: Response, next: NextFunction) =>
    controller.getJob(req, res, next),
  );

  return router;
}
