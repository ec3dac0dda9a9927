/// <reference path="./types/express.d.ts" />
/**
 * Express application factory
 *
 * Wires repository, browser and classifier into services, controllers and routes.
 * server.ts supplies the production pieces; tests supply in-process stand-ins.
 */

import express, { Express } from "express";
import cors from "cors";
import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import type { IBrowserSessionFactory } from "@/core/interfaces/IBrowserSession";
import type { IPageClassifier } from "@/extractors/base";
import { CatalogService } from "@/services/CatalogService";
import { SpreadsheetService } from "@/services/SpreadsheetService";
import { SummaryService } from "@/services/SummaryService";
import { CheckJobService } from "@/services/CheckJobService";
import {
  StatusCheckOptions,
  StatusCheckService,
} from "@/services/StatusCheckService";
import { ProductController } from "@/controllers/ProductController";
import { StatusCheckController } from "@/controllers/StatusCheckController";
import { SummaryController } from "@/controllers/SummaryController";
import { createV1Router } from "@/routes/v1";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { APP_METADATA } from "@/config/constants";

export interface AppDependencies {
  repository: ICatalogRepository;
  sessionFactory: IBrowserSessionFactory;
  classifier: IPageClassifier;
  apiKey: string;
  checkOptions?: Partial<StatusCheckOptions>;
  now?: () => Date;
}

export interface AppContext {
  app: Express;
  checkJobService: CheckJobService;
}

export function createApp(deps: AppDependencies): AppContext {
  const statusCheckService = new StatusCheckService({
    repository: deps.repository,
    sessionFactory: deps.sessionFactory,
    classifier: deps.classifier,
    options: deps.checkOptions,
    now: deps.now,
  });
  const checkJobService = new CheckJobService(deps.repository, statusCheckService);

  const controllers = {
    products: new ProductController(
      new CatalogService(deps.repository),
      new SpreadsheetService(),
    ),
    checks: new StatusCheckController(checkJobService),
    summary: new SummaryController(new SummaryService(deps.repository)),
  };

  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      message: `${APP_METADATA.NAME} is running`,
      version: APP_METADATA.VERSION,
      checkRunning: checkJobService.isRunning(),
    });
  });

  app.use("/api/v1", createV1Router(controllers, deps.apiKey));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, checkJobService };
}
