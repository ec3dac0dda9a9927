/**
 * Products router
 * /api/v1/products/* - catalog CRUD and spreadsheets
 */

import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { ProductController } from "@/controllers/ProductController";
import { SERVER_CONFIG } from "@/config/constants";

export function createProductsRouter(controller: ProductController): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: SERVER_CONFIG.MAX_UPLOAD_BYTES, files: 1 },
  });

  /**
   * GET /api/v1/products/template
   * Empty import workbook
   */
  router.get("/template", (req: Request, res: Response, next: NextFunction) =>
    controller.template(req, res, next),
  );

  /**
   * GET /api/v1/products/report
   * Filtered list as a workbook
   */
  router.get("/report", (req: Request, res: Response, next: NextFunction) =>
    controller.report(req, res, next),
  );

  /**
   * POST /api/v1/products/import
   */
  router.post(
    "/import",
    upload.single("file"),
    (req: Request, res: Response, next: NextFunction) =>
      controller.importProducts(req, res, next),
  );

  /**
   * POST /api/v1/products/delete
   * Bulk delete { ids }
   */
  router.post("/delete", (req: Request, res: Response, next: NextFunction) =>
    controller.removeMany(req, res, next),
  );

  router.get("/", (req: Request, res: Response, next: NextFunction) =>
    controller.list(req, res, next),
  );

  router.post("/", (req: Request, res: Response, next: NextFunction) =>
    controller.create(req, res, next),
  );

  router.put("/:id", (req: Request, res: Response, next: NextFunction) =>
    controller.update(req, res, next),
  );

  router.delete("/:id", (req: Request, res: Response, next: NextFunction) =>
    controller.remove(req, res, next),
  );

  return router;
}
