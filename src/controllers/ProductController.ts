/// <reference types="multer" />
/**
 * Product controller
 * Catalog CRUD, spreadsheet template / import / report
 *
 * SOLID:
 * - SRP: HTTP ↔ service translation only
 * - DIP: services are injected
 */

import { Request, Response, NextFunction } from "express";
import { CatalogService } from "@/services/CatalogService";
import { SpreadsheetService } from "@/services/SpreadsheetService";
import { ValidationError } from "@/core/errors/AppError";
import {
  DeleteProductsBodySchema,
  IdParamSchema,
  ProductBodySchema,
  ProductListQuerySchema,
  parseRequest,
} from "@/middleware/validation";
import { formatDate } from "@/utils/timestamp";

const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

function sendWorkbook(res: Response, filename: string, workbook: Buffer): void {
  res.setHeader("Content-Type", XLSX_MIME_TYPE);
  res.setHeader("Content-Disposition", `attachment; filename="${filename}"`);
  res.status(200).send(workbook);
}

export class ProductController {
  constructor(
    private readonly catalogService: CatalogService,
    private readonly spreadsheetService: SpreadsheetService,
  ) {}

  /**
   * GET /api/v1/products
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter = parseRequest(ProductListQuerySchema, req.query);
      const products = await this.catalogService.listProducts(filter);

      res.status(200).json({
        success: true,
        count: products.length,
        data: products,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/products
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const attributes = parseRequest(ProductBodySchema, req.body);
      const product = await this.catalogService.addUniqueProduct(attributes);

      res.status(201).json({ success: true, data: product });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/products/:id
   */
  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = parseRequest(IdParamSchema, req.params);
      const attributes = parseRequest(ProductBodySchema, req.body);
      const product = await this.catalogService.updateProduct(id, attributes);

      res.status(200).json({ success: true, data: product });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/products/:id
   */
  async remove(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = parseRequest(IdParamSchema, req.params);
      const deleted = await this.catalogService.deleteProducts([id]);

      res.status(200).json({ success: true, deleted });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/products/delete
   */
  async removeMany(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { ids } = parseRequest(DeleteProductsBodySchema, req.body);
      const deleted = await this.catalogService.deleteProducts(ids);

      res.status(200).json({ success: true, deleted });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/products/template
   */
  template(_req: Request, res: Response, next: NextFunction): void {
    try {
      sendWorkbook(res, "product_template.xlsx", this.spreadsheetService.buildTemplate());
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/products/import (multipart field "file")
   */
  async importProducts(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.file) {
        throw new ValidationError("Validation failed", ["file is required"]);
      }

      const rows = this.spreadsheetService.parseUpload(req.file.buffer);
      const result = await this.catalogService.bulkImport(rows);

      res.status(200).json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/products/report (same filters as the list)
   */
  async report(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter = parseRequest(ProductListQuerySchema, req.query);
      const products = await this.catalogService.listProducts(filter);

      sendWorkbook(
        res,
        `status_report_${formatDate()}.xlsx`,
        this.spreadsheetService.buildReport(products),
      );
    } catch (error) {
      next(error);
    }
  }
}
