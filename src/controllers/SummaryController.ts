/**
 * Summary controller
 */

import { Request, Response, NextFunction } from "express";
import { SummaryService } from "@/services/SummaryService";
import { SummaryQuerySchema, parseRequest } from "@/middleware/validation";

export class SummaryController {
  constructor(private readonly summaryService: SummaryService) {}

  /**
   * GET /api/v1/summary?customer=
   */
  async summary(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customer } = parseRequest(SummaryQuerySchema, req.query);
      const rows = await this.summaryService.summarize({ customer });

      res.status(200).json({ success: true, count: rows.length, data: rows });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/summary/customers
   */
  async customers(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const customers = await this.summaryService.listCustomers();
      res.status(200).json({ success: true, data: customers });
    } catch (error) {
      next(error);
    }
  }
}
