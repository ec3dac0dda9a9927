/**
 * Status check controller
 */

import { Request, Response, NextFunction } from "express";
import { CheckJobService } from "@/services/CheckJobService";
import {
  CheckRequestBodySchema,
  CheckRequestQuerySchema,
  JobIdParamSchema,
  parseRequest,
} from "@/middleware/validation";

export class StatusCheckController {
  constructor(private readonly checkJobService: CheckJobService) {}

  /**
   * POST /api/v1/checks
   * 202 with the running job; ?wait=true answers 200 once it settles
   */
  async start(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const selection = parseRequest(CheckRequestBodySchema, req.body);
      const { wait } = parseRequest(CheckRequestQuerySchema, req.query);

      const job = await this.checkJobService.start(selection);

      if (wait) {
        const settled = await this.checkJobService.whenFinished(job.id);
        res.status(200).json({ success: true, data: settled });
        return;
      }

      res.status(202).json({ success: true, data: job });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/checks/:jobId
   */
  getJob(req: Request, res: Response, next: NextFunction): void {
    try {
      const { jobId } = parseRequest(JobIdParamSchema, req.params);
      res.status(200).json({ success: true, data: this.checkJobService.getJob(jobId) });
    } catch (error) {
      next(error);
    }
  }
}
