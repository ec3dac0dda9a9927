/**
 * Check Job Service
 *
 * Runs status check batches in the background for the HTTP API.
 * One batch at a time (the browser session is exclusive).
 */

import { Mutex } from "async-mutex";
import { v4 as uuidv4 } from "uuid";
import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import type {
  CheckJob,
  CheckSelection,
  ResolvedSelection,
} from "@/core/domain/CheckJob";
import type { ProductRecord } from "@/core/domain/ProductRecord";
import {
  CheckInProgressError,
  CheckJobNotFoundError,
} from "@/core/errors/AppError";
import { StatusCheckService } from "./StatusCheckService";
import { createJobLogger } from "@/utils/LoggerContext";
import { getTimestampWithTimezone } from "@/utils/timestamp";

/** finished jobs kept for polling */
const MAX_FINISHED_JOBS = 100;

interface JobEntry {
  job: CheckJob;
  done: Promise<void>;
}

/**
 * Resolve ids and URLs against the catalog, in input order
 * A record named twice is checked once
 */
export function resolveSelection(
  records: ProductRecord[],
  selection: CheckSelection,
): ResolvedSelection {
  const byId = new Map(records.map((record) => [record.id, record]));
  const byUrl = new Map(records.map((record) => [record.url, record]));
  const picked = new Map<number, ProductRecord>();
  const unresolved: Array<number | string> = [];

  for (const id of selection.ids ?? []) {
    const record = byId.get(id);
    if (record) {
      picked.set(record.id, record);
    } else {
      unresolved.push(id);
    }
  }

  for (const url of selection.urls ?? []) {
    const record = byUrl.get(url.trim());
    if (record) {
      picked.set(record.id, record);
    } else {
      unresolved.push(url);
    }
  }

  return { records: Array.from(picked.values()), unresolved };
}

export class CheckJobService {
  private readonly mutex = new Mutex();
  private readonly jobs = new Map<string, JobEntry>();
  private runningJobId: string | null = null;

  constructor(
    private readonly repository: ICatalogRepository,
    private readonly statusCheckService: StatusCheckService,
  ) {}

  /**
   * @throws {CheckInProgressError} another batch is running
   */
  async start(selection: CheckSelection): Promise<CheckJob> {
    this.assertIdle();

    const { records, unresolved } = resolveSelection(
      await this.repository.listAll(),
      selection,
    );

    // listAll may have yielded to another start()
    this.assertIdle();

    const job: CheckJob = {
      id: uuidv4(),
      status: "running",
      progress: { completed: 0, total: records.length },
      startedAt: getTimestampWithTimezone(),
      unresolved,
    };
    const log = createJobLogger(job.id);

    this.runningJobId = job.id;
    const done = this.mutex
      .runExclusive(() => this.execute(job, records))
      .catch((error: unknown) => {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          "[CheckJob] job runner crashed",
        );
      });

    this.jobs.set(job.id, { job, done });
    this.evictFinishedJobs();

    log.info(
      { total: records.length, unresolved: unresolved.length },
      "[CheckJob] job started",
    );

    return this.snapshot(job);
  }

  /**
   * @throws {CheckJobNotFoundError}
   */
  getJob(jobId: string): CheckJob {
    return this.snapshot(this.getEntry(jobId).job);
  }

  /**
   * Resolves with the settled job
   * @throws {CheckJobNotFoundError}
   */
  async whenFinished(jobId: string): Promise<CheckJob> {
    const entry = this.getEntry(jobId);
    await entry.done;
    return this.snapshot(entry.job);
  }

  isRunning(): boolean {
    return this.mutex.isLocked();
  }

  private async execute(job: CheckJob, records: ProductRecord[]): Promise<void> {
    const log = createJobLogger(job.id);

    try {
      job.result = await this.statusCheckService.runBatch(
        records,
        (progress) => {
          job.progress = progress;
        },
        log,
      );
      job.status = "completed";
    } catch (error) {
      job.status = "failed";
      job.error = error instanceof Error ? error.message : String(error);
      log.error({ error: job.error }, "[CheckJob] job failed");
    } finally {
      job.finishedAt = getTimestampWithTimezone();
      this.runningJobId = null;
    }
  }

  private assertIdle(): void {
    if (this.mutex.isLocked() || this.runningJobId !== null) {
      throw new CheckInProgressError(this.runningJobId ?? "pending");
    }
  }

  private getEntry(jobId: string): JobEntry {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw new CheckJobNotFoundError(jobId);
    }
    return entry;
  }

  private evictFinishedJobs(): void {
    const finished = Array.from(this.jobs.values()).filter(
      (entry) => entry.job.status !== "running",
    );
    const excess = finished.length - MAX_FINISHED_JOBS;
    for (let i = 0; i < excess; i++) {
      this.jobs.delete(finished[i].job.id);
    }
  }

  private snapshot(job: CheckJob): CheckJob {
    return {
      ...job,
      progress: { ...job.progress },
      unresolved: [...job.unresolved],
    };
  }
}
