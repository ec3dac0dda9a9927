/**
 * Status Check Service (check runner)
 *
 * start → acquire session → per row: fetch → classify → reconcile → persist
 *       → release session → done
 *
 * SOLID:
 * - SRP: batch orchestration only
 * - DIP: repository, browser and classifier are injected
 *
 * Rows run strictly in input order, one at a time. Each row is persisted as
 * soon as it finishes, so an interrupted batch leaves earlier rows updated.
 */

import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import type {
  IBrowserSession,
  IBrowserSessionFactory,
} from "@/core/interfaces/IBrowserSession";
import type { IPageClassifier } from "@/extractors/base";
import type { CheckOutcome, ProductRecord } from "@/core/domain/ProductRecord";
import type {
  BatchResult,
  ProgressListener,
  RowCheckResult,
} from "@/core/domain/CheckJob";
import { MissingIdentityError } from "@/core/errors/AppError";
import { PageFetcher } from "@/scanners/PageFetcher";
import { ProductIdExtractor } from "@/services/extract/url/ProductIdExtractor";
import { reconcile } from "@/services/ResultReconciler";
import { CHECK_CONFIG, DATABASE_CONFIG, SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import { createServiceLogger } from "@/utils/LoggerContext";
import { formatCheckedAt, getTimestampWithTimezone } from "@/utils/timestamp";

export interface StatusCheckOptions {
  settleDelayMs: number;
  navigationTimeoutMs: number;
  headless: boolean;
}

export interface StatusCheckDependencies {
  repository: ICatalogRepository;
  sessionFactory: IBrowserSessionFactory;
  classifier: IPageClassifier;
  options?: Partial<StatusCheckOptions>;
  /** clock for "last checked" (tests) */
  now?: () => Date;
}

const DEFAULT_OPTIONS: StatusCheckOptions = {
  settleDelayMs: CHECK_CONFIG.SETTLE_DELAY_MS,
  navigationTimeoutMs: CHECK_CONFIG.NAVIGATION_TIMEOUT_MS,
  headless: CHECK_CONFIG.HEADLESS,
};

export class StatusCheckService {
  private readonly repository: ICatalogRepository;
  private readonly sessionFactory: IBrowserSessionFactory;
  private readonly classifier: IPageClassifier;
  private readonly options: StatusCheckOptions;
  private readonly now: () => Date;

  constructor(deps: StatusCheckDependencies) {
    this.repository = deps.repository;
    this.sessionFactory = deps.sessionFactory;
    this.classifier = deps.classifier;
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Check every record in order
   *
   * @throws {MissingIdentityError} a record has no usable id (before any write)
   */
  async runBatch(
    records: ProductRecord[],
    onProgress?: ProgressListener,
    log: Logger = createServiceLogger(SERVICE_NAMES.CHECKER),
  ): Promise<BatchResult> {
    const startTime = Date.now();
    const startedAt = getTimestampWithTimezone(this.now());

    if (records.some((record) => !Number.isInteger(record.id))) {
      throw new MissingIdentityError(DATABASE_CONFIG.CATALOG_TABLE_NAME);
    }

    const total = records.length;
    const rows: RowCheckResult[] = [];

    log.info({ total }, "[StatusCheck] batch started");

    if (total === 0) {
      return this.finish(rows, total, startedAt, startTime, log);
    }

    await this.repository.ensureSchema();

    const fetcher = new PageFetcher(this.options.settleDelayMs, log);
    const session = await this.sessionFactory.newSession({
      headless: this.options.headless,
      navigationTimeoutMs: this.options.navigationTimeoutMs,
    });

    try {
      for (let i = 0; i < total; i++) {
        const record = records[i];
        const row = await this.checkRow(record, session, fetcher, log);
        rows.push(row);

        const logFields = {
          progress: `${i + 1}/${total}`,
          productId: record.id,
          asin: row.asin,
          isRedirect: row.outcome.isRedirect,
          orderable: row.outcome.orderable,
          unavailableSignal: row.unavailableSignal,
        };
        if (row.error || row.timedOut) {
          log.warn({ ...logFields, error: row.error, timedOut: row.timedOut }, "[StatusCheck] row degraded");
        } else {
          log.info(logFields, "[StatusCheck] row checked");
        }

        onProgress?.({ completed: i + 1, total });
      }
    } finally {
      await this.closeSession(session, log);
    }

    return this.finish(rows, total, startedAt, startTime, log);
  }

  private async checkRow(
    record: ProductRecord,
    session: IBrowserSession,
    fetcher: PageFetcher,
    log: Logger,
  ): Promise<RowCheckResult> {
    const originalAsin = ProductIdExtractor.extract(record.url);
    let outcome: CheckOutcome;
    let unavailableSignal: string | null = null;
    let timedOut = false;
    let error: string | undefined;

    try {
      const page = await fetcher.fetch(session, record.url);
      const classification = this.classifier.classify(page.html);
      timedOut = page.timedOut;
      unavailableSignal = classification.unavailableSignal;
      outcome = reconcile({
        originalAsin,
        finalAsin: ProductIdExtractor.extract(page.finalUrl),
        finalUrl: page.finalUrl,
        price: classification.price,
        orderable: classification.orderable,
      });
    } catch (err) {
      // same outcome as an empty page at the original URL
      error = err instanceof Error ? err.message : String(err);
      outcome = reconcile({
        originalAsin,
        finalAsin: originalAsin,
        finalUrl: record.url,
        price: "",
        orderable: false,
      });
    }

    const lastChecked = formatCheckedAt(this.now());
    let persisted = false;

    try {
      await this.repository.persistCheckResult(record.id, outcome, lastChecked);
      persisted = true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ productId: record.id, error: message }, "[StatusCheck] persist failed");
      error = error ? `${error}; ${message}` : message;
    }

    return {
      productId: record.id,
      url: record.url,
      asin: originalAsin,
      outcome,
      lastChecked,
      unavailableSignal,
      timedOut,
      persisted,
      ...(error !== undefined && { error }),
    };
  }

  private async closeSession(session: IBrowserSession, log: Logger): Promise<void> {
    try {
      await session.close();
      log.debug("[StatusCheck] browser session released");
    } catch (err) {
      log.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "[StatusCheck] browser session close failed",
      );
    }
  }

  private finish(
    rows: RowCheckResult[],
    total: number,
    startedAt: string,
    startTime: number,
    log: Logger,
  ): BatchResult {
    const durationMs = Date.now() - startTime;
    const result: BatchResult = {
      total,
      rows,
      startedAt,
      finishedAt: getTimestampWithTimezone(this.now()),
      durationMs,
    };

    log.info(
      {
        total,
        orderable: rows.filter((row) => row.outcome.orderable).length,
        redirected: rows.filter((row) => row.outcome.isRedirect).length,
        degraded: rows.filter((row) => row.error !== undefined || row.timedOut).length,
        durationMs,
      },
      "[StatusCheck] batch finished",
    );

    return result;
  }
}
