/**
 * Status check job domain model
 */

import { CheckOutcome, ProductRecord } from "./ProductRecord";

/**
 * Records to check, by id and/or URL
 */
export interface CheckSelection {
  ids?: number[];
  urls?: string[];
}

export interface CheckProgress {
  completed: number;
  total: number;
}

export type ProgressListener = (progress: CheckProgress) => void;

/**
 * Per-row result of a batch
 * error: set when the row degraded or could not be persisted
 */
export interface RowCheckResult {
  productId: number;
  url: string;
  asin: string;
  outcome: CheckOutcome;
  lastChecked: string;
  /** first unavailability phrase found on the page (diagnostic) */
  unavailableSignal: string | null;
  /** navigation timed out; outcome built from an empty page */
  timedOut: boolean;
  persisted: boolean;
  error?: string;
}

export interface BatchResult {
  total: number;
  rows: RowCheckResult[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export type CheckJobStatus = "running" | "completed" | "failed";

/**
 * Job snapshot returned to API clients
 */
export interface CheckJob {
  id: string;
  status: CheckJobStatus;
  progress: CheckProgress;
  startedAt: string;
  finishedAt?: string;
  /** selection entries that matched no record */
  unresolved: Array<number | string>;
  result?: BatchResult;
  error?: string;
}

export interface ResolvedSelection {
  records: ProductRecord[];
  unresolved: Array<number | string>;
}
