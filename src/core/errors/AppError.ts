/**
 * Application errors
 *
 * Each error carries its HTTP status and a stable code;
 * errorHandler serializes them as { success: false, error: { code, message, details } }
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = "INTERNAL_ERROR",
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 400, "VALIDATION_FAILED", details);
  }
}

export class ProductNotFoundError extends AppError {
  constructor(id: number) {
    super(`Product not found: ${id}`, 404, "PRODUCT_NOT_FOUND", { id });
  }
}

export class DuplicateUrlError extends AppError {
  constructor(url: string) {
    super("This URL already exists.", 409, "DUPLICATE_URL", { url });
  }
}

export class CheckInProgressError extends AppError {
  constructor(runningJobId: string) {
    super("A status check is already running", 409, "CHECK_IN_PROGRESS", {
      jobId: runningJobId,
    });
  }
}

export class CheckJobNotFoundError extends AppError {
  constructor(jobId: string) {
    super(`Check job not found: ${jobId}`, 404, "JOB_NOT_FOUND", { jobId });
  }
}

/**
 * Catalog rows without an id cannot be written back
 */
export class MissingIdentityError extends AppError {
  constructor(table: string) {
    super(
      `Table "${table}" returned rows without an "id" column`,
      500,
      "MISSING_IDENTITY",
    );
  }
}

export class CatalogStoreError extends AppError {
  constructor(operation: string, cause: string) {
    super(`Catalog store ${operation} failed: ${cause}`, 502, "CATALOG_STORE_ERROR", {
      operation,
    });
  }
}

/**
 * Navigation exceeded its timeout (browser session)
 */
export class NavigationTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Navigation to ${url} timed out after ${timeoutMs}ms`);
    this.name = "NavigationTimeoutError";
  }
}
