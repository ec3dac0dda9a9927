/**
 * Catalog Service
 *
 * Product catalog maintenance: add, bulk import, edit, delete, list with filters.
 * The identifier is always derived from the URL.
 *
 * SOLID:
 * - SRP: catalog rules only (storage lives in the repository)
 * - DIP: depends on ICatalogRepository
 */

import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import {
  CatalogAttributes,
  CatalogAttributesInput,
  CatalogAttributesSchema,
  InsertResult,
  ProductFilter,
  ProductRecord,
} from "@/core/domain/ProductRecord";
import {
  DuplicateUrlError,
  ProductNotFoundError,
  ValidationError,
} from "@/core/errors/AppError";
import { ProductIdExtractor } from "@/services/extract/url/ProductIdExtractor";
import { isValidDateString } from "@/utils/timestamp";
import { logger } from "@/config/logger";

export interface BulkImportResult {
  added: number;
  /** duplicate URLs (already stored or repeated in the upload) */
  skipped: number;
  /** rows without a URL */
  invalid: number;
  /** rows the store rejected */
  failed: number;
}

type TextFilterKey = "asin" | "url" | "collectionName" | "size" | "color" | "customer";
type FlagFilterKey = "isRedirect" | "isUnavailable" | "orderable";

const TEXT_FILTER_KEYS: TextFilterKey[] = [
  "asin",
  "url",
  "collectionName",
  "size",
  "color",
  "customer",
];
const FLAG_FILTER_KEYS: FlagFilterKey[] = ["isRedirect", "isUnavailable", "orderable"];

function contains(value: string, needle: string): boolean {
  return value.toLowerCase().includes(needle.toLowerCase());
}

export class CatalogService {
  constructor(private readonly repository: ICatalogRepository) {}

  /**
   * Add one product
   * @returns insert result; a duplicate URL is reported, not thrown
   * @throws {ValidationError} blank URL
   */
  async addProduct(input: CatalogAttributesInput): Promise<InsertResult> {
    const attributes = this.normalize(input);
    await this.repository.ensureSchema();

    const result = await this.repository.insert({
      ...attributes,
      asin: ProductIdExtractor.extract(attributes.url),
    });

    if (result.status === "duplicate") {
      logger.info({ url: attributes.url }, "[Catalog] duplicate URL rejected");
    }
    return result;
  }

  /**
   * Add one product, failing on a duplicate URL (API)
   * @throws {DuplicateUrlError}
   */
  async addUniqueProduct(input: CatalogAttributesInput): Promise<ProductRecord> {
    const result = await this.addProduct(input);
    if (result.status === "duplicate") {
      throw new DuplicateUrlError(this.normalize(input).url);
    }
    return result.record;
  }

  /**
   * Insert rows in order; duplicates, blank URLs and store failures are counted, never fatal
   */
  async bulkImport(rows: CatalogAttributesInput[]): Promise<BulkImportResult> {
    const summary: BulkImportResult = { added: 0, skipped: 0, invalid: 0, failed: 0 };

    for (const row of rows) {
      const attributes = CatalogAttributesSchema.parse(row);
      if (!attributes.url) {
        summary.invalid++;
        continue;
      }

      try {
        const result = await this.addProduct(attributes);
        if (result.status === "inserted") {
          summary.added++;
        } else {
          summary.skipped++;
        }
      } catch (error) {
        summary.failed++;
        logger.error(
          { url: attributes.url, error: error instanceof Error ? error.message : String(error) },
          "[Catalog] import row failed",
        );
      }
    }

    logger.info({ ...summary, rows: rows.length }, "[Catalog] bulk import finished");
    return summary;
  }

  /**
   * Edit the five catalog attributes (result columns untouched)
   * @throws {ValidationError} blank URL
   * @throws {ProductNotFoundError}
   * @throws {DuplicateUrlError} URL belongs to another record
   */
  async updateProduct(id: number, input: CatalogAttributesInput): Promise<ProductRecord> {
    const attributes = this.normalize(input);

    const holder = await this.repository.findByUrl(attributes.url);
    if (holder && holder.id !== id) {
      throw new DuplicateUrlError(attributes.url);
    }

    const updated = await this.repository.update(id, {
      ...attributes,
      asin: ProductIdExtractor.extract(attributes.url),
    });
    if (!updated) {
      throw new ProductNotFoundError(id);
    }

    logger.info({ productId: id, asin: updated.asin }, "[Catalog] product updated");
    return updated;
  }

  /**
   * @returns number of records removed
   */
  async deleteProducts(ids: number[]): Promise<number> {
    let deleted = 0;
    for (const id of new Set(ids)) {
      if (await this.repository.delete(id)) {
        deleted++;
      }
    }

    logger.info({ requested: ids.length, deleted }, "[Catalog] products deleted");
    return deleted;
  }

  /**
   * @throws {ValidationError} notCheckedSince is not YYYY-MM-DD
   */
  async listProducts(filter: ProductFilter = {}): Promise<ProductRecord[]> {
    const cutoff = filter.notCheckedSince?.trim();
    if (cutoff && !isValidDateString(cutoff)) {
      throw new ValidationError("Invalid date", [
        `notCheckedSince must be YYYY-MM-DD, got "${cutoff}"`,
      ]);
    }

    await this.repository.ensureSchema();
    const records = await this.repository.listAll();

    return records.filter((record) => {
      for (const key of TEXT_FILTER_KEYS) {
        const needle = filter[key]?.trim();
        if (needle && !contains(record[key], needle)) {
          return false;
        }
      }

      const priceNeedle = filter.price?.trim();
      if (priceNeedle && !contains(record.checkResult?.price ?? "", priceNeedle)) {
        return false;
      }

      for (const key of FLAG_FILTER_KEYS) {
        const expected = filter[key];
        if (expected !== undefined && record.checkResult?.[key] !== expected) {
          return false;
        }
      }

      // "YYYY-MM-DD HH:mm:ss" < "YYYY-MM-DD" exactly when checked before that day
      if (cutoff && record.checkResult?.lastChecked && record.checkResult.lastChecked >= cutoff) {
        return false;
      }

      return true;
    });
  }

  /**
   * @throws {ValidationError} blank URL
   */
  private normalize(input: CatalogAttributesInput): CatalogAttributes {
    const attributes = CatalogAttributesSchema.parse(input);
    if (!attributes.url) {
      throw new ValidationError("URL is required", ["url is required"]);
    }
    return attributes;
  }
}
