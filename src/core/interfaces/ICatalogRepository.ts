/**
 * Catalog repository interface
 *
 * SOLID:
 * - DIP: services depend on this, not on Supabase
 */

import {
  CatalogAttributes,
  CheckOutcome,
  InsertResult,
  NewProductRecord,
  ProductRecord,
} from "@/core/domain/ProductRecord";

export interface ICatalogRepository {
  /**
   * Add the check result columns if absent (idempotent)
   */
  ensureSchema(): Promise<void>;

  /**
   * All records, ordered by id
   * @throws {MissingIdentityError} rows come back without an id
   */
  listAll(): Promise<ProductRecord[]>;

  findById(id: number): Promise<ProductRecord | null>;

  findByUrl(url: string): Promise<ProductRecord | null>;

  /**
   * Insert a record; a URL already present is reported, not thrown
   */
  insert(record: NewProductRecord): Promise<InsertResult>;

  /**
   * Update catalog attributes and identifier (result columns untouched)
   * @returns updated record, or null if the id is unknown
   */
  update(
    id: number,
    attributes: CatalogAttributes & { asin: string },
  ): Promise<ProductRecord | null>;

  /**
   * @returns whether a record was removed
   */
  delete(id: number): Promise<boolean>;

  /**
   * Write all six result columns in one statement
   */
  persistCheckResult(
    id: number,
    outcome: CheckOutcome,
    lastChecked: string,
  ): Promise<void>;
}
