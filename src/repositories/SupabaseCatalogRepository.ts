/**
 * Supabase Catalog Repository
 *
 * SOLID:
 * - SRP: catalog_products table access only
 * - DIP: implements ICatalogRepository
 *
 * Design Pattern:
 * - Repository Pattern
 * - Singleton Pattern: shared Supabase client
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import type {
  CatalogAttributes,
  CheckOutcome,
  CheckResult,
  InsertResult,
  NewProductRecord,
  ProductRecord,
} from "@/core/domain/ProductRecord";
import { CatalogStoreError, MissingIdentityError } from "@/core/errors/AppError";
import { DATABASE_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

const nullableText = z.string().nullish();
const catalogText = nullableText.transform((val) => val ?? "");

/**
 * catalog_products row
 * Result columns are null until the first check
 */
export const CatalogRowSchema = z.object({
  id: z.number().int().nullish(),
  asin: catalogText,
  url: catalogText,
  collection_name: catalogText,
  size: catalogText,
  color: catalogText,
  customer: catalogText,
  final_url: nullableText,
  price: nullableText,
  is_redirect: z.boolean().nullish(),
  is_unavailable: z.boolean().nullish(),
  orderable: z.boolean().nullish(),
  last_checked: nullableText,
});

export type CatalogRow = z.infer<typeof CatalogRowSchema>;

interface DbError {
  message: string;
  code?: string;
}

export class SupabaseCatalogRepository implements ICatalogRepository {
  private static instance: SupabaseClient | null = null;
  private readonly client: SupabaseClient;
  private readonly tableName: string;
  private schemaReady: Promise<void> | null = null;

  constructor(client?: SupabaseClient, tableName: string = DATABASE_CONFIG.CATALOG_TABLE_NAME) {
    this.client = client ?? SupabaseCatalogRepository.getSupabaseClient();
    this.tableName = tableName;
  }

  /**
   * Shared client from SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY
   */
  private static getSupabaseClient(): SupabaseClient {
    if (SupabaseCatalogRepository.instance) {
      return SupabaseCatalogRepository.instance;
    }

    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!supabaseUrl || !supabaseKey) {
      throw new Error(
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
      );
    }

    SupabaseCatalogRepository.instance = createClient(supabaseUrl, supabaseKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    logger.info("[Repository] Supabase client initialized");

    return SupabaseCatalogRepository.instance;
  }

  /**
   * Runs the column migration once per process; a failure is retried on the next call
   */
  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.migrateResultColumns().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async migrateResultColumns(): Promise<void> {
    const { error } = await this.client.rpc(DATABASE_CONFIG.ENSURE_RESULT_COLUMNS_RPC);
    if (error) {
      throw this.storeError("ensureSchema", error);
    }
    logger.debug({ table: this.tableName }, "[Repository] result columns ensured");
  }

  async listAll(): Promise<ProductRecord[]> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select("*")
      .order("id", { ascending: true });

    if (error) {
      throw this.storeError("listAll", error);
    }

    const records = (data ?? []).map((row) => this.toRecord(row));
    logger.debug({ count: records.length }, "[Repository] catalog loaded");
    return records;
  }

  async findById(id: number): Promise<ProductRecord | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select("*")
      .eq("id", id)
      .limit(1);

    if (error) {
      throw this.storeError("findById", error);
    }
    return data && data.length > 0 ? this.toRecord(data[0]) : null;
  }

  async findByUrl(url: string): Promise<ProductRecord | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select("*")
      .eq("url", url)
      .limit(1);

    if (error) {
      throw this.storeError("findByUrl", error);
    }
    return data && data.length > 0 ? this.toRecord(data[0]) : null;
  }

  async insert(record: NewProductRecord): Promise<InsertResult> {
    if (await this.findByUrl(record.url)) {
      return { status: "duplicate" };
    }

    const { data, error } = await this.client
      .from(this.tableName)
      .insert(this.toCatalogColumns(record))
      .select("*");

    if (error) {
      // lost a race against a concurrent insert of the same URL
      if (error.code === DATABASE_CONFIG.UNIQUE_VIOLATION_CODE) {
        return { status: "duplicate" };
      }
      throw this.storeError("insert", error);
    }
    if (!data || data.length === 0) {
      throw new CatalogStoreError("insert", "no row returned");
    }

    const inserted = this.toRecord(data[0]);
    logger.info({ productId: inserted.id, asin: inserted.asin }, "[Repository] product inserted");
    return { status: "inserted", record: inserted };
  }

  async update(
    id: number,
    attributes: CatalogAttributes & { asin: string },
  ): Promise<ProductRecord | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .update(this.toCatalogColumns(attributes))
      .eq("id", id)
      .select("*");

    if (error) {
      throw this.storeError("update", error);
    }
    return data && data.length > 0 ? this.toRecord(data[0]) : null;
  }

  async delete(id: number): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.tableName)
      .delete()
      .eq("id", id)
      .select("id");

    if (error) {
      throw this.storeError("delete", error);
    }
    return (data ?? []).length > 0;
  }

  async persistCheckResult(
    id: number,
    outcome: CheckOutcome,
    lastChecked: string,
  ): Promise<void> {
    const { error } = await this.client
      .from(this.tableName)
      .update({
        final_url: outcome.finalUrl,
        price: outcome.price,
        is_redirect: outcome.isRedirect,
        is_unavailable: outcome.isUnavailable,
        orderable: outcome.orderable,
        last_checked: lastChecked,
      })
      .eq("id", id);

    if (error) {
      throw this.storeError("persistCheckResult", error);
    }
  }

  private toCatalogColumns(attributes: CatalogAttributes & { asin: string }) {
    return {
      asin: attributes.asin,
      url: attributes.url,
      collection_name: attributes.collectionName,
      size: attributes.size,
      color: attributes.color,
      customer: attributes.customer,
    };
  }

  /**
   * @throws {MissingIdentityError} row has no id
   */
  private toRecord(raw: unknown): ProductRecord {
    const parsed = CatalogRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogStoreError(
        "read",
        parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
      );
    }

    const row = parsed.data;
    if (row.id === null || row.id === undefined) {
      throw new MissingIdentityError(this.tableName);
    }

    return {
      id: row.id,
      asin: row.asin,
      url: row.url,
      collectionName: row.collection_name,
      size: row.size,
      color: row.color,
      customer: row.customer,
      checkResult: this.toCheckResult(row),
    };
  }

  private toCheckResult(row: CatalogRow): CheckResult | null {
    if (!row.last_checked) {
      return null;
    }
    return {
      finalUrl: row.final_url ?? "",
      price: row.price ?? "",
      isRedirect: row.is_redirect ?? false,
      isUnavailable: row.is_unavailable ?? false,
      orderable: row.orderable ?? false,
      lastChecked: row.last_checked,
    };
  }

  private storeError(operation: string, error: DbError): CatalogStoreError {
    logger.error(
      { operation, error: error.message, code: error.code },
      "[Repository] Supabase query failed",
    );
    return new CatalogStoreError(operation, error.message);
  }
}
