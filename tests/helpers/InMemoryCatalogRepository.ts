/**
 * In-memory ICatalogRepository for tests
 */

import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import type {
  CatalogAttributes,
  CheckOutcome,
  InsertResult,
  NewProductRecord,
  ProductRecord,
} from "@/core/domain/ProductRecord";
import { CatalogStoreError } from "@/core/errors/AppError";

export interface PersistCall {
  id: number;
  outcome: CheckOutcome;
  lastChecked: string;
}

export class InMemoryCatalogRepository implements ICatalogRepository {
  private readonly records = new Map<number, ProductRecord>();
  private nextId = 1;

  ensureSchemaCalls = 0;
  readonly persistCalls: PersistCall[] = [];
  /** ids whose persistCheckResult fails */
  readonly failingPersistIds = new Set<number>();
  /** URLs whose insert fails */
  readonly failingInsertUrls = new Set<string>();

  constructor(seed: Array<Partial<ProductRecord> & { url: string }> = []) {
    for (const record of seed) {
      const id = record.id ?? this.nextId;
      this.nextId = Math.max(this.nextId, id + 1);
      this.records.set(id, {
        id,
        asin: record.asin ?? "",
        url: record.url,
        collectionName: record.collectionName ?? "",
        size: record.size ?? "",
        color: record.color ?? "",
        customer: record.customer ?? "",
        checkResult: record.checkResult ?? null,
      });
    }
  }

  get size(): number {
    return this.records.size;
  }

  async ensureSchema(): Promise<void> {
    this.ensureSchemaCalls++;
  }

  async listAll(): Promise<ProductRecord[]> {
    return Array.from(this.records.values())
      .sort((a, b) => a.id - b.id)
      .map((record) => this.copy(record));
  }

  async findById(id: number): Promise<ProductRecord | null> {
    const record = this.records.get(id);
    return record ? this.copy(record) : null;
  }

  async findByUrl(url: string): Promise<ProductRecord | null> {
    const record = Array.from(this.records.values()).find((r) => r.url === url);
    return record ? this.copy(record) : null;
  }

  async insert(record: NewProductRecord): Promise<InsertResult> {
    if (this.failingInsertUrls.has(record.url)) {
      throw new CatalogStoreError("insert", "value too long");
    }
    if (await this.findByUrl(record.url)) {
      return { status: "duplicate" };
    }
    const stored: ProductRecord = { ...record, id: this.nextId++, checkResult: null };
    this.records.set(stored.id, stored);
    return { status: "inserted", record: this.copy(stored) };
  }

  async update(
    id: number,
    attributes: CatalogAttributes & { asin: string },
  ): Promise<ProductRecord | null> {
    const current = this.records.get(id);
    if (!current) {
      return null;
    }
    const updated: ProductRecord = { ...current, ...attributes };
    this.records.set(id, updated);
    return this.copy(updated);
  }

  async delete(id: number): Promise<boolean> {
    return this.records.delete(id);
  }

  async persistCheckResult(
    id: number,
    outcome: CheckOutcome,
    lastChecked: string,
  ): Promise<void> {
    if (this.failingPersistIds.has(id)) {
      throw new Error(`write failed for ${id}`);
    }
    this.persistCalls.push({ id, outcome: { ...outcome }, lastChecked });
    const current = this.records.get(id);
    if (current) {
      this.records.set(id, { ...current, checkResult: { ...outcome, lastChecked } });
    }
  }

  private copy(record: ProductRecord): ProductRecord {
    return {
      ...record,
      checkResult: record.checkResult ? { ...record.checkResult } : null,
    };
  }
}
