/**
 * Summary Service
 *
 * Orderable share per (collection, customer):
 * onsitePercent = round(orderable / totalSku × 100, 1)
 * Never-checked records count in totalSku only.
 */

import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";

export interface SummaryRow {
  collectionName: string;
  customer: string;
  totalSku: number;
  orderable: number;
  nonOrderable: number;
  onsitePercent: number;
}

export interface SummaryOptions {
  /** exact customer name */
  customer?: string;
}

export class SummaryService {
  constructor(private readonly repository: ICatalogRepository) {}

  async summarize(options: SummaryOptions = {}): Promise<SummaryRow[]> {
    const customer = options.customer?.trim();
    const records = (await this.repository.listAll()).filter(
      (record) => !customer || record.customer === customer,
    );

    const groups = new Map<string, SummaryRow>();
    for (const record of records) {
      const key = JSON.stringify([record.collectionName, record.customer]);
      let row = groups.get(key);
      if (!row) {
        row = {
          collectionName: record.collectionName,
          customer: record.customer,
          totalSku: 0,
          orderable: 0,
          nonOrderable: 0,
          onsitePercent: 0,
        };
        groups.set(key, row);
      }

      row.totalSku++;
      if (record.checkResult?.orderable === true) {
        row.orderable++;
      } else if (record.checkResult?.orderable === false) {
        row.nonOrderable++;
      }
    }

    return Array.from(groups.values())
      .map((row) => ({
        ...row,
        onsitePercent: Math.round((row.orderable / row.totalSku) * 1000) / 10,
      }))
      .sort(
        (a, b) =>
          a.collectionName.localeCompare(b.collectionName) ||
          a.customer.localeCompare(b.customer),
      );
  }

  /**
   * Distinct non-empty customers, sorted
   */
  async listCustomers(): Promise<string[]> {
    const records = await this.repository.listAll();
    const customers = new Set(
      records.map((record) => record.customer).filter((customer) => customer !== ""),
    );
    return Array.from(customers).sort((a, b) => a.localeCompare(b));
  }
}
