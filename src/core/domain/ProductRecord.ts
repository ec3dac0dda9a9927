/**
 * Product record domain model
 *
 * One tracked marketplace listing: catalog attributes supplied by the
 * operator plus the result of its latest status check.
 */

import { z } from "zod";

/**
 * Finalized result of one status check (reconciled)
 */
export interface CheckOutcome {
  finalUrl: string;
  price: string;
  isRedirect: boolean;
  isUnavailable: boolean;
  orderable: boolean;
}

/**
 * Persisted check result
 * lastChecked: "YYYY-MM-DD HH:mm:ss" (local time)
 */
export interface CheckResult extends CheckOutcome {
  lastChecked: string;
}

/**
 * Operator-editable attributes
 */
export interface CatalogAttributes {
  url: string;
  collectionName: string;
  size: string;
  color: string;
  customer: string;
}

export interface ProductRecord extends CatalogAttributes {
  id: number;
  asin: string;
  /** null until the first check */
  checkResult: CheckResult | null;
}

/**
 * Attributes as stored on insert (identifier already derived)
 */
export interface NewProductRecord extends CatalogAttributes {
  asin: string;
}

export type InsertResult =
  | { status: "inserted"; record: ProductRecord }
  | { status: "duplicate" };

const trimmedText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => (val === null || val === undefined ? "" : String(val).trim()));

/**
 * Catalog attributes accepted from API bodies and spreadsheet rows
 * Missing values default to ""
 */
export const CatalogAttributesSchema = z.object({
  url: trimmedText,
  collectionName: trimmedText,
  size: trimmedText,
  color: trimmedText,
  customer: trimmedText,
});

export type CatalogAttributesInput = z.input<typeof CatalogAttributesSchema>;

/**
 * Listing filters (all optional)
 */
export interface ProductFilter {
  asin?: string;
  url?: string;
  collectionName?: string;
  size?: string;
  color?: string;
  customer?: string;
  price?: string;
  isRedirect?: boolean;
  isUnavailable?: boolean;
  orderable?: boolean;
  /** YYYY-MM-DD; keeps never-checked records and those checked before it */
  notCheckedSince?: string;
}
