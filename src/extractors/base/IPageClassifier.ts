/**
 * IPageClassifier Interface
 *
 * Pattern: Facade over the price and orderable extractors
 */

import type { OrderableData } from "./IOrderableExtractor";

/**
 * Raw classification of one page (before reconciliation)
 */
export interface PageClassification extends OrderableData {
  price: string;
}

export interface IPageClassifier {
  classify(html: string): PageClassification;
}
