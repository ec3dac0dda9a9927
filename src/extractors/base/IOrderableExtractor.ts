/**
 * IOrderableExtractor Interface
 *
 * Pattern: Strategy
 */

import type { CheerioAPI } from "cheerio";

export interface OrderableData {
  /** purchase affordance (add to cart / buy now) present */
  orderable: boolean;

  /**
   * First unavailability phrase found when no affordance exists.
   * Diagnostic only: it never changes `orderable`.
   */
  unavailableSignal: string | null;
}

export interface IOrderableExtractor<TInput = CheerioAPI> {
  /**
   * @param input parsed markup
   * @param html raw markup (phrase scan)
   */
  extract(input: TInput, html: string): OrderableData;
}
