/**
 * IPriceExtractor Interface
 *
 * Pattern: Strategy
 */

import type { CheerioAPI } from "cheerio";

/**
 * Price extractor
 *
 * Returns the currency-stripped price text, "" when no price element exists.
 * Never throws.
 */
export interface IPriceExtractor<TInput = CheerioAPI> {
  extract(input: TInput): string;
}
