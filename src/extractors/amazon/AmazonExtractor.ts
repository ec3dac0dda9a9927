/**
 * AmazonExtractor
 *
 * Pattern: Facade
 *
 * SOLID:
 * - SRP: combines the price and orderable extractors only
 * - DIP: selectors come from amazon.yaml (MarketplaceConfig)
 */

import type { IPageClassifier, PageClassification } from "@/extractors/base";
import { MarkupHelper } from "@/extractors/common/MarkupHelper";
import type { MarketplaceConfig } from "@/core/domain/MarketplaceConfig";
import { AmazonPriceExtractor } from "./AmazonPriceExtractor";
import { AmazonOrderableExtractor } from "./AmazonOrderableExtractor";

/**
 * Pure function of the markup: never throws, "" gives { price: "", orderable: false }
 *
 * @implements {IPageClassifier}
 */
export class AmazonExtractor implements IPageClassifier {
  private readonly priceExtractor: AmazonPriceExtractor;
  private readonly orderableExtractor: AmazonOrderableExtractor;

  constructor(config: MarketplaceConfig) {
    this.priceExtractor = new AmazonPriceExtractor(config.price);
    this.orderableExtractor = new AmazonOrderableExtractor(config.orderable);
  }

  classify(html: string): PageClassification {
    const $ = MarkupHelper.load(html);
    const { orderable, unavailableSignal } = this.orderableExtractor.extract($, html);

    return {
      price: this.priceExtractor.extract($),
      orderable,
      unavailableSignal,
    };
  }
}
