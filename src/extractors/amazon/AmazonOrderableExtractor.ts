/**
 * AmazonOrderableExtractor
 *
 * orderable = an add-to-cart or buy-now input/button exists.
 * Without one, unavailability phrases are scanned and the first match is
 * reported as a signal; the page is not orderable either way.
 */

import type { CheerioAPI } from "cheerio";
import type { IOrderableExtractor, OrderableData } from "@/extractors/base";
import { MarkupHelper } from "@/extractors/common/MarkupHelper";
import type { OrderableSelectors } from "@/core/domain/MarketplaceConfig";

export class AmazonOrderableExtractor implements IOrderableExtractor<CheerioAPI> {
  private readonly affordanceSelector: string;

  constructor(private readonly selectors: OrderableSelectors) {
    // "input[id="add-to-cart-button"], button[id="add-to-cart-button"], ..."
    this.affordanceSelector = selectors.affordance_ids
      .flatMap((id) => selectors.affordance_tags.map((tag) => `${tag}[id="${id}"]`))
      .join(", ");
  }

  extract($: CheerioAPI, html: string): OrderableData {
    if (MarkupHelper.exists($, this.affordanceSelector)) {
      return { orderable: true, unavailableSignal: null };
    }

    return {
      orderable: false,
      unavailableSignal: MarkupHelper.findPhrase(html, this.selectors.unavailable_phrases),
    };
  }
}
