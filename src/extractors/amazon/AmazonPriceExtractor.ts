/**
 * AmazonPriceExtractor
 *
 * Priority:
 * 1. fixed price element ids (first with text)
 * 2. whole + fraction price spans
 * 3. off-screen price span
 * 4. ""
 */

import type { CheerioAPI } from "cheerio";
import type { IPriceExtractor } from "@/extractors/base";
import { MarkupHelper } from "@/extractors/common/MarkupHelper";
import { PriceParser } from "@/extractors/common/PriceParser";
import type { PriceSelectors } from "@/core/domain/MarketplaceConfig";

export class AmazonPriceExtractor implements IPriceExtractor<CheerioAPI> {
  constructor(private readonly selectors: PriceSelectors) {}

  extract($: CheerioAPI): string {
    const symbols = this.selectors.currency_symbols;

    for (const id of this.selectors.id_priority) {
      const text = MarkupHelper.getTextById($, id);
      if (text) {
        return PriceParser.clean(text, symbols);
      }
    }

    if (MarkupHelper.exists($, this.selectors.whole_selector)) {
      return PriceParser.joinWholeFraction(
        MarkupHelper.getText($, this.selectors.whole_selector),
        MarkupHelper.getText($, this.selectors.fraction_selector),
        symbols,
        this.selectors.default_fraction,
      );
    }

    const offscreen = MarkupHelper.getText($, this.selectors.offscreen_selector);
    if (offscreen) {
      return PriceParser.clean(offscreen, symbols);
    }

    return "";
  }
}
