/**
 * Marketplace configuration (YAML)
 *
 * Page knowledge needed to classify a product page:
 * - price elements in priority order
 * - purchase affordances
 * - unavailability phrases
 */

import { z } from "zod";

const nonEmptyList = z.array(z.string().min(1)).min(1);

export const PriceSelectorsSchema = z.object({
  id_priority: nonEmptyList,
  whole_selector: z.string().min(1),
  fraction_selector: z.string().min(1),
  default_fraction: z.string().default("00"),
  offscreen_selector: z.string().min(1),
  currency_symbols: z.array(z.string().min(1)).default(["$"]),
});

export const OrderableSelectorsSchema = z.object({
  affordance_ids: nonEmptyList,
  affordance_tags: nonEmptyList,
  unavailable_phrases: z.array(z.string().min(1)).default([]),
});

export const MarketplaceConfigSchema = z.object({
  marketplace: z.string().min(1),
  name: z.string().min(1),
  base_url: z.string().url(),
  price: PriceSelectorsSchema,
  orderable: OrderableSelectorsSchema,
});

export type PriceSelectors = z.infer<typeof PriceSelectorsSchema>;
export type OrderableSelectors = z.infer<typeof OrderableSelectorsSchema>;
export type MarketplaceConfig = z.infer<typeof MarketplaceConfigSchema>;
