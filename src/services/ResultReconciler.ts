/**
 * Result reconciliation
 *
 * is_redirect   = original identifier != final identifier
 * is_unavailable = !orderable
 * a redirect forces orderable=false, is_unavailable=true
 */

import type { CheckOutcome } from "@/core/domain/ProductRecord";

export interface ReconcileInput {
  originalAsin: string;
  finalAsin: string;
  finalUrl: string;
  price: string;
  orderable: boolean;
}

export function reconcile(input: ReconcileInput): CheckOutcome {
  const isRedirect = input.originalAsin !== input.finalAsin;

  if (isRedirect) {
    return {
      finalUrl: input.finalUrl,
      price: input.price,
      isRedirect: true,
      isUnavailable: true,
      orderable: false,
    };
  }

  return {
    finalUrl: input.finalUrl,
    price: input.price,
    isRedirect: false,
    isUnavailable: !input.orderable,
    orderable: input.orderable,
  };
}
