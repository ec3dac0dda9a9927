/**
 * Page fetcher
 *
 * navigate → fixed settle delay → (final URL, markup).
 * A navigation timeout yields (original URL, "") instead of failing;
 * no retry. Calls must be sequential: the session is shared.
 */

import type { IBrowserSession, PageSnapshot } from "@/core/interfaces/IBrowserSession";
import { NavigationTimeoutError } from "@/core/errors/AppError";
import type { Logger } from "@/config/logger";

export interface FetchResult extends PageSnapshot {
  timedOut: boolean;
}

export class PageFetcher {
  constructor(
    private readonly settleDelayMs: number,
    private readonly log: Logger,
  ) {}

  async fetch(session: IBrowserSession, url: string): Promise<FetchResult> {
    try {
      await session.navigate(url);
      await session.settle(this.settleDelayMs);
      const snapshot = await session.snapshot();
      return { ...snapshot, timedOut: false };
    } catch (error) {
      if (error instanceof NavigationTimeoutError) {
        this.log.warn(
          { url, timeoutMs: error.timeoutMs },
          "[PageFetcher] navigation timed out, using original URL",
        );
        return { finalUrl: url, html: "", timedOut: true };
      }
      throw error;
    }
  }
}
