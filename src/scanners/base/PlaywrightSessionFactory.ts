/**
 * Playwright browser session
 *
 * One browser + one context + one page per session.
 * Stealth plugin, desktop Chrome user agent.
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import { errors } from "playwright";
import type { Browser, BrowserContext, Page } from "playwright";
import type {
  BrowserSessionOptions,
  IBrowserSession,
  IBrowserSessionFactory,
  PageSnapshot,
} from "@/core/interfaces/IBrowserSession";
import { NavigationTimeoutError } from "@/core/errors/AppError";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { CHECK_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

chromium.use(StealthPlugin());

export class PlaywrightBrowserSession implements IBrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
  ) {}

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url, {
        waitUntil: "load",
        timeout: this.navigationTimeoutMs,
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(url, this.navigationTimeoutMs);
      }
      throw error;
    }
  }

  async settle(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async snapshot(): Promise<PageSnapshot> {
    return {
      finalUrl: this.page.url(),
      html: await this.page.content(),
    };
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
      logger.debug("[PlaywrightSession] browser closed");
    }
  }
}

export class PlaywrightSessionFactory implements IBrowserSessionFactory {
  async newSession(options: BrowserSessionOptions): Promise<IBrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      args: process.env.NODE_ENV === "production" ? BROWSER_ARGS.DEFAULT : BROWSER_ARGS.LOCAL_DEV,
    });

    try {
      const context = await browser.newContext({
        userAgent: CHECK_CONFIG.USER_AGENT,
        viewport: { ...CHECK_CONFIG.DEFAULT_VIEWPORT },
        locale: CHECK_CONFIG.LOCALE,
      });
      const page = await context.newPage();

      logger.debug(
        { headless: options.headless, navigationTimeoutMs: options.navigationTimeoutMs },
        "[PlaywrightSession] browser launched",
      );

      return new PlaywrightBrowserSession(browser, context, page, options.navigationTimeoutMs);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
