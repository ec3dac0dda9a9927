/**
 * Browser session abstraction
 *
 * One session handles one navigation at a time.
 */

export interface PageSnapshot {
  finalUrl: string;
  html: string;
}

export interface IBrowserSession {
  /**
   * @throws {NavigationTimeoutError} navigation exceeded its timeout
   */
  navigate(url: string): Promise<void>;

  /**
   * Fixed wait for client-side redirects and rendering
   */
  settle(ms: number): Promise<void>;

  /**
   * Current URL and rendered markup
   */
  snapshot(): Promise<PageSnapshot>;

  close(): Promise<void>;
}

export interface BrowserSessionOptions {
  headless: boolean;
  navigationTimeoutMs: number;
}

export interface IBrowserSessionFactory {
  newSession(options: BrowserSessionOptions): Promise<IBrowserSession>;
}
