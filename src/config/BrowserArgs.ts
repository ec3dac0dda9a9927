/**
 * Browser launch arguments
 *
 * Chrome flags grouped by purpose so callers can combine them
 */

export const BROWSER_ARGS = {
  /**
   * Memory flags
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // small /dev/shm in containers
    "--disable-gpu",
    "--disable-software-rasterizer",
    "--disable-extensions",
    "--disable-background-networking",
    "--disable-default-apps",
    "--no-first-run",
  ],

  /**
   * Hide automation markers
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Required inside Docker
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * Docker + Memory + Stealth
   */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  /**
   * Memory + Stealth (local development)
   */
  get LOCAL_DEV(): string[] {
    return [...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
} as const;
