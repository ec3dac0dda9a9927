/**
 * Application constants
 *
 * Environment-driven settings
 * - Falls back to defaults when a variable is unset
 * - Credentials have no default and are checked where they are used
 */

import "dotenv/config";

/**
 * Application metadata
 *
 * ⚠️ Keep VERSION in step with package.json "version"
 */
export const APP_METADATA = {
  VERSION: "1.0.0",

  NAME: "Listing Status Tracker",
} as const;

/**
 * HTTP server settings
 */
export const SERVER_CONFIG = {
  /**
   * Listen port
   * env: PORT (default 3000)
   */
  PORT: parseInt(process.env.PORT || "3000", 10),

  /**
   * Shared API key required on /api/v1/*
   * env: API_KEY
   */
  API_KEY: process.env.API_KEY || "",

  /**
   * Upper bound for uploaded workbooks
   */
  MAX_UPLOAD_BYTES: 10 * 1024 * 1024,
} as const;

/**
 * Database settings
 */
export const DATABASE_CONFIG = {
  /**
   * Catalog table
   * env: CATALOG_TABLE_NAME (default "catalog_products")
   */
  CATALOG_TABLE_NAME: process.env.CATALOG_TABLE_NAME || "catalog_products",

  /**
   * SQL function adding the result columns when they are missing
   */
  ENSURE_RESULT_COLUMNS_RPC: "ensure_catalog_result_columns",

  /**
   * PostgreSQL unique_violation
   */
  UNIQUE_VIOLATION_CODE: "23505",
} as const;

/**
 * Status check settings
 * Browser navigation and page settling
 */
export const CHECK_CONFIG = {
  /**
   * Marketplace checked by default (YAML under config/platforms)
   */
  DEFAULT_MARKETPLACE: process.env.CHECK_MARKETPLACE || "amazon",

  /**
   * Flat wait after navigation for client-side redirects and rendering (ms)
   * env: CHECK_SETTLE_DELAY_MS (default 8000)
   */
  SETTLE_DELAY_MS: parseInt(process.env.CHECK_SETTLE_DELAY_MS || "8000", 10),

  /**
   * Navigation timeout (ms)
   * env: CHECK_NAVIGATION_TIMEOUT_MS (default 30000)
   */
  NAVIGATION_TIMEOUT_MS: parseInt(
    process.env.CHECK_NAVIGATION_TIMEOUT_MS || "30000",
    10,
  ),

  /**
   * env: CHECK_HEADLESS ("false" shows the browser)
   */
  HEADLESS: process.env.CHECK_HEADLESS !== "false",

  DEFAULT_VIEWPORT: {
    width: 1920,
    height: 1080,
  },

  /**
   * env: USER_AGENT
   */
  USER_AGENT:
    process.env.USER_AGENT ||
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",

  LOCALE: process.env.CHECK_LOCALE || "en-US",
} as const;

/**
 * Logging service names
 * Used to route log files per process
 */
export const SERVICE_NAMES = {
  /**
   * Express server
   * log file: logs/YYYY-MM-DD/server.log
   */
  SERVER: "server",

  /**
   * Status check runner
   * log file: logs/YYYY-MM-DD/checker.log
   */
  CHECKER: "checker",

  /**
   * CLI scripts
   * log file: logs/YYYY-MM-DD/cli.log
   */
  CLI: "cli",
} as const;

/**
 * Path settings
 */
export const PATH_CONFIG = {
  /**
   * Marketplace YAML directory, relative to src/config
   */
  PLATFORMS_DIR: "platforms",
} as const;
