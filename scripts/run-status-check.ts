/**
 * Status check from the command line
 *
 * Checks catalog products (price, orderable, redirect) and stores the results.
 *
 * Usage:
 *   npx tsx scripts/run-status-check.ts [OPTIONS]
 *
 * Options:
 *   --id <ids>                   product ids, comma separated
 *   --url <url>                  product URL (repeatable)
 *   --customer <text>            customer contains text
 *   --collection <text>          collection name contains text
 *   --not-checked-since <date>   never checked or checked before YYYY-MM-DD
 *   --all                        every product
 *
 * Examples:
 *   npx tsx scripts/run-status-check.ts --all
 *   npx tsx scripts/run-status-check.ts --id 3,7
 *   npx tsx scripts/run-status-check.ts --customer acme --not-checked-since 2025-01-01
 *
 * Environment:
 *   - SUPABASE_URL
 *   - SUPABASE_SERVICE_ROLE_KEY
 *   - CHECK_HEADLESS (optional, "false" shows the browser)
 */

import "dotenv/config";

import { SupabaseCatalogRepository } from "@/repositories/SupabaseCatalogRepository";
import { PlaywrightSessionFactory } from "@/scanners/base/PlaywrightSessionFactory";
import { ExtractorRegistry } from "@/extractors/ExtractorRegistry";
import { CatalogService } from "@/services/CatalogService";
import { StatusCheckService } from "@/services/StatusCheckService";
import { resolveSelection } from "@/services/CheckJobService";
import type { ProductFilter } from "@/core/domain/ProductRecord";
import type { BatchResult } from "@/core/domain/CheckJob";
import { CHECK_CONFIG, SERVICE_NAMES } from "@/config/constants";
import { createServiceLogger } from "@/utils/LoggerContext";

// ============================================
// CLI argument parsing
// ============================================

interface CheckCliConfig {
  ids: number[];
  urls: string[];
  filter: ProductFilter;
  all: boolean;
}

function readValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    console.error(`${flag} needs a value`);
    printUsage();
    process.exit(1);
  }
  return value;
}

function parseArgs(): CheckCliConfig {
  const args = process.argv.slice(2);
  const config: CheckCliConfig = { ids: [], urls: [], filter: {}, all: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--all") {
      config.all = true;
    } else if (arg === "--id") {
      const ids = readValue(args, i++, arg)
        .split(",")
        .map((id) => parseInt(id.trim(), 10));
      if (ids.some((id) => !Number.isInteger(id))) {
        console.error(`--id expects numeric ids`);
        process.exit(1);
      }
      config.ids.push(...ids);
    } else if (arg === "--url") {
      config.urls.push(readValue(args, i++, arg));
    } else if (arg === "--customer") {
      config.filter.customer = readValue(args, i++, arg);
    } else if (arg === "--collection") {
      config.filter.collectionName = readValue(args, i++, arg);
    } else if (arg === "--not-checked-since") {
      config.filter.notCheckedSince = readValue(args, i++, arg);
    } else if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    } else {
      console.error(`Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    }
  }

  return config;
}

function printUsage(): void {
  console.log(`
Status Check

Usage:
  npx tsx scripts/run-status-check.ts [--id 1,2] [--url <url>] [--customer <text>]
                                      [--collection <text>] [--not-checked-since YYYY-MM-DD] [--all]
`);
}

function hasSelection(config: CheckCliConfig): boolean {
  return (
    config.all ||
    config.ids.length > 0 ||
    config.urls.length > 0 ||
    Object.keys(config.filter).length > 0
  );
}

function printResult(result: BatchResult): void {
  console.log("\n" + "=".repeat(60));
  console.log("Status check result");
  console.log("=".repeat(60));

  console.table(
    result.rows.map((row) => ({
      id: row.productId,
      asin: row.asin,
      price: row.outcome.price,
      redirect: row.outcome.isRedirect ? "Yes" : "No",
      unavailable: row.outcome.isUnavailable ? "Yes" : "No",
      orderable: row.outcome.orderable ? "Yes" : "No",
      error: row.error ?? "",
    })),
  );

  const orderable = result.rows.filter((row) => row.outcome.orderable).length;
  console.log(`
Checked:     ${result.total}
Orderable:   ${orderable}
Duration:    ${(result.durationMs / 1000).toFixed(1)}s`);
  console.log("=".repeat(60) + "\n");
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const config = parseArgs();

  if (!hasSelection(config)) {
    printUsage();
    process.exit(1);
  }

  const repository = new SupabaseCatalogRepository();
  const catalogService = new CatalogService(repository);
  const statusCheckService = new StatusCheckService({
    repository,
    sessionFactory: new PlaywrightSessionFactory(),
    classifier: ExtractorRegistry.getInstance().get(CHECK_CONFIG.DEFAULT_MARKETPLACE),
  });

  const candidates = await catalogService.listProducts(config.filter);
  const explicit = config.ids.length > 0 || config.urls.length > 0;
  const { records, unresolved } = explicit
    ? resolveSelection(candidates, { ids: config.ids, urls: config.urls })
    : { records: candidates, unresolved: [] };

  if (unresolved.length > 0) {
    console.warn(`Not found: ${unresolved.join(", ")}`);
  }

  console.log("\n" + "=".repeat(60));
  console.log("Status Check");
  console.log("=".repeat(60));
  console.log(`  - Products:     ${records.length}`);
  console.log(`  - Marketplace:  ${CHECK_CONFIG.DEFAULT_MARKETPLACE}`);
  console.log(`  - Headless:     ${CHECK_CONFIG.HEADLESS}`);
  console.log("=".repeat(60) + "\n");

  const result = await statusCheckService.runBatch(
    records,
    ({ completed, total }) => {
      console.log(`Checking ${completed} of ${total} ASINs...`);
    },
    createServiceLogger(SERVICE_NAMES.CLI),
  );

  printResult(result);

  if (result.rows.some((row) => !row.persisted)) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Status check failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
