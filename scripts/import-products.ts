/**
 * Bulk import of catalog products from an Excel workbook
 *
 * Columns: URL (required), Collection Name, Size, Color, Customer.
 * The ASIN is derived from the URL; duplicate URLs are skipped.
 *
 * Usage:
 *   npx tsx scripts/import-products.ts <file.xlsx>
 *
 * Environment:
 *   - SUPABASE_URL
 *   - SUPABASE_SERVICE_ROLE_KEY
 */

import "dotenv/config";

import * as fs from "fs";
import { SupabaseCatalogRepository } from "@/repositories/SupabaseCatalogRepository";
import { CatalogService } from "@/services/CatalogService";
import { SpreadsheetService } from "@/services/SpreadsheetService";

async function main(): Promise<void> {
  const filePath = process.argv[2];

  if (!filePath || filePath === "--help" || filePath === "-h") {
    console.log("Usage: npx tsx scripts/import-products.ts <file.xlsx>");
    process.exit(filePath ? 0 : 1);
  }

  if (!fs.existsSync(filePath)) {
    console.error(`File not found: ${filePath}`);
    process.exit(1);
  }

  const rows = new SpreadsheetService().parseUpload(fs.readFileSync(filePath));
  const catalogService = new CatalogService(new SupabaseCatalogRepository());
  const result = await catalogService.bulkImport(rows);

  console.log("\n" + "=".repeat(60));
  console.log("Import result");
  console.log("=".repeat(60));
  console.log(`
Rows:      ${rows.length}
Added:     ${result.added}
Skipped:   ${result.skipped} (duplicate URL)
Invalid:   ${result.invalid} (no URL)
Failed:    ${result.failed} (store error)`);
  console.log("=".repeat(60) + "\n");
}

main().catch((error: unknown) => {
  console.error("Import failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
