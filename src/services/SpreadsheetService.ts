/**
 * Spreadsheet Service
 *
 * Excel template, upload parsing and status report (xlsx).
 * Flags become "Yes"/"No" here and nowhere else.
 */

import * as XLSX from "xlsx";
import type { CatalogAttributesInput, ProductRecord } from "@/core/domain/ProductRecord";
import { ValidationError } from "@/core/errors/AppError";

export const TEMPLATE_COLUMNS = [
  "ASIN",
  "URL",
  "Collection Name",
  "Size",
  "Color",
  "Customer",
] as const;

export const REPORT_COLUMNS = [
  ...TEMPLATE_COLUMNS,
  "Final URL",
  "Price",
  "Is Redirect",
  "Is Unavailable",
  "Orderable",
  "Last Checked",
] as const;

const SHEET_NAME = "Products";

/** upload column → catalog attribute */
const UPLOAD_COLUMNS: Array<[string, keyof CatalogAttributesInput]> = [
  ["URL", "url"],
  ["Collection Name", "collectionName"],
  ["Size", "size"],
  ["Color", "color"],
  ["Customer", "customer"],
];

function yesNo(flag: boolean): string {
  return flag ? "Yes" : "No";
}

function cellText(cell: unknown): string {
  return cell === null || cell === undefined ? "" : String(cell).trim();
}

export class SpreadsheetService {
  /**
   * Empty workbook with the template header
   */
  buildTemplate(): Buffer {
    return this.writeWorkbook([[...TEMPLATE_COLUMNS]]);
  }

  /**
   * First sheet → catalog rows (blank lines dropped)
   * @throws {ValidationError} unreadable workbook or no URL column
   */
  parseUpload(buffer: Buffer): CatalogAttributesInput[] {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer, { type: "buffer" });
    } catch (error) {
      throw new ValidationError("Could not read the uploaded workbook", [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    const firstSheetName = workbook.SheetNames[0];
    const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
    if (!sheet) {
      throw new ValidationError("The uploaded workbook has no sheets");
    }

    const [header = [], ...body] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: "",
      raw: false,
      blankrows: false,
    });
    const headerNames = header.map(cellText);

    if (!headerNames.includes("URL")) {
      throw new ValidationError("Your Excel must have a 'URL' column.");
    }

    const columnIndexes = UPLOAD_COLUMNS.map(
      ([column, key]) => [headerNames.indexOf(column), key] as const,
    );

    return body
      .filter((cells) => cells.some((cell) => cellText(cell) !== ""))
      .map((cells) => {
        const row: CatalogAttributesInput = {};
        for (const [index, key] of columnIndexes) {
          row[key] = index >= 0 ? cellText(cells[index]) : "";
        }
        return row;
      });
  }

  /**
   * Catalog and check result columns; never-checked rows leave results blank
   */
  buildReport(records: ProductRecord[]): Buffer {
    const rows: string[][] = records.map((record) => {
      const result = record.checkResult;
      return [
        record.asin,
        record.url,
        record.collectionName,
        record.size,
        record.color,
        record.customer,
        result?.finalUrl ?? "",
        result?.price ?? "",
        result ? yesNo(result.isRedirect) : "",
        result ? yesNo(result.isUnavailable) : "",
        result ? yesNo(result.orderable) : "",
        result?.lastChecked ?? "",
      ];
    });

    return this.writeWorkbook([[...REPORT_COLUMNS], ...rows]);
  }

  private writeWorkbook(rows: string[][]): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), SHEET_NAME);
    const output: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    return output;
  }
}
