/**
 * SpreadsheetService Test
 */

import { describe, it, expect } from "@jest/globals";
import * as XLSX from "xlsx";
import {
  REPORT_COLUMNS,
  SpreadsheetService,
  TEMPLATE_COLUMNS,
} from "@/services/SpreadsheetService";
import { ValidationError } from "@/core/errors/AppError";
import type { ProductRecord } from "@/core/domain/ProductRecord";

function toBuffer(rows: unknown[][]): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "Sheet1");
  const output: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return output;
}

function readRows(buffer: Buffer): unknown[][] {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const sheet = workbook.Sheets[workbook.SheetNames[0]];
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", raw: false });
}

describe("SpreadsheetService", () => {
  const service = new SpreadsheetService();

  describe("buildTemplate", () => {
    it("contains only the header row", () => {
      expect(readRows(service.buildTemplate())).toEqual([[...TEMPLATE_COLUMNS]]);
    });
  });

  describe("parseUpload", () => {
    it("maps columns by header name in any order", () => {
      const buffer = toBuffer([
        ["Customer", "URL", "Notes", "Size"],
        ["Acme", " https://x/dp/B000000001 ", "n/a", 42],
        ["", "", "", ""],
        ["Globex", "https://x/dp/B000000002", "", ""],
      ]);

      expect(service.parseUpload(buffer)).toEqual([
        {
          url: "https://x/dp/B000000001",
          collectionName: "",
          size: "42",
          color: "",
          customer: "Acme",
        },
        {
          url: "https://x/dp/B000000002",
          collectionName: "",
          size: "",
          color: "",
          customer: "Globex",
        },
      ]);
    });

    it("parses a filled-in template", () => {
      const buffer = toBuffer([
        [...TEMPLATE_COLUMNS],
        ["IGNORED", "https://x/dp/B000000003", "Linen", "L", "Sand", "Acme"],
      ]);

      expect(service.parseUpload(buffer)).toEqual([
        {
          url: "https://x/dp/B000000003",
          collectionName: "Linen",
          size: "L",
          color: "Sand",
          customer: "Acme",
        },
      ]);
    });

    it("requires a URL column", () => {
      const buffer = toBuffer([["ASIN", "Customer"], ["B000000001", "Acme"]]);

      expect(() => service.parseUpload(buffer)).toThrow(ValidationError);
      expect(() => service.parseUpload(buffer)).toThrow("Your Excel must have a 'URL' column.");
    });
  });

  describe("buildReport", () => {
    const records: ProductRecord[] = [
      {
        id: 1,
        asin: "B000000001",
        url: "https://x/dp/B000000001",
        collectionName: "Linen",
        size: "M",
        color: "Blue",
        customer: "Acme",
        checkResult: {
          finalUrl: "https://x/dp/B000000001",
          price: "19.99",
          isRedirect: false,
          isUnavailable: false,
          orderable: true,
          lastChecked: "2025-01-10 08:00:00",
        },
      },
      {
        id: 2,
        asin: "B000000002",
        url: "https://x/dp/B000000002",
        collectionName: "Wool",
        size: "",
        color: "",
        customer: "Globex",
        checkResult: null,
      },
    ];

    it("writes flags as Yes/No and leaves unchecked rows blank", () => {
      expect(readRows(service.buildReport(records))).toEqual([
        [...REPORT_COLUMNS],
        [
          "B000000001",
          "https://x/dp/B000000001",
          "Linen",
          "M",
          "Blue",
          "Acme",
          "https://x/dp/B000000001",
          "19.99",
          "No",
          "No",
          "Yes",
          "2025-01-10 08:00:00",
        ],
        [
          "B000000002",
          "https://x/dp/B000000002",
          "Wool",
          "",
          "",
          "Globex",
          "",
          "",
          "",
          "",
          "",
          "",
        ],
      ]);
    });
  });
});
