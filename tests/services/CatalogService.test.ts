/**
 * CatalogService Test
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { CatalogService } from "@/services/CatalogService";
import {
  DuplicateUrlError,
  ProductNotFoundError,
  ValidationError,
} from "@/core/errors/AppError";
import type { CheckResult } from "@/core/domain/ProductRecord";
import { InMemoryCatalogRepository } from "../helpers/InMemoryCatalogRepository";

function checked(lastChecked: string, overrides: Partial<CheckResult> = {}): CheckResult {
  return {
    finalUrl: "",
    price: "",
    isRedirect: false,
    isUnavailable: false,
    orderable: true,
    lastChecked,
    ...overrides,
  };
}

describe("CatalogService", () => {
  let repository: InMemoryCatalogRepository;
  let service: CatalogService;

  beforeEach(() => {
    repository = new InMemoryCatalogRepository();
    service = new CatalogService(repository);
  });

  describe("addProduct", () => {
    it("trims attributes and derives the ASIN", async () => {
      const result = await service.addProduct({
        url: "  https://www.amazon.com/dp/B000123456  ",
        collectionName: " Linen ",
        size: "M",
        color: "Blue",
        customer: "Acme",
      });

      expect(result).toEqual({
        status: "inserted",
        record: {
          id: 1,
          asin: "B000123456",
          url: "https://www.amazon.com/dp/B000123456",
          collectionName: "Linen",
          size: "M",
          color: "Blue",
          customer: "Acme",
          checkResult: null,
        },
      });
    });

    it("stores an empty ASIN when the URL has none", async () => {
      const result = await service.addProduct({ url: "https://www.amazon.com/s?k=lamp" });

      expect(result.status === "inserted" && result.record.asin).toBe("");
    });

    it("reports a duplicate URL without adding a record", async () => {
      await service.addProduct({ url: "https://x/dp/B000123456" });

      const result = await service.addProduct({ url: "https://x/dp/B000123456", customer: "Other" });

      expect(result).toEqual({ status: "duplicate" });
      expect(repository.size).toBe(1);
    });

    it("rejects a blank URL", async () => {
      await expect(service.addProduct({ url: "   " })).rejects.toBeInstanceOf(ValidationError);
    });

    it("throws DuplicateUrlError through addUniqueProduct", async () => {
      await service.addUniqueProduct({ url: "https://x/dp/B000123456" });

      await expect(
        service.addUniqueProduct({ url: "https://x/dp/B000123456" }),
      ).rejects.toBeInstanceOf(DuplicateUrlError);
    });
  });

  describe("bulkImport", () => {
    it("counts added, skipped and invalid rows", async () => {
      await service.addProduct({ url: "https://x/dp/B000000001" });

      const result = await service.bulkImport([
        { url: "https://x/dp/B000000001" },
        { url: "https://x/dp/B000000002", customer: "Acme" },
        { url: "" },
        { url: "https://x/dp/B000000002" },
        { url: "https://x/dp/B000000003", size: 42 },
      ]);

      expect(result).toEqual({ added: 2, skipped: 2, invalid: 1, failed: 0 });
      expect(repository.size).toBe(3);
      const stored = await repository.findByUrl("https://x/dp/B000000003");
      expect(stored?.size).toBe("42");
    });

    it("keeps importing after a row the store rejects", async () => {
      repository.failingInsertUrls.add("https://x/dp/B000000002");

      const result = await service.bulkImport([
        { url: "https://x/dp/B000000001" },
        { url: "https://x/dp/B000000002" },
        { url: "https://x/dp/B000000003" },
      ]);

      expect(result).toEqual({ added: 2, skipped: 0, invalid: 0, failed: 1 });
      expect(repository.size).toBe(2);
      expect(await repository.findByUrl("https://x/dp/B000000003")).not.toBeNull();
    });
  });

  describe("updateProduct", () => {
    beforeEach(async () => {
      await service.addProduct({ url: "https://x/dp/B000000001", customer: "Acme" });
      await service.addProduct({ url: "https://x/dp/B000000002", customer: "Acme" });
    });

    it("updates attributes and re-derives the ASIN", async () => {
      const updated = await service.updateProduct(1, {
        url: "https://x/gp/product/B000000009",
        customer: "Globex",
      });

      expect(updated).toMatchObject({
        id: 1,
        asin: "B000000009",
        url: "https://x/gp/product/B000000009",
        customer: "Globex",
        collectionName: "",
      });
    });

    it("allows saving a record with its own URL", async () => {
      const updated = await service.updateProduct(1, {
        url: "https://x/dp/B000000001",
        color: "Red",
      });

      expect(updated.color).toBe("Red");
    });

    it("rejects a URL owned by another record", async () => {
      await expect(
        service.updateProduct(1, { url: "https://x/dp/B000000002" }),
      ).rejects.toBeInstanceOf(DuplicateUrlError);
    });

    it("throws for an unknown id", async () => {
      await expect(
        service.updateProduct(42, { url: "https://x/dp/B000000042" }),
      ).rejects.toBeInstanceOf(ProductNotFoundError);
    });

    it("leaves check results untouched", async () => {
      await repository.persistCheckResult(
        1,
        { finalUrl: "f", price: "1.00", isRedirect: false, isUnavailable: false, orderable: true },
        "2025-01-01 10:00:00",
      );

      const updated = await service.updateProduct(1, { url: "https://x/dp/B000000001" });

      expect(updated.checkResult?.price).toBe("1.00");
    });
  });

  describe("deleteProducts", () => {
    it("counts removed records only", async () => {
      await service.addProduct({ url: "https://x/dp/B000000001" });
      await service.addProduct({ url: "https://x/dp/B000000002" });

      expect(await service.deleteProducts([1, 1, 7])).toBe(1);
      expect(repository.size).toBe(1);
    });
  });

  describe("listProducts", () => {
    beforeEach(() => {
      repository = new InMemoryCatalogRepository([
        {
          id: 1,
          url: "https://x/dp/B000000001",
          asin: "B000000001",
          collectionName: "Linen",
          customer: "Acme",
          color: "Blue",
          checkResult: checked("2025-01-10 08:00:00", { price: "19.99" }),
        },
        {
          id: 2,
          url: "https://x/dp/B000000002",
          asin: "B000000002",
          collectionName: "Wool",
          customer: "Globex",
          checkResult: checked("2025-01-05 23:59:59", {
            orderable: false,
            isUnavailable: true,
            isRedirect: true,
          }),
        },
        {
          id: 3,
          url: "https://x/dp/B000000003",
          asin: "B000000003",
          collectionName: "Linen Plus",
          customer: "acme corp",
        },
      ]);
      service = new CatalogService(repository);
    });

    const ids = async (filter: Parameters<CatalogService["listProducts"]>[0]) =>
      (await service.listProducts(filter)).map((record) => record.id);

    it("returns everything without filters", async () => {
      expect(await ids({})).toEqual([1, 2, 3]);
    });

    it("filters by case-insensitive substrings", async () => {
      expect(await ids({ customer: "ACME" })).toEqual([1, 3]);
      expect(await ids({ collectionName: "linen", customer: "corp" })).toEqual([3]);
      expect(await ids({ asin: "0002" })).toEqual([2]);
    });

    it("filters by price text", async () => {
      expect(await ids({ price: "19." })).toEqual([1]);
    });

    it("filters by exact flags", async () => {
      expect(await ids({ orderable: false })).toEqual([2]);
      expect(await ids({ isRedirect: false })).toEqual([1]);
    });

    it("keeps never-checked and older records for notCheckedSince", async () => {
      expect(await ids({ notCheckedSince: "2025-01-06" })).toEqual([2, 3]);
      expect(await ids({ notCheckedSince: "2025-01-05" })).toEqual([3]);
    });

    it("rejects an invalid date", async () => {
      await expect(service.listProducts({ notCheckedSince: "2025-02-30" })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });
});
