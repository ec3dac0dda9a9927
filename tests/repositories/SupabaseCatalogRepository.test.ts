/**
 * SupabaseCatalogRepository Test
 *
 * Real supabase-js client over an in-process PostgREST stand-in.
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import { createClient } from "@supabase/supabase-js";
import { SupabaseCatalogRepository } from "@/repositories/SupabaseCatalogRepository";
import { CatalogStoreError, MissingIdentityError } from "@/core/errors/AppError";
import { createFakePostgrest, Responder } from "../helpers/FakePostgrest";

const TABLE_PATH = "/rest/v1/catalog_products";

const CHECKED_ROW = {
  id: 1,
  asin: "B000000001",
  url: "https://x/dp/B000000001",
  collection_name: "Linen",
  size: "M",
  color: "Blue",
  customer: "Acme",
  final_url: "https://x/dp/B000000001",
  price: "19.99",
  is_redirect: false,
  is_unavailable: false,
  orderable: true,
  last_checked: "2025-01-10 08:00:00",
};

const UNCHECKED_ROW = {
  id: 2,
  asin: "",
  url: "https://x/s?k=lamp",
  collection_name: null,
  size: "",
  color: "",
  customer: "Globex",
  final_url: null,
  price: null,
  is_redirect: null,
  is_unavailable: null,
  orderable: null,
  last_checked: null,
};

function createRepository(responder: Responder) {
  const postgrest = createFakePostgrest(responder);
  const client = createClient("http://localhost:54321", "test-secret", {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: postgrest.fetch },
  });
  return {
    repository: new SupabaseCatalogRepository(client, "catalog_products"),
    requests: postgrest.requests,
  };
}

describe("SupabaseCatalogRepository", () => {
  describe("shared client", () => {
    const savedEnv = { ...process.env };

    afterEach(() => {
      process.env = { ...savedEnv };
    });

    it("requires credentials in the environment", () => {
      process.env.SUPABASE_URL = "";
      process.env.SUPABASE_SERVICE_ROLE_KEY = "";

      expect(() => new SupabaseCatalogRepository()).toThrow(
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
      );
    });

    it("creates the client from the environment on this Node.js", () => {
      process.env.SUPABASE_URL = "http://localhost:54321";
      process.env.SUPABASE_SERVICE_ROLE_KEY = "test-secret";

      expect(() => new SupabaseCatalogRepository()).not.toThrow();
    });
  });

  describe("listAll", () => {
    it("maps rows to records ordered by id", async () => {
      const { repository, requests } = createRepository(() => ({
        status: 200,
        body: [CHECKED_ROW, UNCHECKED_ROW],
      }));

      const records = await repository.listAll();

      expect(records).toEqual([
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
          asin: "",
          url: "https://x/s?k=lamp",
          collectionName: "",
          size: "",
          color: "",
          customer: "Globex",
          checkResult: null,
        },
      ]);
      expect(requests[0].method).toBe("GET");
      expect(requests[0].url.pathname).toBe(TABLE_PATH);
      expect(requests[0].url.searchParams.get("order")).toBe("id.asc");
    });

    it("raises MissingIdentityError for rows without an id", async () => {
      const { id: _id, ...withoutId } = CHECKED_ROW;
      const { repository } = createRepository(() => ({ status: 200, body: [withoutId] }));

      await expect(repository.listAll()).rejects.toBeInstanceOf(MissingIdentityError);
    });

    it("wraps query errors in CatalogStoreError", async () => {
      const { repository } = createRepository(() => ({
        status: 500,
        body: { code: "XX000", message: "boom", details: null, hint: null },
      }));

      await expect(repository.listAll()).rejects.toBeInstanceOf(CatalogStoreError);
    });
  });

  describe("insert", () => {
    const newRecord = {
      asin: "B000000003",
      url: "https://x/dp/B000000003",
      collectionName: "Linen",
      size: "L",
      color: "Sand",
      customer: "Acme",
    };

    it("inserts snake_case columns and returns the stored record", async () => {
      const { repository, requests } = createRepository((request) =>
        request.method === "GET"
          ? { status: 200, body: [] }
          : {
              status: 201,
              body: [{ ...UNCHECKED_ROW, id: 5, asin: "B000000003", url: newRecord.url }],
            },
      );

      const result = await repository.insert(newRecord);

      expect(result).toMatchObject({ status: "inserted", record: { id: 5, asin: "B000000003" } });
      expect(requests[0].url.searchParams.get("url")).toBe("eq.https://x/dp/B000000003");
      expect(requests[1].method).toBe("POST");
      expect(requests[1].body).toEqual({
        asin: "B000000003",
        url: "https://x/dp/B000000003",
        collection_name: "Linen",
        size: "L",
        color: "Sand",
        customer: "Acme",
      });
    });

    it("reports a duplicate found before the write", async () => {
      const { repository, requests } = createRepository(() => ({
        status: 200,
        body: [CHECKED_ROW],
      }));

      expect(await repository.insert(newRecord)).toEqual({ status: "duplicate" });
      expect(requests).toHaveLength(1);
    });

    it("reports a unique violation as a duplicate", async () => {
      const { repository } = createRepository((request) =>
        request.method === "GET"
          ? { status: 200, body: [] }
          : {
              status: 409,
              body: { code: "23505", message: "duplicate key value", details: null, hint: null },
            },
      );

      expect(await repository.insert(newRecord)).toEqual({ status: "duplicate" });
    });
  });

  describe("persistCheckResult", () => {
    it("writes all six result columns in one update", async () => {
      const { repository, requests } = createRepository(() => ({ status: 204 }));

      await repository.persistCheckResult(
        7,
        {
          finalUrl: "https://x/dp/B000999999",
          price: "",
          isRedirect: true,
          isUnavailable: true,
          orderable: false,
        },
        "2025-01-15 09:05:03",
      );

      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe("PATCH");
      expect(requests[0].url.searchParams.get("id")).toBe("eq.7");
      expect(requests[0].body).toEqual({
        final_url: "https://x/dp/B000999999",
        price: "",
        is_redirect: true,
        is_unavailable: true,
        orderable: false,
        last_checked: "2025-01-15 09:05:03",
      });
    });
  });

  describe("delete", () => {
    it("reports whether a row was removed", async () => {
      let removed = true;
      const { repository } = createRepository(() => ({
        status: 200,
        body: removed ? [{ id: 3 }] : [],
      }));

      expect(await repository.delete(3)).toBe(true);
      removed = false;
      expect(await repository.delete(3)).toBe(false);
    });
  });

  describe("ensureSchema", () => {
    it("calls the migration function once", async () => {
      const { repository, requests } = createRepository(() => ({ status: 204 }));

      await repository.ensureSchema();
      await repository.ensureSchema();

      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe("POST");
      expect(requests[0].url.pathname).toBe("/rest/v1/rpc/ensure_catalog_result_columns");
    });

    it("retries after a failed migration", async () => {
      let fail = true;
      const { repository, requests } = createRepository(() =>
        fail
          ? { status: 404, body: { code: "PGRST202", message: "function not found", details: null, hint: null } }
          : { status: 204 },
      );

      await expect(repository.ensureSchema()).rejects.toBeInstanceOf(CatalogStoreError);
      fail = false;
      await repository.ensureSchema();

      expect(requests).toHaveLength(2);
    });
  });
});
