/**
 * ConfigLoader Test
 */

import { describe, it, expect, beforeAll, afterAll } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigLoader } from "@/config/ConfigLoader";

describe("ConfigLoader", () => {
  describe("bundled marketplaces", () => {
    const loader = ConfigLoader.getInstance();

    it("lists amazon", () => {
      expect(loader.getAvailableMarketplaces()).toEqual(["amazon"]);
    });

    it("loads the amazon price ids in priority order", () => {
      const config = loader.loadConfig("amazon");

      expect(config.price.id_priority).toEqual([
        "price_inside_buybox",
        "priceblock_ourprice",
        "priceblock_dealprice",
        "priceblock_saleprice",
      ]);
      expect(config.price.default_fraction).toBe("00");
      expect(config.orderable.affordance_ids).toEqual([
        "add-to-cart-button",
        "buy-now-button",
      ]);
      expect(config.orderable.unavailable_phrases).toHaveLength(6);
    });

    it("caches loaded configs", () => {
      expect(loader.loadConfig("amazon")).toBe(loader.loadConfig("amazon"));
    });
  });

  describe("invalid files", () => {
    let dir: string;
    let loader: ConfigLoader;

    beforeAll(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "marketplaces-"));
      fs.writeFileSync(
        path.join(dir, "broken.yaml"),
        "marketplace: broken\nname: Broken\nbase_url: https://example.com\n",
      );
      fs.writeFileSync(
        path.join(dir, "renamed.yaml"),
        fs.readFileSync(path.join(__dirname, "../../src/config/platforms/amazon.yaml"), "utf8"),
      );
      loader = ConfigLoader.fromDirectory(dir);
    });

    afterAll(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("throws for a missing file", () => {
      expect(() => loader.loadConfig("ebay")).toThrow(
        `Config file not found: ${path.join(dir, "ebay.yaml")}`,
      );
    });

    it("throws for a schema violation", () => {
      expect(() => loader.loadConfig("broken")).toThrow("Invalid config for broken");
    });

    it("throws when the file declares another marketplace", () => {
      expect(() => loader.loadConfig("renamed")).toThrow('declares marketplace "amazon"');
    });
  });
});
