/**
 * YAML config loader
 * Singleton Pattern
 *
 * SOLID:
 * - SRP: loads marketplace YAML only
 * - OCP: a new marketplace is a new YAML file
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  MarketplaceConfig,
  MarketplaceConfigSchema,
} from "@/core/domain/MarketplaceConfig";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader | null = null;
  private configCache: Map<string, MarketplaceConfig> = new Map();

  private constructor(private readonly platformsDir: string) {}

  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader(
        path.join(__dirname, PATH_CONFIG.PLATFORMS_DIR),
      );
    }
    return ConfigLoader.instance;
  }

  /**
   * Loader over another directory (tests)
   */
  static fromDirectory(platformsDir: string): ConfigLoader {
    return new ConfigLoader(platformsDir);
  }

  /**
   * Load and validate a marketplace YAML
   * @throws {Error} missing file or schema violation
   */
  loadConfig(marketplace: string): MarketplaceConfig {
    const cached = this.configCache.get(marketplace);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.platformsDir, `${marketplace}.yaml`);

    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }

    const fileContent = fs.readFileSync(configPath, "utf8");
    const parsed = MarketplaceConfigSchema.safeParse(yaml.load(fileContent));

    if (!parsed.success) {
      const details = parsed.error.errors.map(
        (e) => `${e.path.join(".")}: ${e.message}`,
      );
      logger.error(
        { marketplace, configPath, details },
        "[ConfigLoader] invalid marketplace config",
      );
      throw new Error(
        `Invalid config for ${marketplace}: ${details.join("; ")}`,
      );
    }

    if (parsed.data.marketplace !== marketplace) {
      throw new Error(
        `Config ${configPath} declares marketplace "${parsed.data.marketplace}"`,
      );
    }

    this.configCache.set(marketplace, parsed.data);
    return parsed.data;
  }

  /**
   * Marketplace ids with a YAML file
   */
  getAvailableMarketplaces(): string[] {
    if (!fs.existsSync(this.platformsDir)) {
      throw new Error(`Platforms directory not found: ${this.platformsDir}`);
    }

    return fs
      .readdirSync(this.platformsDir)
      .filter((file) => file.endsWith(".yaml"))
      .map((file) => file.replace(/\.yaml$/, ""))
      .sort();
  }
}
