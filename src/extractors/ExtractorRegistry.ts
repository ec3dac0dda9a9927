/**
 * ExtractorRegistry
 *
 * Pattern: Singleton, Registry
 * Page classifier per marketplace, built from its YAML config
 */

import type { IPageClassifier } from "@/extractors/base";
import { AmazonExtractor } from "@/extractors/amazon/AmazonExtractor";
import { ConfigLoader } from "@/config/ConfigLoader";
import type { MarketplaceConfig } from "@/core/domain/MarketplaceConfig";

type ClassifierFactory = (config: MarketplaceConfig) => IPageClassifier;

export class ExtractorRegistry {
  private static instance: ExtractorRegistry | null = null;
  private readonly factories = new Map<string, ClassifierFactory>();
  private readonly classifiers = new Map<string, IPageClassifier>();

  private constructor(private readonly configLoader: ConfigLoader) {
    this.registerDefaults();
  }

  static getInstance(): ExtractorRegistry {
    if (!ExtractorRegistry.instance) {
      ExtractorRegistry.instance = new ExtractorRegistry(ConfigLoader.getInstance());
    }
    return ExtractorRegistry.instance;
  }

  private registerDefaults(): void {
    this.register("amazon", (config) => new AmazonExtractor(config));
  }

  register(marketplace: string, factory: ClassifierFactory): void {
    this.factories.set(marketplace, factory);
    this.classifiers.delete(marketplace);
  }

  /**
   * @throws {Error} no classifier registered for the marketplace
   */
  get(marketplace: string): IPageClassifier {
    const cached = this.classifiers.get(marketplace);
    if (cached) {
      return cached;
    }

    const factory = this.factories.get(marketplace);
    if (!factory) {
      throw new Error(
        `Extractor not found: ${marketplace}. Available: [${this.getAvailableMarketplaces().join(", ")}]`,
      );
    }

    const classifier = factory(this.configLoader.loadConfig(marketplace));
    this.classifiers.set(marketplace, classifier);
    return classifier;
  }

  has(marketplace: string): boolean {
    return this.factories.has(marketplace);
  }

  /**
   * Registered marketplaces that also ship a YAML config
   */
  getAvailableMarketplaces(): string[] {
    return this.configLoader
      .getAvailableMarketplaces()
      .filter((marketplace) => this.has(marketplace));
  }
}
