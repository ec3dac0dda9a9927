export type { IPriceExtractor } from "./IPriceExtractor";
export type { IOrderableExtractor, OrderableData } from "./IOrderableExtractor";
export type { IPageClassifier, PageClassification } from "./IPageClassifier";
