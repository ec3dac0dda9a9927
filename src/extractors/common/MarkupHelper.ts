/**
 * MarkupHelper Utility
 *
 * Pattern: Utility Class (Static Methods)
 * Queries over server-rendered markup (cheerio)
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";

export class MarkupHelper {
  /**
   * Parse markup ("" yields an empty document)
   */
  static load(html: string): CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Trimmed text of the first element with this id, "" if absent
   */
  static getTextById($: CheerioAPI, id: string): string {
    return MarkupHelper.getText($, `[id="${id}"]`);
  }

  /**
   * Trimmed text of the first match, "" if absent
   */
  static getText($: CheerioAPI, selector: string): string {
    const element = $(selector).first();
    if (element.length === 0) {
      return "";
    }
    return element.text().trim();
  }

  static exists($: CheerioAPI, selector: string): boolean {
    return $(selector).length > 0;
  }

  /**
   * First of `phrases` found in `text`, case-insensitive
   */
  static findPhrase(text: string, phrases: readonly string[]): string | null {
    const haystack = text.toLowerCase();
    return phrases.find((phrase) => haystack.includes(phrase.toLowerCase())) ?? null;
  }
}
