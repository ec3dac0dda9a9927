/**
 * PriceParser Utility
 *
 * Pattern: Utility Class (Static Methods)
 * Prices stay text: "1299.00", "19.99"
 */

export class PriceParser {
  /**
   * Remove line breaks and currency symbols, then trim
   *
   * " $19.99\n" → "19.99"
   */
  static clean(text: string | null | undefined, currencySymbols: readonly string[]): string {
    if (!text) {
      return "";
    }

    let cleaned = text.trim().replace(/\n/g, "");
    for (const symbol of currencySymbols) {
      cleaned = cleaned.split(symbol).join("");
    }
    return cleaned.trim();
  }

  /**
   * Join a whole/fraction price pair
   *
   * ("1,299.", "00") → "1299.00"
   * fraction "" → defaultFraction
   */
  static joinWholeFraction(
    whole: string,
    fraction: string,
    currencySymbols: readonly string[],
    defaultFraction: string = "00",
  ): string {
    let wholePart = whole.trim().replace(/,/g, "");
    for (const symbol of currencySymbols) {
      wholePart = wholePart.split(symbol).join("");
    }
    if (wholePart.endsWith(".")) {
      wholePart = wholePart.slice(0, -1);
    }

    const fractionPart = fraction.trim() || defaultFraction;
    return `${wholePart}.${fractionPart}`;
  }
}
