/**
 * Product identifier (ASIN) extraction from listing URLs
 *
 * 1. /dp/<ID> or /gp/product/<ID> anywhere in the URL
 * 2. otherwise the last "/"-separated segment of exactly 10 alphanumerics
 * 3. otherwise ""
 *
 * Permissive: any 10-character segment is accepted as an identifier.
 */

const PATH_PATTERN = /\/dp\/([A-Z0-9]{10})|\/gp\/product\/([A-Z0-9]{10})/;
const SEGMENT_PATTERN = /^[A-Za-z0-9]{10}$/;

export class ProductIdExtractor {
  /**
   * Never throws; "" when nothing matches
   */
  static extract(url: string): string {
    if (!url) {
      return "";
    }

    const match = PATH_PATTERN.exec(url);
    if (match) {
      return match[1] ?? match[2] ?? "";
    }

    const segments = url.replace(/^\/+|\/+$/g, "").split("/");
    for (let i = segments.length - 1; i >= 0; i--) {
      if (SEGMENT_PATTERN.test(segments[i])) {
        return segments[i];
      }
    }

    return "";
  }
}
