import * as cheerio from 'cheerio';
import { AssetKind } from '../models/types';

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Finds absolute http(s) references in captured HTML, CSS and JS
 */
export class ReferenceScanner {
  /**
   * List absolute references in text of the given kind
   * @param text - Decoded asset content
   * @param kind - Kind of the asset; binary kinds yield no references
   * @returns Deduplicated URLs in document order
   */
  public scan(text: string, kind: AssetKind): string[] {
    switch (kind) {
      case 'html':
        return this.scanHtml(text);
      case 'css':
        return this.scanCss(text);
      case 'js':
        return this.scanJs(text);
      default:
        return [];
    }
  }

  /**
   * Scan element attributes, srcset candidates and inline CSS of an HTML document
   * @param html - HTML source
   */
  public scanHtml(html: string): string[] {
    const found = new Set<string>();
    const $ = cheerio.load(html);

    $('[href], [src], [poster], [data-src]').each((_, element) => {
      for (const name of ['href', 'src', 'poster', 'data-src']) {
        const value = $(element).attr(name);
        if (value) this.add(found, value);
      }
    });

    // srcset holds comma-separated "url descriptor" candidates
    $('[srcset]').each((_, element) => {
      const srcset = $(element).attr('srcset');
      if (!srcset) return;
      for (const candidate of srcset.split(',')) {
        this.add(found, candidate.trim().split(/\s+/)[0]);
      }
    });

    $('[style]').each((_, element) => {
      const style = $(element).attr('style');
      if (style) this.scanCss(style).forEach(url => found.add(url));
    });

    $('style').each((_, element) => {
      this.scanCss($(element).text()).forEach(url => found.add(url));
    });

    return [...found];
  }

  /**
   * Scan @import rules and url() values
   * @param css - Stylesheet or inline style text
   */
  public scanCss(css: string): string[] {
    const found = new Set<string>();

    const importRegex = /@import\s+(?:url\(\s*['"]?([^'"()]+)['"]?\s*\)|['"]([^'"]+)['"])/g;
    let match;
    while ((match = importRegex.exec(css)) !== null) {
      this.add(found, (match[1] ?? match[2]).trim());
    }

    const urlRegex = /url\(\s*['"]?([^'"()]+)['"]?\s*\)/g;
    while ((match = urlRegex.exec(css)) !== null) {
      this.add(found, match[1].trim());
    }

    return [...found];
  }

  /**
   * Scan string literals and comments for http(s) URLs
   * @param js - Script source
   */
  public scanJs(js: string): string[] {
    const found = new Set<string>();
    for (const match of js.matchAll(/https?:\/\/[^\s"'`<>()\\]+/g)) {
      this.add(found, match[0]);
    }
    return [...found];
  }

  private add(found: Set<string>, value: string): void {
    if (ABSOLUTE_URL.test(value)) {
      found.add(value);
    }
  }
}
