/**
 * HTML Parser Utilities
 *
 * Thin helpers over Cheerio for the box score and week index pages.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError, type ErrorDetails } from '../../types/errors';

export type Selection = cheerio.Cheerio<Element>;

export class HTMLParser {
  static load(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Select and require exactly `count` matches.
   * @throws ParseError naming the selector and the number found
   */
  static expectCount(
    $: cheerio.CheerioAPI,
    selector: string,
    count: number,
    context?: ErrorDetails,
    within?: Selection
  ): Selection {
    const found: Selection = within ? within.find(selector) : $.root().find(selector);
    if (found.length !== count) {
      throw new ParseError(
        `Expected ${count} element(s) matching "${selector}", found ${found.length}`,
        { selector, found: found.length, ...context }
      );
    }
    return found;
  }

  /**
   * Parse a non-negative integer cell such as a quarter or final score.
   */
  static parseInteger(text: string, what: string, context?: ErrorDetails): number {
    const trimmed = text.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new ParseError(`Expected an integer for ${what}, got "${trimmed}"`, { what, ...context });
    }
    return parseInt(trimmed, 10);
  }

  /**
   * Collapse runs of whitespace (including newlines) into single spaces
   */
  static cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}
