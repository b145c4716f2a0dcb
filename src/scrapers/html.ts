import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ScrapeContext, RawListing } from './types';

export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Cards matched by the first selector that matches anything. */
export function selectCards($: CheerioAPI, selectors: readonly string[]): Cheerio<Element>[] {
  for (const selector of selectors) {
    const found = $<Element, string>(selector);
    if (found.length > 0) return found.toArray().map(el => $(el));
  }
  return [];
}

export function firstOf(scope: Cheerio<Element>, selectors: readonly string[]): Cheerio<Element> | null {
  for (const selector of selectors) {
    const found = scope.find(selector).first();
    if (found.length > 0) return found;
  }
  return null;
}

/** Trimmed text of the first matching element, or undefined when none matches or it is blank. */
export function textOf(scope: Cheerio<Element>, selectors: readonly string[]): string | undefined {
  const element = firstOf(scope, selectors);
  if (!element) return undefined;
  return cleanText(element.text()) || undefined;
}

export function absoluteUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined;
  if (/^https?:\/\//.test(href)) return href;
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

export function firstHref(...candidates: (string | undefined)[]): string | undefined {
  return candidates.find(href => href !== undefined && href.length > 0);
}

/** Offers each listing to the collection and returns how many were accepted. */
export function collect(ctx: ScrapeContext, listings: readonly RawListing[]): number {
  let added = 0;
  for (const listing of listings) {
    const outcome = ctx.collection.add(listing);
    if (outcome === 'added') {
      added++;
      ctx.logger.debug(`Added job: ${listing.title} at ${listing.company ?? 'Unknown'}`);
    }
  }
  return added;
}
