import { load } from 'cheerio';
import { FRENCH_LANGUAGE } from './http';
import { absoluteUrl, collect, selectCards, textOf } from './html';
import type { RawListing, ScrapeContext, ScraperAdapter } from './types';

const BASE_URL = 'https://www.welcometothejungle.com';
const REFERER = `${BASE_URL}/fr`;
const MAX_EXTRA_TERMS = 3;

export const WTTJ_EXTRA_TERMS = [
  'immobilier transaction',
  'immobilier développement',
  'property management paris',
  'asset management immobilier',
  'real estate investment paris',
];

const CARD_SELECTORS = ['[data-testid="job-card"]', '.job-card', 'article', '.ais-Hits-item'];
const TITLE_SELECTORS = ['h3', '[data-testid="job-card-title"]', '.job-title', '.title'];
const COMPANY_SELECTORS = ['[data-testid="job-card-company"]', '.company-name', '.company'];
const LOCATION_SELECTORS = ['[data-testid="job-card-location"]', '.location'];

export function wttjQueries(queryFr: string, queryEn: string, additionalTerms: readonly string[]): string[] {
  return [queryFr, queryEn, ...[...WTTJ_EXTRA_TERMS, ...additionalTerms].slice(0, MAX_EXTRA_TERMS)];
}

export function wttjSearchUrl(query: string, location: string): string {
  return `${BASE_URL}/fr/jobs?query=${encodeURIComponent(query)}&page=1&aroundQuery=${encodeURIComponent(location)}`;
}

/** Listings carry no description: this site is classified on the title alone. Cards without a link are skipped. */
export function parseWttjHtml(html: string): RawListing[] {
  const $ = load(html);
  const listings: RawListing[] = [];

  for (const card of selectCards($, CARD_SELECTORS)) {
    const title = textOf(card, TITLE_SELECTORS);
    if (!title) continue;

    const url = absoluteUrl(card.find('a').first().attr('href'), BASE_URL);
    if (!url) continue;

    listings.push({
      title,
      company: textOf(card, COMPANY_SELECTORS),
      location: textOf(card, LOCATION_SELECTORS),
      url,
      source: 'Welcome to the Jungle',
    });
  }

  return listings;
}

export class WttjAdapter implements ScraperAdapter {
  name = 'wttj' as const;

  async scrape(ctx: ScrapeContext): Promise<number> {
    const { queryFr, queryEn, additionalTerms, location } = ctx.options;
    const seenUrls = new Set<string>();
    let added = 0;

    for (const query of wttjQueries(queryFr, queryEn, additionalTerms)) {
      if (ctx.guard.check(ctx.collection.size)) {
        ctx.logger.warn('Skipping remaining Welcome to the Jungle search terms');
        break;
      }

      try {
        const html = await ctx.http.get(wttjSearchUrl(query, location), {
          accept: 'text/html,application/xhtml+xml,application/xml',
          acceptLanguage: FRENCH_LANGUAGE,
          referer: REFERER,
        });
        const listings = parseWttjHtml(html).filter(listing => {
          if (!listing.url || seenUrls.has(listing.url)) return false;
          seenUrls.add(listing.url);
          return true;
        });
        const count = collect(ctx, listings);
        added += count;
        ctx.logger.info(`Query '${query}': ${listings.length} new listings, ${count} added`);
      } catch (error) {
        ctx.logger.error(`Error searching Welcome to the Jungle with term '${query}'`, error);
      }

      await ctx.http.pause();
    }

    if (added === 0) ctx.logger.warn('No real estate jobs found on Welcome to the Jungle');
    ctx.logger.info(`Completed Welcome to the Jungle scrape. Total jobs found: ${added}`);
    return added;
  }
}
