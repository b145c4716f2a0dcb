import { load } from 'cheerio';
import { absoluteUrl, collect, firstHref, selectCards, textOf } from './html';
import type { RawListing, ScrapeContext, ScraperAdapter } from './types';

const SEARCH_URL = 'https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search';
const PAGE_SIZE = 25;

// Always searched after the primary query, before any user-supplied terms.
export const LINKEDIN_EXTRA_TERMS = [
  'property management',
  'asset management',
  'real estate investment',
  'property development',
  'immobilier paris',
  'gestion immobilière',
];

export function linkedInSearchUrl(query: string, location: string, start: number): string {
  return `${SEARCH_URL}?keywords=${encodeURIComponent(query)}&location=${encodeURIComponent(location)}&start=${start}`;
}

export function parseLinkedInHtml(html: string): RawListing[] {
  const $ = load(html);
  const listings: RawListing[] = [];

  for (const card of selectCards($, ['div.job-search-card'])) {
    const title = textOf(card, ['h3.base-search-card__title']);
    if (!title) continue;

    const href = firstHref(
      card.find('a.base-card__full-link').first().attr('href'),
      card.find('a.job-search-card__link').first().attr('href')
    );

    listings.push({
      title,
      company: textOf(card, ['h4.base-search-card__subtitle']),
      location: textOf(card, ['span.job-search-card__location']),
      url: absoluteUrl(href, 'https://www.linkedin.com'),
      source: 'LinkedIn',
    });
  }

  return listings;
}

export class LinkedInAdapter implements ScraperAdapter {
  name = 'linkedin' as const;

  async scrape(ctx: ScrapeContext): Promise<number> {
    const queries = [ctx.options.queryEn, ...LINKEDIN_EXTRA_TERMS, ...ctx.options.additionalTerms];
    let added = 0;

    for (const query of queries) {
      if (ctx.guard.check(ctx.collection.size)) {
        ctx.logger.warn('Skipping remaining LinkedIn search terms');
        break;
      }
      added += await this.scrapeQuery(ctx, query);
    }

    ctx.logger.info(`Completed LinkedIn scrape. Total LinkedIn jobs: ${added}`);
    return added;
  }

  private async scrapeQuery(ctx: ScrapeContext, query: string): Promise<number> {
    const { location, maxPages } = ctx.options;
    let added = 0;

    for (let page = 0; page < maxPages; page++) {
      if (ctx.guard.check(ctx.collection.size)) break;

      try {
        const html = await ctx.http.get(linkedInSearchUrl(query, location, page * PAGE_SIZE));
        const listings = parseLinkedInHtml(html);
        if (listings.length === 0) {
          ctx.logger.info(`No more job listings on LinkedIn page ${page + 1} for '${query}'`);
          break;
        }
        added += collect(ctx, listings);
        ctx.logger.info(`Scraped ${listings.length} jobs from LinkedIn page ${page + 1} for '${query}'`);
      } catch (error) {
        ctx.logger.error(`Error scraping LinkedIn page ${page + 1} for '${query}'`, error);
      }

      await ctx.http.pause();
    }

    return added;
  }
}
