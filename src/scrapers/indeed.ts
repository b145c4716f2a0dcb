import { load } from 'cheerio';
import Parser from 'rss-parser';
import { FRENCH_LANGUAGE } from './http';
import { absoluteUrl, cleanText, collect, firstHref, firstOf, selectCards, textOf } from './html';
import type { RawListing, ScrapeContext, ScraperAdapter } from './types';

const BASE_URL = 'https://fr.indeed.com';
const RSS_ACCEPT = 'application/rss+xml,application/xml';

// Investment-focused searches; only the first QUERIES_PER_RUN are run.
export const INDEED_QUERIES = [
  'investment manager immobilier',
  'asset manager immobilier',
  'fund manager real estate',
  'analyste investissement immobilier',
  'acquisitions immobilières',
  'debt fund immobilier',
  'structured finance real estate',
  'portfolio manager immobilier',
  'underwriter immobilier',
];
const QUERIES_PER_RUN = 4;

const CARD_SELECTORS = [
  '.job_seen_beacon',
  '.tapItem',
  '.cardOutline',
  'td.resultContent',
  '[data-testid="job-card"]',
  '[class*="job-card"]',
];
const TITLE_SELECTORS = [
  'h2.jobTitle',
  'h2[class*="title"]',
  'a[class*="jcs-JobTitle"]',
  'a[id*="job-title"]',
  'a[class*="title"]',
  'span[title]',
];
const COMPANY_SELECTORS = [
  'span.companyName',
  'span[data-testid="company-name"]',
  '[class*="companyName"]',
  '[class*="company"]',
];
const LOCATION_SELECTORS = ['div.companyLocation', '[class*="location"]'];
const SNIPPET_SELECTORS = ['div.job-snippet', '[class*="snippet"]', '[class*="summary"]'];
const JOB_LINK_SELECTOR = 'a[class*="job-"], a[class*="title"], a[href*="/viewjob"]';

const rssParser = new Parser<Record<string, unknown>, { description?: unknown }>({
  customFields: { item: ['description'] },
});

export function indeedSearchUrl(query: string, location: string): string {
  return `${BASE_URL}/emplois?${new URLSearchParams({ q: query, l: location })}`;
}

export function indeedRssUrl(query: string, location: string): string {
  return `${BASE_URL}/rss?${new URLSearchParams({ q: query, l: location })}`;
}

export function parseIndeedHtml(html: string): RawListing[] {
  const $ = load(html);
  const listings: RawListing[] = [];

  for (const card of selectCards($, CARD_SELECTORS)) {
    const titleElement = firstOf(card, TITLE_SELECTORS);
    if (!titleElement) continue;
    const title = cleanText(titleElement.text());
    if (!title) continue;

    // Title anchor, anchor inside the title, enclosing anchor, then any job link in the card.
    const href = firstHref(
      titleElement.is('a') ? titleElement.attr('href') : undefined,
      titleElement.find('a').first().attr('href'),
      titleElement.parents('a').first().attr('href'),
      card.find(JOB_LINK_SELECTOR).first().attr('href')
    );

    listings.push({
      title,
      company: textOf(card, COMPANY_SELECTORS),
      location: textOf(card, LOCATION_SELECTORS),
      description: textOf(card, SNIPPET_SELECTORS),
      url: absoluteUrl(href, BASE_URL),
      source: 'Indeed',
    });
  }

  return listings;
}

/** Parses the search RSS feed, whose item titles read "Job Title - Company". */
export async function parseIndeedRss(xml: string): Promise<RawListing[]> {
  const feed = await rssParser.parseString(xml);
  const listings: RawListing[] = [];

  for (const item of feed.items) {
    const rawTitle = item.title?.trim();
    if (!rawTitle) continue;

    const separator = rawTitle.indexOf(' - ');
    const title = separator >= 0 ? rawTitle.slice(0, separator).trim() : rawTitle;
    const company = separator >= 0 ? rawTitle.slice(separator + 3).trim() : undefined;

    const description = typeof item.description === 'string' ? item.description : item.content ?? '';
    const locationMatch = /Location: ([^<]+)/.exec(description);

    listings.push({
      title,
      company: company || undefined,
      location: locationMatch ? locationMatch[1].trim() : undefined,
      description: description || undefined,
      url: item.link?.trim() || undefined,
      source: 'Indeed (RSS)',
    });
  }

  return listings;
}

export class IndeedAdapter implements ScraperAdapter {
  name = 'indeed' as const;

  async scrape(ctx: ScrapeContext): Promise<number> {
    const { location } = ctx.options;
    let added = 0;

    for (const query of INDEED_QUERIES.slice(0, QUERIES_PER_RUN)) {
      if (ctx.guard.check(ctx.collection.size)) break;

      try {
        ctx.logger.info(`Trying Indeed query: ${query}`);
        const listings = await this.fetchListings(ctx, query, location);
        const count = collect(ctx, listings);
        added += count;
        ctx.logger.info(`Query '${query}': ${listings.length} listings, ${count} added`);
      } catch (error) {
        ctx.logger.error(`Error scraping Indeed for query '${query}'`, error);
      }

      await ctx.http.pause();
    }

    ctx.logger.info(`Completed Indeed scrape. Total Indeed jobs: ${added}`);
    return added;
  }

  private async fetchListings(ctx: ScrapeContext, query: string, location: string): Promise<RawListing[]> {
    try {
      const html = await ctx.http.get(indeedSearchUrl(query, location), { acceptLanguage: FRENCH_LANGUAGE });
      const listings = parseIndeedHtml(html);
      if (listings.length > 0) return listings;
      ctx.logger.info('No job cards on the search page, trying the RSS feed');
    } catch (error) {
      ctx.logger.warn('Search page unavailable, trying the RSS feed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const xml = await ctx.http.get(indeedRssUrl(query, location), {
      accept: RSS_ACCEPT,
      acceptLanguage: FRENCH_LANGUAGE,
    });
    return parseIndeedRss(xml);
  }
}
