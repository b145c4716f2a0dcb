import { load } from 'cheerio';
import { FRENCH_LANGUAGE } from './http';
import { absoluteUrl, cleanText, collect, firstHref, firstOf, selectCards, textOf } from './html';
import type { RawListing, ScrapeContext, ScraperAdapter } from './types';

const BASE_URL = 'https://www.apec.fr';

const CARD_SELECTORS = ['div.card-body', 'div.job-result-card'];
const TITLE_SELECTORS = ['h2.card-title', 'h2.job-name'];
const COMPANY_SELECTORS = ['div.card-offer__company', 'div.company-name'];
const LOCATION_SELECTORS = ['div.card-offer__location', 'div.location'];
const DESCRIPTION_SELECTORS = ['div.card-offer__description', 'div.description'];

export function apecQueries(query: string): string[] {
  return [
    query,
    `${query} agent`,
    `${query} conseiller`,
    `${query} manager`,
    `${query} négociateur`,
    `${query} transaction`,
    `${query} vente`,
  ];
}

export function apecSearchUrl(query: string, location: string): string {
  return `${BASE_URL}/candidat/recherche-emploi.html/emploi?motsCles=${encodeURIComponent(query)}&localisation=${encodeURIComponent(location)}`;
}

export function parseApecHtml(html: string): RawListing[] {
  const $ = load(html);
  const listings: RawListing[] = [];

  for (const card of selectCards($, CARD_SELECTORS)) {
    const titleElement = firstOf(card, TITLE_SELECTORS);
    if (!titleElement) continue;
    const title = cleanText(titleElement.text());
    if (!title) continue;

    const href = firstHref(titleElement.parents('a').first().attr('href'), card.find('a').first().attr('href'));

    listings.push({
      title,
      company: textOf(card, COMPANY_SELECTORS),
      location: textOf(card, LOCATION_SELECTORS),
      description: textOf(card, DESCRIPTION_SELECTORS),
      url: absoluteUrl(href, BASE_URL),
      source: 'APEC',
    });
  }

  return listings;
}

export class ApecAdapter implements ScraperAdapter {
  name = 'apec' as const;

  async scrape(ctx: ScrapeContext): Promise<number> {
    const { queryFr, location } = ctx.options;
    let added = 0;

    for (const query of apecQueries(queryFr)) {
      if (ctx.guard.check(ctx.collection.size)) break;

      try {
        const html = await ctx.http.get(apecSearchUrl(query, location), { acceptLanguage: FRENCH_LANGUAGE });
        const listings = parseApecHtml(html);
        if (listings.length === 0) {
          ctx.logger.info(`No job listings found for APEC query '${query}'. Trying next query.`);
        } else {
          const count = collect(ctx, listings);
          added += count;
          ctx.logger.info(`Query '${query}': ${listings.length} listings, ${count} added`);
        }
      } catch (error) {
        ctx.logger.error(`Error scraping APEC for query '${query}'`, error);
      }

      await ctx.http.pause();
    }

    ctx.logger.info(`Completed APEC scrape. Total APEC jobs: ${added}`);
    return added;
  }
}
