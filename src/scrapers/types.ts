import type { HttpClient } from './http';
import type { JobCollection } from './collection';
import type { RunGuard } from './guard';
import type { Logger } from '../utils/logger';

export type SiteName = 'indeed' | 'apec' | 'linkedin' | 'wttj';

export const SITE_ORDER: readonly SiteName[] = ['indeed', 'apec', 'linkedin', 'wttj'];

/** A listing as extracted from a page, before it becomes a JobRecord. */
export interface RawListing {
  title: string;
  company?: string;
  location?: string;
  description?: string;
  url?: string;
  source: string;
}

/** A collected job, serialized as-is into the output JSON array. */
export interface JobRecord {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  description?: string;
  readonly source: string;
  readonly scraped_date: string;
  url?: string;
  estimated_salary?: number;
  estimated_fee?: number;
}

export interface ScrapeOptions {
  location: string;
  queryFr: string;
  queryEn: string;
  maxPages: number;
  additionalTerms: string[];
}

export interface ScrapeContext {
  http: HttpClient;
  collection: JobCollection;
  guard: RunGuard;
  logger: Logger;
  options: ScrapeOptions;
}

export interface ScraperAdapter {
  name: SiteName;
  /** Scrapes every query of the site into the context's collection; resolves to the number of jobs added. */
  scrape(ctx: ScrapeContext): Promise<number>;
}
