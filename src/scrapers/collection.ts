import { isDuplicate, finalDedup } from './dedup';
import { isExcluded, isRelevant } from './filters';
import type { JobRecord, RawListing } from './types';

export type AddOutcome = 'added' | 'excluded' | 'irrelevant' | 'duplicate';

export interface CollectionOptions {
  /** Location used when a listing has none. */
  defaultLocation: string;
  excludeKeywords?: string[];
  today?: () => string;
}

export function isoDate(date: Date = new Date()): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Insertion-ordered list of accepted jobs. A listing is appended only when it passes the
 * relevance classifier and is not a duplicate of anything already collected.
 */
export class JobCollection {
  private records: JobRecord[] = [];
  // Both dedup passes only ever match within one company.
  private byCompany = new Map<string, JobRecord[]>();
  private readonly today: () => string;

  constructor(private readonly options: CollectionOptions) {
    this.today = options.today ?? (() => isoDate());
  }

  get size(): number {
    return this.records.length;
  }

  get jobs(): readonly JobRecord[] {
    return this.records;
  }

  add(listing: RawListing): AddOutcome {
    if (isExcluded(listing, this.options.excludeKeywords ?? [])) return 'excluded';
    if (!isRelevant(listing.title, listing.description ?? '')) return 'irrelevant';

    const record = this.toRecord(listing);
    const sameCompany = this.byCompany.get(record.company.toLowerCase()) ?? [];
    if (isDuplicate(record, sameCompany)) return 'duplicate';

    this.append(record);
    return 'added';
  }

  /** Seeds the collection with records saved by an earlier run, without re-checking them. */
  restore(records: readonly JobRecord[]): void {
    for (const record of records) this.append(record);
  }

  /** Applies the end-of-run normalized-key pass and returns the number of records dropped. */
  finalize(): number {
    const { jobs, removed } = finalDedup(this.records);
    this.records = [];
    this.byCompany.clear();
    for (const record of jobs) this.append(record);
    return removed;
  }

  private append(record: JobRecord): void {
    this.records.push(record);
    const key = record.company.toLowerCase();
    const bucket = this.byCompany.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      this.byCompany.set(key, [record]);
    }
  }

  private toRecord(listing: RawListing): JobRecord {
    const record: JobRecord = {
      title: listing.title,
      company: listing.company || 'Unknown',
      location: listing.location || this.options.defaultLocation,
      source: listing.source,
      scraped_date: this.today(),
    };
    if (listing.description) record.description = listing.description;
    if (listing.url) record.url = listing.url;
    return record;
  }
}
