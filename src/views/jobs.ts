import { isoDate } from '../scrapers/collection';
import type { JobRecord } from '../scrapers/types';

export const DATE_WINDOWS = ['any', '24h', 'week', '2weeks', 'month'] as const;

export type DateWindow = (typeof DATE_WINDOWS)[number];

const WINDOW_DAYS: Record<Exclude<DateWindow, 'any'>, number> = {
  '24h': 1,
  week: 7,
  '2weeks': 14,
  month: 31,
};

export const SORT_KEYS = ['scraped_date', 'source', 'company', 'title', 'estimated_salary'] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export interface JobFilter {
  text?: string;
  window?: DateWindow;
  /** Reference day as YYYY-MM-DD; defaults to the local date. */
  today?: string;
}

export interface JobSort {
  key: SortKey;
  ascending: boolean;
}

export interface JobStats {
  total: number;
  bySource: Record<string, number>;
  topKeywords: { word: string; count: number }[];
  withSalary: number;
}

function parseDay(value: string | undefined): number | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value ?? '');
  if (!match) return null;
  const time = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return Number.isNaN(time) ? null : time / 86_400_000;
}

export function matchesText(job: JobRecord, text: string): boolean {
  const needle = text.toLowerCase();
  if (!needle) return true;
  return [job.title, job.company, job.location, job.source, job.description ?? ''].some(field =>
    field.toLowerCase().includes(needle)
  );
}

/** Records without a readable scraped_date are kept whatever the window. */
export function matchesWindow(job: JobRecord, window: DateWindow, today: string = isoDate()): boolean {
  if (window === 'any') return true;
  const jobDay = parseDay(job.scraped_date);
  const currentDay = parseDay(today);
  if (jobDay === null || currentDay === null) return true;
  return currentDay - jobDay <= WINDOW_DAYS[window];
}

export function filterJobs(jobs: readonly JobRecord[], filter: JobFilter = {}): JobRecord[] {
  const text = filter.text?.trim() ?? '';
  const window = filter.window ?? 'any';
  return jobs.filter(job => matchesText(job, text) && matchesWindow(job, window, filter.today));
}

function sortValue(job: JobRecord, key: SortKey): string | number {
  switch (key) {
    case 'estimated_salary':
      return job.estimated_salary ?? 0;
    case 'scraped_date':
      return job.scraped_date || 'Unknown';
    default:
      return (job[key] || 'Unknown').toLowerCase();
  }
}

/** Stable sort; records with equal keys keep their relative order in both directions. */
export function sortJobs(jobs: readonly JobRecord[], sort: JobSort): JobRecord[] {
  const direction = sort.ascending ? 1 : -1;
  return [...jobs].sort((a, b) => {
    const left = sortValue(a, sort.key);
    const right = sortValue(b, sort.key);
    if (left < right) return -direction;
    if (left > right) return direction;
    return 0;
  });
}

const CSV_COLUMNS = ['title', 'company', 'location', 'source', 'scraped_date', 'description', 'url'];

function csvCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** CSV with the standard columns first, then any extra fields in first-seen order. */
export function toCsv(jobs: readonly JobRecord[]): string {
  const columns = [...CSV_COLUMNS];
  for (const job of jobs) {
    for (const key of Object.keys(job)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }

  const lines = [columns.join(',')];
  for (const job of jobs) {
    const row = new Map<string, unknown>(Object.entries(job));
    lines.push(columns.map(column => csvCell(row.get(column))).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

export function countBySource(jobs: readonly JobRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const job of jobs) {
    const source = job.source || 'Unknown';
    counts[source] = (counts[source] ?? 0) + 1;
  }
  return counts;
}

/** Most frequent title words longer than three characters; ties keep first-seen order. */
export function topTitleWords(jobs: readonly JobRecord[], limit = 15): { word: string; count: number }[] {
  const counts = new Map<string, number>();
  for (const job of jobs) {
    for (const word of job.title.toLowerCase().split(/\s+/)) {
      if (word.length > 3) counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function jobStats(jobs: readonly JobRecord[]): JobStats {
  return {
    total: jobs.length,
    bySource: countBySource(jobs),
    topKeywords: topTitleWords(jobs),
    withSalary: jobs.filter(job => (job.estimated_salary ?? 0) > 0).length,
  };
}
