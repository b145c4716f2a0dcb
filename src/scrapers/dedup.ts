import { VOCABULARY } from './filters';

export interface DedupFields {
  title?: string | null;
  company?: string | null;
  location?: string | null;
}

const FUZZY_THRESHOLD = 0.8;

function lower(value: string | null | undefined): string {
  return (value ?? '').toLowerCase();
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(word => word.length > 0));
}

/**
 * Jaccard similarity of the whitespace-separated word sets of two strings.
 * 0 when either string is empty.
 */
export function similarity(a: string, b: string): number {
  if (!a || !b) return 0;

  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  const union = new Set([...wordsA, ...wordsB]);
  if (union.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  return intersection / union.size;
}

function locationsCompatible(a: string, b: string): boolean {
  return !a || !b || a.includes(b) || b.includes(a);
}

/**
 * Checks a candidate against every previously accepted record.
 *
 * Rejects empty or "unknown" titles, exact (title, company) matches, and titles at the
 * same company whose word sets overlap by more than 80% when the locations agree.
 */
export function isDuplicate(candidate: DedupFields, existing: readonly DedupFields[]): boolean {
  const title = lower(candidate.title);
  const company = lower(candidate.company);
  const location = lower(candidate.location);

  if (!title || title === 'unknown') return true;

  for (const job of existing) {
    if (lower(job.title) === title && lower(job.company) === company) return true;
  }

  for (const job of existing) {
    if (lower(job.company) !== company) continue;
    if (similarity(lower(job.title), title) > FUZZY_THRESHOLD && locationsCompatible(location, lower(job.location))) {
      return true;
    }
  }

  return false;
}

/**
 * Key used by the end-of-run pass: lowercased, trimmed title with space-delimited stop words
 * removed, joined with the lowercased company.
 */
export function normalizedKey(
  job: { title?: string | null; company?: string | null },
  stopWords: readonly string[] = VOCABULARY.stopWords
): string {
  let title = lower(job.title).trim();
  const company = lower(job.company).trim();

  for (const word of stopWords) {
    title = title.split(` ${word} `).join(' ');
  }

  return `${title}|${company}`;
}

/**
 * Keeps the first record for each normalized key, in order.
 */
export function finalDedup<T extends { title?: string | null; company?: string | null }>(
  jobs: readonly T[]
): { jobs: T[]; removed: number } {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const job of jobs) {
    const key = normalizedKey(job);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(job);
  }

  return { jobs: unique, removed: jobs.length - unique.length };
}

/**
 * Re-applies both passes to an existing list: each record is checked against the ones kept
 * before it, then the normalized-key pass runs over the survivors.
 */
export function dedupeRecords<T extends DedupFields>(jobs: readonly T[]): { jobs: T[]; removed: number } {
  const kept: T[] = [];
  for (const job of jobs) {
    if (!isDuplicate(job, kept)) kept.push(job);
  }
  const final = finalDedup(kept);
  return { jobs: final.jobs, removed: jobs.length - final.jobs.length };
}
