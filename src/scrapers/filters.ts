// Shared filters for all scraper adapters
import vocabulary from '../data/vocabulary.json';

export interface Vocabulary {
  coreTerms: readonly string[];
  jobTitles: readonly string[];
  propertyTypes: readonly string[];
  activities: readonly string[];
  relatedFields: readonly string[];
  investmentTerms: readonly string[];
  stopWords: readonly string[];
}

export const VOCABULARY: Vocabulary = vocabulary;

const TITLE_SIGNAL_MIN = 2;
const DESCRIPTION_SIGNAL_MIN = 3;

function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some(term => text.includes(term));
}

// Counts list entries, not distinct words: a term listed twice counts twice.
function countHits(text: string, terms: readonly string[]): number {
  let hits = 0;
  for (const term of terms) {
    if (text.includes(term)) hits++;
  }
  return hits;
}

/**
 * Decides whether a listing is a real-estate job.
 *
 * Rules are checked in order and the first match wins:
 * 1. a core term in the title
 * 2. a job-title word in the title, with a core or property-type term in title or description
 * 3. a property type in the title, with an activity in title or description
 * 4. one of the investment terms in the title
 * 5. at least two related-field, activity or property-type hits in the title
 * 6. with a description: a core term there plus a role, activity or property term in the title,
 *    or at least three vocabulary hits in the description
 *
 * All tests are case-insensitive substring matches.
 */
export function isRelevant(
  title: string | null | undefined,
  description: string | null | undefined = '',
  vocab: Vocabulary = VOCABULARY
): boolean {
  const titleLower = (title ?? '').toLowerCase();
  const descLower = (description ?? '').toLowerCase();

  if (!titleLower && !descLower) return false;

  const inTitleOrDesc = (term: string) => titleLower.includes(term) || descLower.includes(term);

  if (containsAny(titleLower, vocab.coreTerms)) return true;

  const contextTerms = [...vocab.coreTerms, ...vocab.propertyTypes];
  if (containsAny(titleLower, vocab.jobTitles) && contextTerms.some(inTitleOrDesc)) {
    return true;
  }

  if (containsAny(titleLower, vocab.propertyTypes) && vocab.activities.some(inTitleOrDesc)) {
    return true;
  }

  if (containsAny(titleLower, vocab.investmentTerms)) return true;

  const weakSignals = [...vocab.relatedFields, ...vocab.activities, ...vocab.propertyTypes];
  if (countHits(titleLower, weakSignals) >= TITLE_SIGNAL_MIN) return true;

  if (descLower) {
    const titleTerms = [...vocab.jobTitles, ...vocab.activities, ...vocab.propertyTypes];
    if (containsAny(descLower, vocab.coreTerms) && containsAny(titleLower, titleTerms)) {
      return true;
    }

    const allKeywords = [
      ...vocab.coreTerms,
      ...vocab.jobTitles,
      ...vocab.propertyTypes,
      ...vocab.activities,
      ...vocab.relatedFields,
    ];
    if (countHits(descLower, allKeywords) >= DESCRIPTION_SIGNAL_MIN) return true;
  }

  return false;
}

/**
 * True when the title or company mentions one of the user's excluded keywords.
 */
export function isExcluded(
  listing: { title?: string | null; company?: string | null },
  excludeKeywords: readonly string[]
): boolean {
  if (excludeKeywords.length === 0) return false;
  const text = `${listing.title ?? ''} ${listing.company ?? ''}`.toLowerCase();
  return excludeKeywords.some(keyword => keyword && text.includes(keyword.toLowerCase()));
}
