/**
 * Configuration: environment variables (loaded from .env by the entry points), overridden by
 * command-line flags.
 */
import { z } from 'zod';
import { SITE_ORDER } from './scrapers/types';
import type { SiteName } from './scrapers/types';

export interface Config {
  output: string;
  location: string;
  queryFr: string;
  queryEn: string;
  maxPages: number;
  minDelayMs: number;
  maxDelayMs: number;
  maxRuntimeMs: number;
  requestTimeoutMs: number;
  retries: number;
  additionalTerms: string[];
  excludeKeywords: string[];
  sites: SiteName[];
  report: boolean;
  openaiApiKey?: string;
  port: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const text = (fallback: string) => z.string().trim().min(1).catch(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().catch(fallback);

const envSchema = z.object({
  SCRAPER_OUTPUT: text('real_estate_jobs_paris.json'),
  SCRAPER_LOCATION: text('Paris'),
  SCRAPER_QUERY_FR: text('immobilier'),
  SCRAPER_QUERY_EN: text('real estate'),
  SCRAPER_MAX_PAGES: positiveInt(5),
  SCRAPER_MIN_DELAY_MS: nonNegativeInt(1500),
  SCRAPER_MAX_DELAY_MS: nonNegativeInt(4000),
  SCRAPER_MAX_RUNTIME_MS: positiveInt(300_000),
  SCRAPER_REQUEST_TIMEOUT_MS: positiveInt(30_000),
  SCRAPER_RETRIES: positiveInt(3),
  OPENAI_API_KEY: z.string().optional(),
  PORT: positiveInt(3001),
});

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);
  return {
    output: parsed.SCRAPER_OUTPUT,
    location: parsed.SCRAPER_LOCATION,
    queryFr: parsed.SCRAPER_QUERY_FR,
    queryEn: parsed.SCRAPER_QUERY_EN,
    maxPages: parsed.SCRAPER_MAX_PAGES,
    minDelayMs: parsed.SCRAPER_MIN_DELAY_MS,
    maxDelayMs: Math.max(parsed.SCRAPER_MIN_DELAY_MS, parsed.SCRAPER_MAX_DELAY_MS),
    maxRuntimeMs: parsed.SCRAPER_MAX_RUNTIME_MS,
    requestTimeoutMs: parsed.SCRAPER_REQUEST_TIMEOUT_MS,
    retries: parsed.SCRAPER_RETRIES,
    additionalTerms: [],
    excludeKeywords: [],
    sites: [...SITE_ORDER],
    report: false,
    openaiApiKey: parsed.OPENAI_API_KEY || undefined,
    port: parsed.PORT,
  };
}

// --- Command-line flags ---

type FlagKind = 'value' | 'switch';

const FLAGS: Record<string, FlagKind> = {
  output: 'value',
  location: 'value',
  'query-fr': 'value',
  'query-en': 'value',
  pages: 'value',
  'min-delay': 'value',
  'max-delay': 'value',
  timeout: 'value',
  'req-timeout': 'value',
  retries: 'value',
  'additional-terms': 'value',
  exclude: 'value',
  'skip-indeed': 'switch',
  'skip-apec': 'switch',
  'skip-linkedin': 'switch',
  'skip-wttj': 'switch',
  'all-sites': 'switch',
  report: 'switch',
  search: 'value',
  window: 'value',
  sort: 'value',
  desc: 'switch',
  limit: 'value',
  csv: 'value',
};

export interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

/** Accepts `--name value` and `--name=value`; unknown flags are a UsageError. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const kind = FLAGS[name];
    if (!kind) throw new UsageError(`Unknown option --${name}`);

    if (kind === 'switch') {
      if (eq >= 0) throw new UsageError(`Option --${name} takes no value`);
      parsed.switches.add(name);
      continue;
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith('--')) throw new UsageError(`Option --${name} needs a value`);
    parsed.values.set(name, value);
  }

  return parsed;
}

function seconds(name: string, value: string, allowZero: boolean): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || (!allowZero && parsed === 0)) {
    throw new UsageError(`--${name} expects a ${allowZero ? 'non-negative' : 'positive'} number of seconds`);
  }
  return Math.round(parsed * 1000);
}

export function positiveInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) throw new UsageError(`--${name} expects a positive integer`);
  return parsed;
}

/** Returns a copy of `config` with the scrape-related flags applied. */
export function applyFlags(config: Config, args: ParsedArgs): Config {
  const next: Config = { ...config, sites: [...config.sites] };
  const value = (name: string) => args.values.get(name);

  next.output = value('output') ?? next.output;
  next.location = value('location') ?? next.location;
  next.queryFr = value('query-fr') ?? next.queryFr;
  next.queryEn = value('query-en') ?? next.queryEn;

  const pages = value('pages');
  if (pages !== undefined) next.maxPages = positiveInteger('pages', pages);
  const retries = value('retries');
  if (retries !== undefined) next.retries = positiveInteger('retries', retries);

  const minDelay = value('min-delay');
  if (minDelay !== undefined) next.minDelayMs = seconds('min-delay', minDelay, true);
  const maxDelay = value('max-delay');
  if (maxDelay !== undefined) next.maxDelayMs = seconds('max-delay', maxDelay, true);
  if (next.maxDelayMs < next.minDelayMs) {
    throw new UsageError('--max-delay must not be lower than --min-delay');
  }

  const timeout = value('timeout');
  if (timeout !== undefined) next.maxRuntimeMs = seconds('timeout', timeout, false);
  const reqTimeout = value('req-timeout');
  if (reqTimeout !== undefined) next.requestTimeoutMs = seconds('req-timeout', reqTimeout, false);

  const terms = value('additional-terms');
  if (terms !== undefined) next.additionalTerms = parseList(terms);
  const exclude = value('exclude');
  if (exclude !== undefined) next.excludeKeywords = parseList(exclude);

  if (!args.switches.has('all-sites')) {
    next.sites = next.sites.filter(site => !args.switches.has(`skip-${site}`));
  } else {
    next.sites = [...SITE_ORDER];
  }

  if (args.switches.has('report')) next.report = true;
  return next;
}
