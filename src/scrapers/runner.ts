import { ApecAdapter } from './apec';
import { isoDate, JobCollection } from './collection';
import { RunGuard } from './guard';
import type { CancellationFlag } from './guard';
import { HttpClient } from './http';
import { IndeedAdapter } from './indeed';
import { LinkedInAdapter } from './linkedin';
import { SITE_ORDER } from './types';
import type { JobRecord, ScrapeContext, ScrapeOptions, ScraperAdapter, SiteName } from './types';
import { WttjAdapter } from './wttj';
import { errorName, failsafeName, interruptedName } from '../db';
import type { JobFileStore } from '../db';
import type { Config } from '../config';
import type { Logger } from '../utils/logger';
import { buildReport, reportName, shouldWriteReport } from '../views/report';

const adapters: Record<SiteName, () => ScraperAdapter> = {
  indeed: () => new IndeedAdapter(),
  apec: () => new ApecAdapter(),
  linkedin: () => new LinkedInAdapter(),
  wttj: () => new WttjAdapter(),
};

export interface RunOptions extends ScrapeOptions {
  output: string;
  sites: readonly SiteName[];
  excludeKeywords: string[];
  report: boolean;
}

export interface RunnerDeps {
  store: JobFileStore;
  http: HttpClient;
  guard: RunGuard;
  logger: Logger;
  adapters?: Partial<Record<SiteName, ScraperAdapter>>;
  now?: () => Date;
}

export type RunStatus = 'completed' | 'timeout' | 'interrupted';

export interface RunResult {
  status: RunStatus;
  jobs: readonly JobRecord[];
  perSite: Partial<Record<SiteName, number>>;
  duplicatesRemoved: number;
  /** File the jobs were written to: the output, or the interrupted_ file on cancel. */
  savedTo: string;
  reportPath?: string;
  runtimeMs: number;
}

export function runOptionsFromConfig(config: Config): RunOptions {
  return {
    output: config.output,
    location: config.location,
    queryFr: config.queryFr,
    queryEn: config.queryEn,
    maxPages: config.maxPages,
    additionalTerms: config.additionalTerms,
    excludeKeywords: config.excludeKeywords,
    sites: config.sites,
    report: config.report,
  };
}

/** Builds the HTTP client and run guard a scrape needs from the configuration. */
export function createRunnerDeps(
  config: Config,
  store: JobFileStore,
  logger: Logger,
  flag?: CancellationFlag
): RunnerDeps {
  return {
    store,
    logger,
    http: new HttpClient({
      minDelayMs: config.minDelayMs,
      maxDelayMs: config.maxDelayMs,
      requestTimeoutMs: config.requestTimeoutMs,
      maxRetries: config.retries,
      logger: logger.child('Http'),
    }),
    guard: new RunGuard({ maxRuntimeMs: config.maxRuntimeMs, flag, logger: logger.child('Guard') }),
  };
}

function adapterFor(site: SiteName, deps: RunnerDeps): ScraperAdapter {
  return deps.adapters?.[site] ?? adapters[site]();
}

async function restoreFailsafe(collection: JobCollection, file: string, deps: RunnerDeps): Promise<void> {
  if (!(await deps.store.exists(file))) return;
  try {
    const jobs = await deps.store.load(file);
    collection.restore(jobs);
    deps.logger.info(`Loaded ${jobs.length} jobs from failsafe file`);
  } catch (error) {
    deps.logger.error('Error loading failsafe file', error);
  }
}

/**
 * Scrapes each enabled site in order into one collection, backing it up after every site.
 *
 * A cancelled run saves what it has to `interrupted_<output>`; an unexpected error saves to
 * `error_<output>` and rethrows. Otherwise the final dedup pass runs, the output is written,
 * the failsafe backup is removed and old interrupted files are cleaned up.
 */
export async function runScrape(options: RunOptions, deps: RunnerDeps): Promise<RunResult> {
  const { store, guard, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const collection = new JobCollection({
    defaultLocation: options.location,
    excludeKeywords: options.excludeKeywords,
    today: () => isoDate(now()),
  });
  const failsafe = failsafeName(options.output);
  const perSite: Partial<Record<SiteName, number>> = {};

  await restoreFailsafe(collection, failsafe, deps);

  try {
    let timedOut = false;

    for (const site of SITE_ORDER) {
      if (!options.sites.includes(site)) continue;
      if (guard.cancelled) break;
      if (guard.expired()) {
        logger.warn(`Maximum runtime reached, skipping ${site} and the remaining sites`);
        timedOut = true;
        break;
      }

      guard.resetProgress(collection.size);
      const ctx: ScrapeContext = {
        http: deps.http,
        collection,
        guard,
        logger: logger.child(site),
        options,
      };

      try {
        logger.info(`Starting scrape for ${site}...`);
        perSite[site] = await adapterFor(site, deps).scrape(ctx);
      } catch (error) {
        logger.error(`${site} failed`, error);
        perSite[site] = 0;
      }

      await store.save(failsafe, collection.jobs);
    }

    if (guard.cancelled) {
      const savedTo = interruptedName(options.output);
      await store.save(savedTo, collection.jobs);
      logger.warn(`Job scraping interrupted, saved ${collection.size} jobs to ${savedTo}`);
      return {
        status: 'interrupted',
        jobs: collection.jobs,
        perSite,
        duplicatesRemoved: 0,
        savedTo,
        runtimeMs: guard.elapsedMs(),
      };
    }

    const duplicatesRemoved = collection.finalize();
    logger.info(`Removed ${duplicatesRemoved} duplicate jobs`);

    await store.save(options.output, collection.jobs);
    if (await store.exists(failsafe)) {
      await store.remove(failsafe);
      logger.info(`Removed temporary failsafe file: ${failsafe}`);
    }

    try {
      await store.cleanupInterrupted(7, now().getTime());
    } catch (error) {
      logger.warn('Failed to clean up old interrupted files', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const runtimeMs = guard.elapsedMs();
    let reportPath: string | undefined;
    if (shouldWriteReport(options.report, collection.size)) {
      reportPath = reportName(options.output);
      await store.writeText(reportPath, buildReport(collection.jobs, runtimeMs, now()));
      logger.info(`Generated summary report: ${reportPath}`);
    }

    logger.info(`Job scraping completed. Total jobs collected: ${collection.size}`);
    logger.info(`Total runtime: ${(runtimeMs / 1000).toFixed(2)} seconds`);

    return {
      status: timedOut || guard.expired() ? 'timeout' : 'completed',
      jobs: collection.jobs,
      perSite,
      duplicatesRemoved,
      savedTo: options.output,
      reportPath,
      runtimeMs,
    };
  } catch (error) {
    const savedTo = errorName(options.output);
    logger.error('Error during scraping', error);
    await store.save(savedTo, collection.jobs);
    logger.info(`Saved ${collection.size} jobs to ${savedTo}`);
    throw error;
  }
}
