import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { Config } from '../config';
import type { JobFileStore } from '../db';
import type { SalaryEstimator } from '../scorer/salary';
import type { CancellationFlag } from '../scrapers/guard';
import type { RunOptions, RunResult } from '../scrapers/runner';
import { SITE_ORDER } from '../scrapers/types';
import type { JobRecord, SiteName } from '../scrapers/types';
import type { ScrapeWorker } from '../scrapers/worker';
import type { Logger } from '../utils/logger';
import { DATE_WINDOWS, SORT_KEYS, filterJobs, jobStats, sortJobs, toCsv } from '../views/jobs';

export interface JobRouteDeps {
  config: Config;
  store: JobFileStore;
  worker: ScrapeWorker;
  estimator: SalaryEstimator;
  logger: Logger;
  /** Runs one scrape to completion; started in the background by the worker. */
  scrape: (options: RunOptions, maxRuntimeMs: number, flag: CancellationFlag) => Promise<RunResult>;
}

// Background scrapes get an hour unless the request sets timeoutSeconds.
const API_MAX_RUNTIME_MS = 3_600_000;

const siteSchema = z.enum(['indeed', 'apec', 'linkedin', 'wttj']) satisfies z.ZodType<SiteName>;

const listQuerySchema = z.object({
  search: z.string().optional(),
  window: z.enum(DATE_WINDOWS).optional(),
  sort: z.enum(SORT_KEYS).optional(),
  order: z.enum(['asc', 'desc']).optional(),
});

const scrapeBodySchema = z
  .object({
    location: z.string().trim().min(1).optional(),
    queryFr: z.string().trim().min(1).optional(),
    queryEn: z.string().trim().min(1).optional(),
    maxPages: z.number().int().positive().max(50).optional(),
    sites: z.array(siteSchema).min(1).optional(),
    additionalTerms: z.array(z.string().trim().min(1)).optional(),
    excludeKeywords: z.array(z.string().trim().min(1)).optional(),
    report: z.boolean().optional(),
    timeoutSeconds: z.number().positive().optional(),
  })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function createJobRouter(deps: JobRouteDeps): Router {
  const { config, store, worker, estimator, logger } = deps;
  const router = Router();
  // Set while salary estimates are being written back to the output file.
  let estimating = false;

  async function loadJobs(): Promise<JobRecord[]> {
    if (!(await store.exists(config.output))) return [];
    return store.load(config.output);
  }

  async function listedJobs(query: Request['query']): Promise<JobRecord[] | z.ZodError> {
    const parsed = listQuerySchema.safeParse(query);
    if (!parsed.success) return parsed.error;
    const { search, window, sort, order } = parsed.data;
    const filtered = filterJobs(await loadJobs(), { text: search, window });
    return sortJobs(filtered, { key: sort ?? 'scraped_date', ascending: order === 'asc' });
  }

  // GET /api/jobs/stats
  router.get('/jobs/stats', async (_req: Request, res: Response) => {
    try {
      const stats = jobStats(await loadJobs());
      res.json({ success: true, ...stats });
    } catch (error) {
      logger.error('Stats error', error);
      res.status(500).json({ success: false, error: 'Failed to get stats' });
    }
  });

  // GET /api/jobs/export.csv - same filters as the list
  router.get('/jobs/export.csv', async (req: Request, res: Response) => {
    try {
      const jobs = await listedJobs(req.query);
      if (jobs instanceof z.ZodError) {
        res.status(400).json({ success: false, error: describeIssues(jobs) });
        return;
      }
      res.type('text/csv').attachment('jobs.csv').send(toCsv(jobs));
    } catch (error) {
      logger.error('Export error', error);
      res.status(500).json({ success: false, error: 'Failed to export jobs' });
    }
  });

  // GET /api/jobs - filtered and sorted list
  router.get('/jobs', async (req: Request, res: Response) => {
    try {
      const jobs = await listedJobs(req.query);
      if (jobs instanceof z.ZodError) {
        res.status(400).json({ success: false, error: describeIssues(jobs) });
        return;
      }
      res.json({ success: true, total: jobs.length, jobs });
    } catch (error) {
      logger.error('Jobs list error', error);
      res.status(500).json({ success: false, error: 'Failed to list jobs' });
    }
  });

  // POST /api/jobs/scrape - start a background scrape
  router.post('/jobs/scrape', (req: Request, res: Response) => {
    const parsed = scrapeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ success: false, error: describeIssues(parsed.error) });
      return;
    }

    const body = parsed.data;
    const options: RunOptions = {
      output: config.output,
      location: body.location ?? config.location,
      queryFr: body.queryFr ?? config.queryFr,
      queryEn: body.queryEn ?? config.queryEn,
      maxPages: body.maxPages ?? config.maxPages,
      additionalTerms: body.additionalTerms ?? config.additionalTerms,
      excludeKeywords: body.excludeKeywords ?? config.excludeKeywords,
      sites: SITE_ORDER.filter(site => (body.sites ?? config.sites).includes(site)),
      report: body.report ?? config.report,
    };
    const maxRuntimeMs = body.timeoutSeconds !== undefined ? body.timeoutSeconds * 1000 : API_MAX_RUNTIME_MS;

    if (estimating) {
      res.status(409).json({ success: false, error: 'Salary estimation is running' });
      return;
    }
    const runId = worker.start(flag => deps.scrape(options, maxRuntimeMs, flag));
    if (!runId) {
      res.status(409).json({ success: false, error: 'A scrape is already running' });
      return;
    }
    res.status(202).json({ success: true, runId, sites: options.sites });
  });

  // POST /api/jobs/scrape/stop
  router.post('/jobs/scrape/stop', (_req: Request, res: Response) => {
    if (!worker.stop()) {
      res.status(409).json({ success: false, error: 'No scrape is running' });
      return;
    }
    res.json({ success: true, ...worker.status });
  });

  // GET /api/jobs/scrape/status
  router.get('/jobs/scrape/status', (_req: Request, res: Response) => {
    res.json({ success: true, ...worker.status });
  });

  // POST /api/jobs/estimate-salaries - fill in missing estimates and save them
  router.post('/jobs/estimate-salaries', async (_req: Request, res: Response) => {
    if (!estimator.available) {
      res.status(503).json({ success: false, error: 'OPENAI_API_KEY is not configured' });
      return;
    }
    if (worker.running) {
      res.status(409).json({ success: false, error: 'A scrape is running' });
      return;
    }
    if (estimating) {
      res.status(409).json({ success: false, error: 'Salary estimation is already running' });
      return;
    }

    estimating = true;
    try {
      const { jobs, estimated } = await estimator.estimateAll(await loadJobs());
      await store.save(config.output, jobs);
      res.json({ success: true, estimated, total: jobs.length });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Salary estimate error', error);
      res.status(500).json({ success: false, error: message });
    } finally {
      estimating = false;
    }
  });

  return router;
}
