import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { JobFileStore } from './db';
import { createSalaryEstimator } from './scorer/salary';
import { createRunnerDeps, runScrape } from './scrapers/runner';
import { ScrapeWorker } from './scrapers/worker';
import { createLogger } from './utils/logger';

const logger = createLogger('Jobs');
const config = loadConfig();
const store = new JobFileStore(process.cwd(), logger.child('Store'));
const runnerLogger = logger.child('Runner');

const app = createApp({
  config,
  store,
  worker: new ScrapeWorker(logger.child('Worker')),
  estimator: createSalaryEstimator(config.openaiApiKey, config.location, logger.child('Salary')),
  logger: logger.child('API'),
  scrape: (options, maxRuntimeMs, flag) =>
    runScrape(options, createRunnerDeps({ ...config, maxRuntimeMs }, store, runnerLogger, flag)),
});

app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
});
