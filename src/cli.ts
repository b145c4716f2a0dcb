import dotenv from 'dotenv';
dotenv.config();

import { applyFlags, loadConfig, parseArgs, positiveInteger, UsageError } from './config';
import type { ParsedArgs } from './config';
import { JobFileStore } from './db';
import { createSalaryEstimator } from './scorer/salary';
import { dedupeRecords } from './scrapers/dedup';
import { CancellationFlag, interruptHandler } from './scrapers/guard';
import { createRunnerDeps, runOptionsFromConfig, runScrape } from './scrapers/runner';
import { createLogger } from './utils/logger';
import { DATE_WINDOWS, SORT_KEYS, filterJobs, jobStats, sortJobs, toCsv } from './views/jobs';
import type { DateWindow, SortKey } from './views/jobs';

const logger = createLogger('Cli');
const USAGE = `
Usage:
  tsx src/cli.ts scrape [options]        Scrape all enabled sites into the output file
      --output <file>  --location <city>  --query-fr <q>  --query-en <q>  --pages <n>
      --min-delay <s>  --max-delay <s>  --timeout <s>  --req-timeout <s>  --retries <n>
      --additional-terms <a,b>  --exclude <a,b>  --report
      --skip-indeed  --skip-apec  --skip-linkedin  --skip-wttj  --all-sites
  tsx src/cli.ts dedupe [file]           Remove duplicates from a saved job file
  tsx src/cli.ts stats [file]            Show totals, sources and common title words
  tsx src/cli.ts list [file]             Print jobs (--search <text> --window <${DATE_WINDOWS.join('|')}>
                                         --sort <${SORT_KEYS.join('|')}> --desc --limit <n>)
  tsx src/cli.ts export [file] --csv <out.csv>   Write jobs as CSV
  tsx src/cli.ts estimate [file]         Estimate salaries with OpenAI (needs OPENAI_API_KEY)
`;

function isWindow(value: string): value is DateWindow {
  return DATE_WINDOWS.some(window => window === value);
}

function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some(key => key === value);
}

function targetFile(args: ParsedArgs, fallback: string): string {
  return args.positionals[0] ?? args.values.get('output') ?? fallback;
}

async function main() {
  const [command, ...rest] = process.argv.slice(2);
  const args = parseArgs(rest);
  const config = applyFlags(loadConfig(), args);
  const store = new JobFileStore(process.cwd(), logger.child('Store'));

  switch (command) {
    case 'scrape': {
      const flag = new CancellationFlag();
      const onSignal = interruptHandler(flag, logger, code => process.exit(code));
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      try {
        const result = await runScrape(
          runOptionsFromConfig(config),
          createRunnerDeps(config, store, createLogger('Runner'), flag)
        );
        console.log(
          '\nResult:',
          JSON.stringify(
            {
              status: result.status,
              jobs: result.jobs.length,
              perSite: result.perSite,
              duplicatesRemoved: result.duplicatesRemoved,
              savedTo: result.savedTo,
              report: result.reportPath,
            },
            null,
            2
          )
        );
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
      break;
    }

    case 'dedupe': {
      const file = targetFile(args, config.output);
      const { jobs, removed } = dedupeRecords(await store.load(file));
      await store.save(file, jobs);
      console.log(`\nRemoved ${removed} duplicates, ${jobs.length} jobs left in ${file}.`);
      break;
    }

    case 'stats': {
      const stats = jobStats(await store.load(targetFile(args, config.output)));
      console.log('\nStats:', JSON.stringify(stats, null, 2));
      break;
    }

    case 'list': {
      const window = args.values.get('window') ?? 'any';
      const sort = args.values.get('sort') ?? 'scraped_date';
      if (!isWindow(window)) throw new UsageError(`--window must be one of ${DATE_WINDOWS.join(', ')}`);
      if (!isSortKey(sort)) throw new UsageError(`--sort must be one of ${SORT_KEYS.join(', ')}`);
      const limitFlag = args.values.get('limit');
      const limit = limitFlag === undefined ? undefined : positiveInteger('limit', limitFlag);

      const jobs = sortJobs(
        filterJobs(await store.load(targetFile(args, config.output)), { text: args.values.get('search'), window }),
        { key: sort, ascending: !args.switches.has('desc') }
      ).slice(0, limit);

      for (const job of jobs) {
        const salary = job.estimated_salary ? `  ~${job.estimated_salary} EUR` : '';
        console.log(`${job.scraped_date}  [${job.source}]  ${job.title} - ${job.company} (${job.location})${salary}`);
        if (job.url) console.log(`    ${job.url}`);
      }
      console.log(`\n${jobs.length} jobs.`);
      break;
    }

    case 'export': {
      const out = args.values.get('csv');
      if (!out) throw new UsageError('export needs --csv <file>');
      const jobs = await store.load(targetFile(args, config.output));
      await store.writeText(out, toCsv(jobs));
      console.log(`\nExported ${jobs.length} jobs to ${out}.`);
      break;
    }

    case 'estimate': {
      const file = targetFile(args, config.output);
      const estimator = createSalaryEstimator(config.openaiApiKey, config.location, createLogger('Salary'));
      if (!estimator.available) throw new UsageError('OPENAI_API_KEY is required for salary estimates');
      const { jobs, estimated } = await estimator.estimateAll(await store.load(file));
      await store.save(file, jobs);
      console.log(`\nEstimated ${estimated} salaries in ${file}.`);
      break;
    }

    default:
      console.log(USAGE);
  }
}

main().catch(err => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    console.log(USAGE);
    process.exit(2);
  }
  console.error('Error:', err);
  process.exit(1);
});
