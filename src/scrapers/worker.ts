import { v4 as uuidv4 } from 'uuid';
import { CancellationFlag } from './guard';
import type { RunResult, RunStatus } from './runner';
import type { Logger } from '../utils/logger';

export type WorkerState = 'idle' | 'running' | RunStatus | 'failed';

export interface WorkerStatus {
  runId: string | null;
  state: WorkerState;
  startedAt?: string;
  finishedAt?: string;
  jobsCollected?: number;
  perSite?: RunResult['perSite'];
  error?: string;
}

export type ScrapeTask = (flag: CancellationFlag) => Promise<RunResult>;

/** Runs at most one scrape at a time in the background and remembers how the last one ended. */
export class ScrapeWorker {
  private current: WorkerStatus = { runId: null, state: 'idle' };
  private flag: CancellationFlag | null = null;
  private task: Promise<void> = Promise.resolve();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  get status(): WorkerStatus {
    return { ...this.current };
  }

  get running(): boolean {
    return this.current.state === 'running';
  }

  /** Starts `run` unless a scrape is already running; returns the new run id, or null. */
  start(run: ScrapeTask): string | null {
    if (this.running) return null;

    const runId = uuidv4();
    const flag = new CancellationFlag();
    this.flag = flag;
    this.current = { runId, state: 'running', startedAt: this.now().toISOString() };
    this.logger.info(`Scrape ${runId} started`);

    this.task = run(flag).then(
      result => {
        this.current = {
          ...this.current,
          state: result.status,
          finishedAt: this.now().toISOString(),
          jobsCollected: result.jobs.length,
          perSite: result.perSite,
        };
        this.logger.info(`Scrape ${runId} ${result.status} with ${result.jobs.length} jobs`);
      },
      (error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.current = { ...this.current, state: 'failed', finishedAt: this.now().toISOString(), error: message };
        this.logger.error(`Scrape ${runId} failed`, error);
      }
    );

    return runId;
  }

  /** Asks the running scrape to stop at its next check; false when nothing is running. */
  stop(): boolean {
    if (!this.running || !this.flag) return false;
    this.flag.cancel();
    this.logger.info(`Stop requested for scrape ${this.current.runId ?? ''}`);
    return true;
  }

  /** Resolves once the current background scrape has settled. */
  wait(): Promise<void> {
    return this.task;
  }
}
