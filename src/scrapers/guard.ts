import type { Logger } from '../utils/logger';

export type StopReason = 'cancelled' | 'timeout' | 'stalled';

const STALL_MS = 120_000;

/** Cooperative cancellation: set once, polled between units of work. */
export class CancellationFlag {
  private isSet = false;

  get cancelled(): boolean {
    return this.isSet;
  }

  cancel(): void {
    this.isSet = true;
  }
}

/**
 * Signal handler for a running scrape: the first signal cancels the flag, a second one exits
 * with status 130.
 */
export function interruptHandler(
  flag: CancellationFlag,
  logger: Logger,
  exit: (code: number) => void
): (signal: NodeJS.Signals) => void {
  return signal => {
    if (flag.cancelled) {
      logger.warn(`Received ${signal} again, exiting now`);
      exit(130);
      return;
    }
    logger.warn(`Received ${signal} signal. Stopping scraper gracefully... (repeat to force exit)`);
    flag.cancel();
  };
}

export interface RunGuardOptions {
  maxRuntimeMs: number;
  stallMs?: number;
  flag?: CancellationFlag;
  now?: () => number;
  logger: Logger;
}

/**
 * Decides when a scrape should stop early: on cancellation, when the runtime budget is
 * spent, or when the job count has not moved for two minutes.
 */
export class RunGuard {
  readonly flag: CancellationFlag;
  private readonly now: () => number;
  private readonly startedAt: number;
  private lastCount: number | null = null;
  private lastProgressAt = 0;

  constructor(private readonly options: RunGuardOptions) {
    this.flag = options.flag ?? new CancellationFlag();
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  get cancelled(): boolean {
    return this.flag.cancelled;
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  expired(): boolean {
    return this.elapsedMs() > this.options.maxRuntimeMs;
  }

  /** Restarts the stall clock, so a stall on one site does not stop the next. */
  resetProgress(jobCount: number): void {
    this.lastCount = jobCount;
    this.lastProgressAt = this.now();
  }

  check(jobCount: number): StopReason | null {
    const now = this.now();
    const { logger } = this.options;

    if (this.expired()) {
      logger.warn(`Running for more than ${Math.round(this.options.maxRuntimeMs / 1000)}s, stopping`);
      return 'timeout';
    }

    if (this.flag.cancelled) {
      logger.warn('Scrape cancelled, stopping');
      return 'cancelled';
    }

    if (this.lastCount === null || jobCount !== this.lastCount) {
      this.lastCount = jobCount;
      this.lastProgressAt = now;
      return null;
    }

    if (now - this.lastProgressAt > (this.options.stallMs ?? STALL_MS)) {
      logger.warn('No new jobs for a while, moving on');
      return 'stalled';
    }

    return null;
  }
}
