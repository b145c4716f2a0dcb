import type { Logger } from '../utils/logger';

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:122.0) Gecko/20100101 Firefox/122.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8';
const HTML_ACCEPT_ALT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
export const FRENCH_LANGUAGE = 'fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpError';
  }
}

export interface RetryOptions {
  maxRetries?: number;
  backoffMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Calls `fn` up to `maxRetries` times, waiting backoffMs, 2·backoffMs, ... between attempts.
 * The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = Math.max(1, options.maxRetries ?? 3);
  const backoffMs = options.backoffMs ?? 1000;
  const wait = options.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < maxRetries - 1) {
        const delay = backoffMs * Math.pow(2, attempt);
        options.logger?.warn(`Attempt ${attempt + 1} failed, retrying in ${delay}ms...`, {
          error: error instanceof Error ? error.message : String(error),
        });
        await wait(delay);
      }
    }
  }
  throw lastError;
}

export class UserAgentRotator {
  constructor(
    private readonly random: () => number = Math.random,
    private readonly agents: readonly string[] = USER_AGENTS
  ) {}

  next(): string {
    const index = Math.min(this.agents.length - 1, Math.floor(this.random() * this.agents.length));
    return this.agents[index];
  }
}

/** The part of a fetch Response the client reads. */
export interface FetchResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: { headers: Record<string, string>; signal?: AbortSignal }) => Promise<FetchResponse>;

export interface HttpClientOptions {
  minDelayMs: number;
  maxDelayMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  backoffMs?: number;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  logger: Logger;
}

export interface GetOptions {
  accept?: string;
  acceptLanguage?: string;
  referer?: string;
}

/**
 * GET-only client for listing pages. Each request gets a fresh User-Agent and is retried with
 * exponential backoff; `pause()` spaces requests out by a random delay.
 */
export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly agents: UserAgentRotator;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.agents = new UserAgentRotator(this.random);
  }

  buildHeaders(options: GetOptions = {}): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.agents.next(),
      Accept: options.accept ?? (this.random() > 0.5 ? HTML_ACCEPT_ALT : HTML_ACCEPT),
      'Accept-Language': options.acceptLanguage ?? 'en-US,en;q=0.5',
    };
    if (options.referer) headers.Referer = options.referer;
    return headers;
  }

  async get(url: string, options: GetOptions = {}): Promise<string> {
    return withRetry(
      async () => {
        const response = await this.fetchImpl(url, {
          headers: this.buildHeaders(options),
          signal: AbortSignal.timeout(this.options.requestTimeoutMs),
        });
        if (!response.ok) throw new HttpError(response.status, url);
        return response.text();
      },
      {
        maxRetries: this.options.maxRetries,
        backoffMs: this.options.backoffMs,
        sleep: this.sleep,
        logger: this.options.logger,
      }
    );
  }

  /** Waits a random time between the configured minimum and maximum delay. */
  async pause(): Promise<void> {
    const { minDelayMs, maxDelayMs } = this.options;
    const delay = minDelayMs + this.random() * Math.max(0, maxDelayMs - minDelayMs);
    await this.sleep(Math.round(delay));
  }
}
