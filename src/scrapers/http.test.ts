import { describe, expect, it, vi } from 'vitest';
import { HttpClient, HttpError, UserAgentRotator, withRetry } from './http';
import type { FetchLike, FetchResponse } from './http';
import { silentLogger } from '../utils/logger';

function response(status: number, body = ''): FetchResponse {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

describe('withRetry', () => {
  it('backs off exponentially between failed attempts', async () => {
    const delays: number[] = [];
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('reset'))
      .mockRejectedValueOnce(new Error('reset'))
      .mockResolvedValue('ok');

    const result = await withRetry(fn, { maxRetries: 3, backoffMs: 1000, sleep: async ms => void delays.push(ms) });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const delays: number[] = [];
    let attempt = 0;
    const fn = async () => {
      attempt++;
      throw new Error(`failure ${attempt}`);
    };

    await expect(withRetry(fn, { maxRetries: 3, backoffMs: 500, sleep: async ms => void delays.push(ms) })).rejects.toThrow(
      'failure 3'
    );
    expect(delays).toEqual([500, 1000]);
  });
});

describe('UserAgentRotator', () => {
  it('picks an agent from the random value', () => {
    expect(new UserAgentRotator(() => 0.6, ['a', 'b']).next()).toBe('b');
    expect(new UserAgentRotator(() => 0, ['a', 'b']).next()).toBe('a');
  });
});

describe('HttpClient', () => {
  function client(fetch: FetchLike, sleep = vi.fn(async (_ms: number) => {})) {
    return {
      sleep,
      http: new HttpClient({
        minDelayMs: 1000,
        maxDelayMs: 3000,
        requestTimeoutMs: 5000,
        maxRetries: 3,
        fetch,
        sleep,
        random: () => 0.5,
        logger: silentLogger,
      }),
    };
  }

  it('retries failed requests and returns the body', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(response(503))
      .mockResolvedValueOnce(response(200, '<html>ok</html>'));
    const { http, sleep } = client(fetch);

    await expect(http.get('https://example.test/jobs')).resolves.toBe('<html>ok</html>');
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('throws an HttpError after the last failed attempt', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(response(404));
    const { http } = client(fetch);

    const error = await http.get('https://example.test/missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 404, url: 'https://example.test/missing' });
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('sends browser-like headers', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(response(200));
    const { http } = client(fetch);

    await http.get('https://example.test/jobs', { referer: 'https://example.test/', acceptLanguage: 'fr-FR' });

    const headers = fetch.mock.calls[0][1].headers;
    expect(headers.Referer).toBe('https://example.test/');
    expect(headers['Accept-Language']).toBe('fr-FR');
    expect(headers.Accept).toBe('text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8');
    expect(headers['User-Agent']).toMatch(/^Mozilla\/5\.0/);
  });

  it('pauses for a random delay between the bounds', async () => {
    const { http, sleep } = client(vi.fn<FetchLike>());

    await http.pause();

    expect(sleep).toHaveBeenCalledWith(2000);
  });
});
