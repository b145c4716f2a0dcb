import { describe, expect, it, vi } from 'vitest';
import { CancellationFlag, interruptHandler, RunGuard } from './guard';
import { silentLogger } from '../utils/logger';

function clock(start = 0) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe('RunGuard', () => {
  it('keeps going while jobs keep arriving', () => {
    const { now, advance } = clock();
    const guard = new RunGuard({ maxRuntimeMs: 300_000, now, logger: silentLogger });

    expect(guard.check(0)).toBeNull();
    advance(100_000);
    expect(guard.check(3)).toBeNull();
    advance(100_000);
    expect(guard.check(5)).toBeNull();
  });

  it('reports a stall after two minutes without new jobs', () => {
    const { now, advance } = clock();
    const guard = new RunGuard({ maxRuntimeMs: 600_000, now, logger: silentLogger });

    expect(guard.check(4)).toBeNull();
    advance(120_000);
    expect(guard.check(4)).toBeNull();
    advance(1);
    expect(guard.check(4)).toBe('stalled');

    guard.resetProgress(4);
    expect(guard.check(4)).toBeNull();
  });

  it('reports a timeout once the runtime budget is spent', () => {
    const { now, advance } = clock(1_000);
    const guard = new RunGuard({ maxRuntimeMs: 5_000, now, logger: silentLogger });

    advance(5_000);
    expect(guard.expired()).toBe(false);
    advance(1);
    expect(guard.expired()).toBe(true);
    expect(guard.check(10)).toBe('timeout');
    expect(guard.elapsedMs()).toBe(5_001);
  });

  it('reports cancellation through a shared flag', () => {
    const flag = new CancellationFlag();
    const guard = new RunGuard({ maxRuntimeMs: 5_000, flag, now: () => 0, logger: silentLogger });

    expect(guard.cancelled).toBe(false);
    flag.cancel();
    expect(guard.cancelled).toBe(true);
    expect(guard.check(0)).toBe('cancelled');
  });
});

describe('interruptHandler', () => {
  it('cancels on the first signal and exits on the second', () => {
    const flag = new CancellationFlag();
    const exit = vi.fn<(code: number) => void>();
    const onSignal = interruptHandler(flag, silentLogger, exit);

    onSignal('SIGINT');
    expect(flag.cancelled).toBe(true);
    expect(exit).not.toHaveBeenCalled();

    onSignal('SIGINT');
    expect(exit).toHaveBeenCalledWith(130);
  });
});
