import { describe, it, expect } from 'vitest';
import {
  KeyedMutex,
  TimeoutError,
  computeJobId,
  mapSettledWithConcurrency,
  withTimeout,
} from '@jobscope/core';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('computeJobId', () => {
  it('is the first twelve hex digits of the md5 of the trimmed source', () => {
    expect(computeJobId('abc')).toBe('900150983cd2');
    expect(computeJobId('  abc \n')).toBe('900150983cd2');
  });

  it('differs between sources', () => {
    expect(computeJobId('postings/a.html')).not.toBe(computeJobId('postings/b.html'));
  });
});

describe('KeyedMutex', () => {
  it('serializes holders of the same key only', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const task = (name: string) => async () => {
      log.push(`${name}:start`);
      await sleep(5);
      log.push(`${name}:end`);
    };

    await Promise.all([
      mutex.runExclusive('northwind', task('first')),
      mutex.runExclusive('northwind', task('second')),
      mutex.runExclusive('contoso', task('other')),
    ]);

    expect(log.indexOf('first:end')).toBeLessThan(log.indexOf('second:start'));
    expect(log.indexOf('other:start')).toBeLessThan(log.indexOf('first:end'));
    expect(mutex.size).toBe(0);
  });

  it('releases the key when the task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('northwind', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('northwind', async () => 'next')).resolves.toBe('next');
  });
});

describe('withTimeout', () => {
  it('returns the task result inside the deadline', async () => {
    await expect(withTimeout('fast', 1000, async () => 'ok')).resolves.toBe('ok');
  });

  it('rejects with TimeoutError and aborts the signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout('slow', 10, (signal) => {
      seen.signal = signal;
      return new Promise<string>(() => {});
    });

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow('slow timed out after 10ms');
    expect(seen.signal?.aborted).toBe(true);
  });
});

describe('mapSettledWithConcurrency', () => {
  it('bounds calls in flight and keeps input order', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapSettledWithConcurrency([30, 10, 20, 5], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight--;
      if (index === 2) throw new Error('third');
      return ms * 2;
    });

    expect(peak).toBe(2);
    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : 'rejected'))).toEqual([
      60,
      20,
      'rejected',
      10,
    ]);
  });

  it('handles an empty list', async () => {
    await expect(mapSettledWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
