import { describe, it, expect } from 'vitest';
import { SingleFlight } from '../utils/single-flight.js';

describe('SingleFlight', () => {
  it('shares one call between concurrent callers of a key', async () => {
    const flight = new SingleFlight<string, number>();
    let calls = 0;
    const work = async (): Promise<number> => {
      calls++;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return 42;
    };

    const results = await Promise.all([flight.run('a', work), flight.run('a', work), flight.run('a', work)]);
    expect(results).toEqual([42, 42, 42]);
    expect(calls).toBe(1);
  });

  it('runs different keys independently', async () => {
    const flight = new SingleFlight<string, string>();
    const results = await Promise.all([
      flight.run('a', async () => 'first'),
      flight.run('b', async () => 'second'),
    ]);
    expect(results).toEqual(['first', 'second']);
  });

  it('forgets a key once its call settles', async () => {
    const flight = new SingleFlight<string, number>();
    const pending = flight.run('a', async () => 1);
    expect(flight.isRunning('a')).toBe(true);
    await pending;
    expect(flight.isRunning('a')).toBe(false);
    expect(flight.size).toBe(0);
  });

  it('shares rejections and allows a retry afterwards', async () => {
    const flight = new SingleFlight<string, number>();
    const failing = async (): Promise<number> => {
      throw new Error('boom');
    };
    await expect(Promise.all([flight.run('a', failing), flight.run('a', failing)])).rejects.toThrow('boom');
    await expect(flight.run('a', async () => 7)).resolves.toBe(7);
  });
});
