import { describe, it, expect, vi } from 'vitest';
import { SingleFlight } from '../../../src/services/single-flight.js';

describe('SingleFlight', () => {
  it('should execute function on first call', async () => {
    const flight = new SingleFlight<string, number>();
    const fn = vi.fn().mockResolvedValue(42);

    const result = await flight.execute('key1', fn);

    expect(result).toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should share one call between concurrent callers', async () => {
    const flight = new SingleFlight<string, number>();
    let callCount = 0;

    const fn = vi.fn().mockImplementation(async () => {
      callCount++;
      await new Promise((r) => setTimeout(r, 20));
      return callCount;
    });

    const results = await Promise.all([
      flight.execute('key1', fn),
      flight.execute('key1', fn),
      flight.execute('key1', fn),
    ]);

    expect(results).toEqual([1, 1, 1]);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not share calls between different keys', async () => {
    const flight = new SingleFlight<string, number>();
    const fn = vi.fn().mockResolvedValue(1);

    await Promise.all([
      flight.execute('key1', fn),
      flight.execute('key2', fn),
    ]);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should run again once the previous call settled', async () => {
    const flight = new SingleFlight<string, number>();
    const fn = vi.fn().mockResolvedValue(1);

    await flight.execute('key1', fn);
    await flight.execute('key1', fn);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should free the key after a rejection', async () => {
    const flight = new SingleFlight<string, number>();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('denied'))
      .mockResolvedValue(7);

    await expect(flight.execute('key1', fn)).rejects.toThrow('denied');
    expect(flight.isPending('key1')).toBe(false);
    await expect(flight.execute('key1', fn)).resolves.toBe(7);
  });

  it('should track pending count', async () => {
    const flight = new SingleFlight<{ id: string }, number>();
    const promise = flight.execute({ id: 'a' }, async () => 1);

    expect(flight.pendingCount).toBe(1);
    expect(flight.isPending({ id: 'a' })).toBe(true);

    await promise;
    expect(flight.pendingCount).toBe(0);
  });
});
