import { FetchCache } from './cache';

describe('FetchCache', () => {
  test('loads a key once and serves it from memory afterwards', async () => {
    const cache = new FetchCache<string>();
    const load = jest.fn(async () => 'value');

    await expect(cache.getOrLoad('foo', load)).resolves.toBe('value');
    await expect(cache.getOrLoad('foo', load)).resolves.toBe('value');

    expect(load).toHaveBeenCalledTimes(1);
  });

  test('runs a separate load for each concurrent miss', async () => {
    const cache = new FetchCache<number>();
    const first = jest.fn(async () => 1);
    const second = jest.fn(async () => 2);

    await expect(
      Promise.all([cache.getOrLoad('foo@1.0.0', first), cache.getOrLoad('foo@1.0.0', second)])
    ).resolves.toEqual([1, 2]);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  test('keeps keys independent', async () => {
    const cache = new FetchCache<string>();

    await cache.getOrLoad('foo', async () => 'a');
    await cache.getOrLoad('bar', async () => 'b');

    await expect(cache.getOrLoad('foo', async () => 'other')).resolves.toBe('a');
    await expect(cache.getOrLoad('bar', async () => 'other')).resolves.toBe('b');
  });

  test('does not store a failed load', async () => {
    const cache = new FetchCache<string>();

    await expect(
      cache.getOrLoad('foo', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(cache.getOrLoad('foo', async () => 'recovered')).resolves.toBe('recovered');
  });
});
