import { PersistedCache } from '../infra/cache';
import { ManualClock } from './fakes';
import { test, expect, expectEqual } from './test_harness';

const isNumber = (value: unknown): value is number => typeof value === 'number';
const isString = (value: unknown): value is string => typeof value === 'string';

test('entries read back until their ttl elapses', async () => {
  const clock = new ManualClock();
  const cache = new PersistedCache(null, 'test', clock.read);
  await cache.set('price', 1.25, 30);

  clock.advance(29_999);
  expectEqual(await cache.get('price', isNumber), 1.25);

  clock.advance(1);
  expectEqual(await cache.get('price', isNumber), null);
});

test('expired entries are removed on read', async () => {
  const clock = new ManualClock();
  const cache = new PersistedCache(null, 'test', clock.read);
  await cache.set('a', 'x', 1);
  await cache.set('b', 'y', 100);
  expectEqual(cache.size(), 2);

  clock.advance(5_000);
  expectEqual(cache.size(), 2, 'nothing is removed before a read');
  expectEqual(await cache.get('a', isString), null);
  expectEqual(cache.size(), 1);
  expectEqual(await cache.get('b', isString), 'y');
});

test('getEntry exposes the stored timestamp and ttl', async () => {
  const clock = new ManualClock(1_000_000);
  const cache = new PersistedCache(null, 'test', clock.read);
  await cache.set('k', { n: 1 }, 60);
  const entry = await cache.getEntry('k');
  expectEqual(entry?.storedAt, 1_000_000);
  expectEqual(entry?.ttlSec, 60);
});

test('a value of the wrong shape reads as absent and is dropped', async () => {
  const cache = new PersistedCache(null, 'test', new ManualClock().read);
  await cache.set('k', 'not-a-number', 60);
  expectEqual(await cache.get('k', isNumber), null);
  expectEqual(cache.size(), 0);
});

test('overwriting restarts the ttl', async () => {
  const clock = new ManualClock();
  const cache = new PersistedCache(null, 'test', clock.read);
  await cache.set('k', 1, 10);
  clock.advance(9_000);
  await cache.set('k', 2, 10);
  clock.advance(9_000);
  expectEqual(await cache.get('k', isNumber), 2);
});

test('delete removes the entry', async () => {
  const cache = new PersistedCache(null, 'test', new ManualClock().read);
  await cache.set('k', 1, 10);
  await cache.delete('k');
  expect((await cache.get('k', isNumber)) === null, 'entry should be gone');
});
