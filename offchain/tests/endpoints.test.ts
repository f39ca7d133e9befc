import { EndpointHealthChecker } from '../infra/endpoints';
import { EndpointsExhaustedError } from '../infra/errors';
import { fakeFleet, managerFor, rateLimited, reverted, testConfig, transient } from './fakes';
import { test, expect, expectEqual } from './test_harness';

function threeTierConfig(fallbackSequence?: string[]) {
  return testConfig({
    endpoints: {
      tiers: [
        { name: 'primary', priority: 0, http: 'http://primary.test', ws: 'ws://primary.test', capabilities: ['read', 'write', 'subscribe'] },
        { name: 'backup', priority: 1, http: 'http://backup.test' },
        { name: 'public', priority: 2, http: 'http://public.test', ws: 'ws://public.test', capabilities: ['read', 'subscribe'] },
      ],
      fallbackSequence,
      retryDelayMs: 0,
    },
  });
}

test('rate limit on the current tier fails over and the call completes on the next', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('getBlockNumber', rateLimited());
  fleet.client('backup').blockNumber = 2_000n;

  const block = await endpoints.execute('block', (c) => c.getBlockNumber());
  expectEqual(block, 2_000n);
  expectEqual(endpoints.currentTier(), 'backup');
  expectEqual(fleet.client('primary').count('getBlockNumber'), 1);
});

test('the pointer stays on the fallback tier for later calls', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('getChainId', rateLimited());
  await endpoints.execute('chain', (c) => c.getChainId());
  await endpoints.execute('block', (c) => c.getBlockNumber());
  expectEqual(fleet.client('primary').count('getBlockNumber'), 0);
  expectEqual(fleet.client('backup').count('getBlockNumber'), 1);
});

test('rate limits past the last tier exhaust the manager', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('getBlockNumber', rateLimited());
  fleet.client('backup').failNext('getBlockNumber', rateLimited());

  let caught: unknown = null;
  try {
    await endpoints.execute('block', (c) => c.getBlockNumber());
  } catch (err) {
    caught = err;
  }
  expect(caught instanceof EndpointsExhaustedError, 'expected EndpointsExhaustedError');
  expect(endpoints.isExhausted(), 'manager should report exhaustion');
  expect(!endpoints.isHealthy(), 'exhausted manager is unhealthy');

  let again: unknown = null;
  try {
    endpoints.acquire();
  } catch (err) {
    again = err;
  }
  expect(again instanceof EndpointsExhaustedError, 'acquire after exhaustion must throw');
});

test('transient errors are retried on the same tier', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('getBlockNumber', transient(), transient());

  const block = await endpoints.execute('block', (c) => c.getBlockNumber());
  expectEqual(block, 1_000n);
  expectEqual(fleet.client('primary').count('getBlockNumber'), 3);
  expectEqual(endpoints.currentTier(), 'primary');
});

test('transient errors surface after the retry budget without failover', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('getBlockNumber', transient(), transient(), transient());

  let caught = false;
  try {
    await endpoints.execute('block', (c) => c.getBlockNumber());
  } catch {
    caught = true;
  }
  expect(caught, 'expected the transient error to surface');
  expectEqual(fleet.client('primary').count('getBlockNumber'), 3);
  expectEqual(fleet.client('backup').count('getBlockNumber'), 0);
  expectEqual(endpoints.currentTier(), 'primary');
  expect(!endpoints.isHealthy(), 'three consecutive failures mark the tier unhealthy');
});

test('reverts surface immediately and do not count against the tier', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('call', reverted());

  let caught = false;
  try {
    await endpoints.execute('call', (c) => c.call({ to: '0x3333333333333333333333333333333333333333', data: '0x' }));
  } catch {
    caught = true;
  }
  expect(caught, 'revert should propagate');
  expectEqual(fleet.client('primary').count('call'), 1);
  expectEqual(endpoints.currentTier(), 'primary');
  expect(endpoints.isHealthy(), 'a revert is not an endpoint failure');
});

test('an explicit fallback sequence overrides priority order', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(threeTierConfig(['primary', 'public', 'backup']), fleet);
  fleet.client('primary').failNext('getGasPrice', rateLimited());
  await endpoints.execute('gas', (c) => c.getGasPrice());
  expectEqual(endpoints.currentTier(), 'public');
});

test('subscribe url follows the pointer to subscribe-capable tiers', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(threeTierConfig(), fleet);
  expectEqual(endpoints.subscribeUrl(), 'ws://primary.test');
  fleet.client('primary').failNext('getGasPrice', rateLimited());
  await endpoints.execute('gas', (c) => c.getGasPrice());
  expectEqual(endpoints.currentTier(), 'backup');
  expectEqual(endpoints.subscribeUrl(), 'ws://public.test');
});

test('health checker resets to the primary once it answers', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  const checker = new EndpointHealthChecker(endpoints, 1_000);
  fleet.client('primary').failNext('getBlockNumber', rateLimited());
  await endpoints.execute('block', (c) => c.getBlockNumber());
  expectEqual(endpoints.currentTier(), 'backup');

  fleet.client('primary').failNext('getBlockNumber', transient());
  expectEqual(await checker.probeOnce(), false);
  expectEqual(endpoints.currentTier(), 'backup');

  expectEqual(await checker.probeOnce(), true);
  expectEqual(endpoints.currentTier(), 'primary');
});

test('status reports per-tier counters', async () => {
  const fleet = fakeFleet();
  const endpoints = managerFor(testConfig(), fleet);
  fleet.client('primary').failNext('getBlockNumber', transient());
  await endpoints.execute('block', (c) => c.getBlockNumber());
  const status = endpoints.status();
  const primary = status.tiers.find((t) => t.name === 'primary');
  expectEqual(status.current, 'primary');
  expectEqual(primary?.requestCount, 2);
  expectEqual(primary?.failureCount, 1);
  expectEqual(primary?.consecutiveFailures, 0);
});
