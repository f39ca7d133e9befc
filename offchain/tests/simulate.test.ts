import { parseGwei } from 'viem';
import { buildIntent } from '../executor/build_tx';
import { simulateIntent } from '../executor/simulate';
import { EndpointsExhaustedError } from '../infra/errors';
import { EXECUTOR, fakeFleet, managerFor, rateLimited, reverted, TARGET, testConfig, transient } from './fakes';
import { test, expect, expectEqual } from './test_harness';

const intent = buildIntent(
  'c1-0-direct',
  'direct',
  EXECUTOR,
  { target: TARGET, calldata: '0xdeadbeef', gasLimit: 350_000n },
  { maxFeePerGas: parseGwei('100'), maxPriorityFeePerGas: parseGwei('30') },
);

test('a clean dry run passes and is sent from the executing identity', async () => {
  const fleet = fakeFleet();
  const outcome = await simulateIntent(managerFor(testConfig(), fleet), intent);
  expectEqual(outcome.status, 'ok');
  const request = fleet.client('primary').calls[0];
  expectEqual(request?.from, EXECUTOR);
  expectEqual(request?.to, TARGET);
  expectEqual(request?.data, '0xdeadbeef');
  expectEqual(request?.value, 0n);
  expectEqual(request?.gas, 350_000n);
});

test('a revert rejects the intent', async () => {
  const fleet = fakeFleet();
  fleet.client('primary').failNext('call', reverted());
  const outcome = await simulateIntent(managerFor(testConfig(), fleet), intent);
  expectEqual(outcome.status, 'rejected');
  expectEqual(fleet.client('primary').count('call'), 1, 'reverts are not retried');
});

test('transport failures past the retry budget are ambiguous', async () => {
  const fleet = fakeFleet();
  fleet.client('primary').failNext('call', transient(), transient(), transient());
  const outcome = await simulateIntent(managerFor(testConfig(), fleet), intent);
  expectEqual(outcome.status, 'ambiguous');
  expectEqual(fleet.client('primary').count('call'), 3);
});

test('a transient failure that recovers on retry passes', async () => {
  const fleet = fakeFleet();
  fleet.client('primary').failNext('call', transient());
  const outcome = await simulateIntent(managerFor(testConfig(), fleet), intent);
  expectEqual(outcome.status, 'ok');
});

test('exhausted endpoints are rethrown rather than treated as ambiguous', async () => {
  const fleet = fakeFleet();
  fleet.client('primary').failNext('call', rateLimited());
  fleet.client('backup').failNext('call', rateLimited());
  let caught: unknown = null;
  try {
    await simulateIntent(managerFor(testConfig(), fleet), intent);
  } catch (err) {
    caught = err;
  }
  expect(caught instanceof EndpointsExhaustedError, 'expected EndpointsExhaustedError');
});
