import { decodeFunctionData, encodeFunctionResult, toHex, type Address, type Hex } from 'viem';
import { EndpointsExhaustedError } from '../infra/errors';
import { BatchReader, MULTICALL3_ABI, type ReadCall } from '../infra/multicall';
import { fakeFleet, managerFor, rateLimited, reverted, testConfig, type FakeRpcClient } from './fakes';
import { test, expect, expectEqual } from './test_harness';

const MULTICALL: Address = '0xcA11bde05977b3631167028862bE2a173976CA11';
const TOKEN: Address = '0x4444444444444444444444444444444444444444';
const FAILING: Hex = toHex('will-revert');

function readCalls(count: number): ReadCall[] {
  return Array.from({ length: count }, (_, i) => ({ target: TOKEN, callData: toHex(`call-${i}`) }));
}

/** Echoes each callData back as its return data; FAILING fails its own slot. */
function serveAggregate(client: FakeRpcClient, balances: Map<string, bigint> = new Map()): void {
  client.callHandler = async (request) => {
    const outer = decodeFunctionData({ abi: MULTICALL3_ABI, data: request.data });
    if (outer.functionName !== 'aggregate3') throw new Error('unexpected multicall entry point');
    const [calls] = outer.args;
    return encodeFunctionResult({
      abi: MULTICALL3_ABI,
      functionName: 'aggregate3',
      result: calls.map((call): { success: boolean; returnData: Hex } => {
        if (call.callData === FAILING) return { success: false, returnData: '0x' };
        if (call.target.toLowerCase() === MULTICALL.toLowerCase()) {
          const inner = decodeFunctionData({ abi: MULTICALL3_ABI, data: call.callData });
          if (inner.functionName !== 'getEthBalance') return { success: false, returnData: '0x' };
          const balance = balances.get(inner.args[0].toLowerCase());
          if (balance === undefined) return { success: false, returnData: '0x' };
          return {
            success: true,
            returnData: encodeFunctionResult({ abi: MULTICALL3_ABI, functionName: 'getEthBalance', result: balance }),
          };
        }
        return { success: true, returnData: call.callData };
      }),
    });
  };
}

test('one failing call fails only its own slot', async () => {
  const fleet = fakeFleet();
  serveAggregate(fleet.client('primary'));
  const reader = new BatchReader(managerFor(testConfig(), fleet), MULTICALL, 50);
  const calls = readCalls(5);
  calls[2] = { target: TOKEN, callData: FAILING };

  const results = await reader.aggregate(calls);
  expectEqual(results.length, 5);
  expectEqual(results[2]?.success, false);
  expectEqual(results[2]?.returnData, '0x');
  for (const idx of [0, 1, 3, 4]) {
    expectEqual(results[idx]?.success, true, `slot ${idx} should succeed`);
    expectEqual(results[idx]?.returnData, toHex(`call-${idx}`));
  }
  expectEqual(fleet.client('primary').count('call'), 1);
});

test('large batches are chunked and reassembled in order', async () => {
  const fleet = fakeFleet();
  serveAggregate(fleet.client('primary'));
  const reader = new BatchReader(managerFor(testConfig(), fleet), MULTICALL, 2);

  const results = await reader.aggregate(readCalls(5));
  expectEqual(fleet.client('primary').count('call'), 3);
  expectEqual(results.map((r) => r.returnData).join(','), readCalls(5).map((c) => c.callData).join(','));
});

test('a failed round trip fails its chunk and leaves the others intact', async () => {
  const fleet = fakeFleet();
  const client = fleet.client('primary');
  serveAggregate(client);
  client.failNext('call', reverted());
  const reader = new BatchReader(managerFor(testConfig(), fleet), MULTICALL, 2);

  const results = await reader.aggregate(readCalls(5));
  expectEqual(results.map((r) => r.success).join(','), 'false,false,true,true,true');
});

test('empty input makes no round trip', async () => {
  const fleet = fakeFleet();
  const reader = new BatchReader(managerFor(testConfig(), fleet), MULTICALL, 50);
  expectEqual((await reader.aggregate([])).length, 0);
  expectEqual(fleet.client('primary').count('call'), 0);
});

test('exhausted endpoints propagate instead of failing the chunk', async () => {
  const fleet = fakeFleet();
  fleet.client('primary').failNext('call', rateLimited());
  fleet.client('backup').failNext('call', rateLimited());
  const reader = new BatchReader(managerFor(testConfig(), fleet), MULTICALL, 50);

  let caught: unknown = null;
  try {
    await reader.aggregate(readCalls(2));
  } catch (err) {
    caught = err;
  }
  expect(caught instanceof EndpointsExhaustedError, 'expected EndpointsExhaustedError');
});

test('balances decode per address and null out failures', async () => {
  const fleet = fakeFleet();
  const a: Address = '0x5555555555555555555555555555555555555555';
  const b: Address = '0x6666666666666666666666666666666666666666';
  serveAggregate(fleet.client('primary'), new Map([[a.toLowerCase(), 7n * 10n ** 18n]]));
  const reader = new BatchReader(managerFor(testConfig(), fleet), MULTICALL, 50);

  const balances = await reader.balances([a, b]);
  expectEqual(balances[0], 7n * 10n ** 18n);
  expectEqual(balances[1], null);
});

test('a batch size below one is refused', () => {
  let message = '';
  try {
    new BatchReader(managerFor(testConfig(), fakeFleet()), MULTICALL, 0);
  } catch (err) {
    message = err instanceof Error ? err.message : String(err);
  }
  expectEqual(message, 'maxBatchSize must be at least 1');
});
