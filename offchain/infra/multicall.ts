import { decodeFunctionResult, encodeFunctionData, type Address, type Hex } from 'viem';
import type { EndpointManager } from './endpoints';
import { EndpointsExhaustedError, errorMessage } from './errors';
import { log } from './logger';
import { counter } from './metrics';

export const MULTICALL3_ABI = [
  {
    type: 'function',
    name: 'aggregate3',
    stateMutability: 'payable',
    inputs: [
      {
        name: 'calls',
        type: 'tuple[]',
        components: [
          { name: 'target', type: 'address' },
          { name: 'allowFailure', type: 'bool' },
          { name: 'callData', type: 'bytes' },
        ],
      },
    ],
    outputs: [
      {
        name: 'returnData',
        type: 'tuple[]',
        components: [
          { name: 'success', type: 'bool' },
          { name: 'returnData', type: 'bytes' },
        ],
      },
    ],
  },
  {
    type: 'function',
    name: 'getEthBalance',
    stateMutability: 'view',
    inputs: [{ name: 'addr', type: 'address' }],
    outputs: [{ name: 'balance', type: 'uint256' }],
  },
] as const;

export type ReadCall = {
  target: Address;
  callData: Hex;
};

export type ReadResult = {
  success: boolean;
  returnData: Hex;
};

const multicallLog = log.child({ module: 'infra.multicall' });

/**
 * Collapses independent reads into Multicall3 `aggregate3` round-trips of at
 * most `maxBatchSize` calls. Results come back in input order; a failing call
 * fails only its own slot, a failing round-trip fails only its own chunk.
 */
export class BatchReader {
  constructor(
    private readonly endpoints: EndpointManager,
    private readonly address: Address,
    private readonly maxBatchSize: number,
  ) {
    if (maxBatchSize < 1) throw new Error('maxBatchSize must be at least 1');
  }

  async aggregate(calls: readonly ReadCall[]): Promise<ReadResult[]> {
    const results: ReadResult[] = [];
    for (let start = 0; start < calls.length; start += this.maxBatchSize) {
      const chunk = calls.slice(start, start + this.maxBatchSize);
      results.push(...(await this.runChunk(chunk, start)));
    }
    return results;
  }

  /** Native balances through Multicall3 `getEthBalance`; null where the read failed. */
  async balances(addresses: readonly Address[]): Promise<Array<bigint | null>> {
    const calls = addresses.map((addr) => ({
      target: this.address,
      callData: encodeFunctionData({ abi: MULTICALL3_ABI, functionName: 'getEthBalance', args: [addr] }),
    }));
    const results = await this.aggregate(calls);
    return results.map((result) => {
      if (!result.success) return null;
      try {
        return decodeFunctionResult({ abi: MULTICALL3_ABI, functionName: 'getEthBalance', data: result.returnData });
      } catch {
        return null;
      }
    });
  }

  private async runChunk(chunk: readonly ReadCall[], offset: number): Promise<ReadResult[]> {
    const data = encodeFunctionData({
      abi: MULTICALL3_ABI,
      functionName: 'aggregate3',
      args: [chunk.map((call) => ({ target: call.target, allowFailure: true, callData: call.callData }))],
    });
    try {
      const raw = await this.endpoints.execute('multicall', (client) => client.call({ to: this.address, data }));
      const decoded = decodeFunctionResult({ abi: MULTICALL3_ABI, functionName: 'aggregate3', data: raw });
      if (decoded.length !== chunk.length) {
        throw new Error(`multicall returned ${decoded.length} results for ${chunk.length} calls`);
      }
      counter.multicallChunks.inc({ result: 'ok' });
      return decoded.map((entry) => ({ success: entry.success, returnData: entry.returnData }));
    } catch (err) {
      if (err instanceof EndpointsExhaustedError) throw err;
      counter.multicallChunks.inc({ result: 'failed' });
      multicallLog.warn({ offset, size: chunk.length, err: errorMessage(err) }, 'multicall-chunk-failed');
      return chunk.map(() => ({ success: false, returnData: '0x' }));
    }
  }
}
