import { decodeFunctionResult, encodeFunctionData, type Address } from 'viem';
import type { PriceFeedCfg } from '../infra/config';
import { EndpointsExhaustedError, errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import { gauge } from '../infra/metrics';
import type { BatchReader } from '../infra/multicall';
import { sleep, systemClock, type Clock } from '../infra/time';
import type { GasPricer } from '../executor/gas';

export const FEED_ABI = [
  { type: 'function', name: 'decimals', stateMutability: 'view', inputs: [], outputs: [{ name: '', type: 'uint8' }] },
  {
    type: 'function',
    name: 'latestRoundData',
    stateMutability: 'view',
    inputs: [],
    outputs: [
      { name: 'roundId', type: 'uint80' },
      { name: 'answer', type: 'int256' },
      { name: 'startedAt', type: 'uint256' },
      { name: 'updatedAt', type: 'uint256' },
      { name: 'answeredInRound', type: 'uint80' },
    ],
  },
] as const;

export type PriceObservation =
  | { ok: true; priceUsd: number; updatedAt: number }
  | { ok: false; reason: 'read-failed' | 'stale' | 'non-positive' };

const feedLog = log.child({ module: 'realtime.price_feed' });

/**
 * Keeps the gas pricer's native/USD price current from an on-chain
 * aggregator. Both reads go out in one multicall round-trip; a failed or
 * stale round leaves the last good price in place.
 */
export class NativePriceRefresher {
  constructor(
    private readonly reader: BatchReader,
    private readonly gas: GasPricer,
    private readonly feed: Address,
    private readonly cfg: PriceFeedCfg,
    private readonly clock: Clock = systemClock,
  ) {}

  async read(): Promise<PriceObservation> {
    const [decimalsRead, roundRead] = await this.reader.aggregate([
      { target: this.feed, callData: encodeFunctionData({ abi: FEED_ABI, functionName: 'decimals' }) },
      { target: this.feed, callData: encodeFunctionData({ abi: FEED_ABI, functionName: 'latestRoundData' }) },
    ]);
    if (!decimalsRead?.success || !roundRead?.success) return { ok: false, reason: 'read-failed' };

    let decimals: number;
    let round: readonly [bigint, bigint, bigint, bigint, bigint];
    try {
      decimals = decodeFunctionResult({ abi: FEED_ABI, functionName: 'decimals', data: decimalsRead.returnData });
      round = decodeFunctionResult({ abi: FEED_ABI, functionName: 'latestRoundData', data: roundRead.returnData });
    } catch (err) {
      feedLog.warn({ feed: this.feed, err: errorMessage(err) }, 'price-feed-decode-failed');
      return { ok: false, reason: 'read-failed' };
    }

    const [roundId, answer, , updatedAt, answeredInRound] = round;
    if (answer <= 0n) return { ok: false, reason: 'non-positive' };
    const nowSec = BigInt(Math.floor(this.clock() / 1000));
    if (updatedAt === 0n || answeredInRound < roundId || nowSec - updatedAt > BigInt(this.cfg.maxStalenessSec)) {
      return { ok: false, reason: 'stale' };
    }
    return { ok: true, priceUsd: Number(answer) / 10 ** decimals, updatedAt: Number(updatedAt) };
  }

  /** One read; applies the price when it is usable. */
  async refreshOnce(): Promise<PriceObservation> {
    const observation = await this.read();
    if (!observation.ok) {
      feedLog.warn({ feed: this.feed, reason: observation.reason, kept: this.gas.nativePrice() }, 'native-price-not-updated');
      return observation;
    }
    this.gas.updateNativePrice(observation.priceUsd);
    gauge.nativePriceUsd.set(this.gas.nativePrice());
    feedLog.debug({ priceUsd: observation.priceUsd, updatedAt: observation.updatedAt }, 'native-price-updated');
    return observation;
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.refreshOnce();
      } catch (err) {
        if (err instanceof EndpointsExhaustedError) throw err;
        feedLog.warn({ feed: this.feed, err: errorMessage(err) }, 'native-price-refresh-failed');
      }
      await sleep(this.cfg.refreshMs, signal);
    }
  }
}
