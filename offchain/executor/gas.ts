import { formatEther, parseGwei } from 'viem';
import type { PersistedCache } from '../infra/cache';
import type { GasCfg } from '../infra/config';
import type { EndpointManager } from '../infra/endpoints';
import { log } from '../infra/logger';
import { counter, gauge } from '../infra/metrics';
import { systemClock, type Clock } from '../infra/time';
import { STRATEGY_KINDS, type FeeParameters, type Opportunity, type StrategyKind } from '../pipeline/types';

export type TipQuote =
  | { ok: true; tipGwei: number; tipWei: bigint }
  | { ok: false; reason: 'tip-cap-below-floor'; capGwei: number };

export type TipSample = {
  kind: StrategyKind;
  tipGwei: number;
  success: boolean;
  at: number;
};

const HISTORY_KEY = 'tip-history';
const HISTORY_TTL_SEC = 7 * 24 * 3600;
const REPLACEMENT_MARGIN = 1.125;
const RULE_WEIGHT = 0.6;
const LEARNED_WEIGHT = 0.4;

const gasLog = log.child({ module: 'executor.gas' });

function isTipSample(value: unknown): value is TipSample {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  const kind = value.kind;
  return STRATEGY_KINDS.some((known) => known === kind)
    && 'tipGwei' in value && typeof value.tipGwei === 'number'
    && 'success' in value && typeof value.success === 'boolean'
    && 'at' in value && typeof value.at === 'number';
}

function isTipSampleList(value: unknown): value is TipSample[] {
  return Array.isArray(value) && value.every(isTipSample);
}

/**
 * Rolling record of which tips landed. The suggestion is a recency-weighted
 * mean of the successful tips for a kind (newest weighs most).
 */
export class TipHistory {
  private samples: TipSample[] = [];

  constructor(private readonly maxSamples: number, private readonly cache?: PersistedCache) {}

  async load(): Promise<void> {
    if (!this.cache) return;
    const stored = await this.cache.get(HISTORY_KEY, isTipSampleList);
    if (stored) this.samples = stored.slice(-this.maxSamples);
  }

  async add(sample: TipSample): Promise<void> {
    this.samples.push(sample);
    if (this.samples.length > this.maxSamples) this.samples.splice(0, this.samples.length - this.maxSamples);
    if (this.cache) await this.cache.set(HISTORY_KEY, this.samples, HISTORY_TTL_SEC);
  }

  count(): number {
    return this.samples.length;
  }

  suggest(kind: StrategyKind): number | null {
    const wins = this.samples.filter((s) => s.kind === kind && s.success);
    if (wins.length === 0) return null;
    let weighted = 0;
    let total = 0;
    wins.forEach((sample, idx) => {
      const weight = idx + 1;
      weighted += sample.tipGwei * weight;
      total += weight;
    });
    return weighted / total;
  }
}

function gweiToWei(gwei: number): bigint {
  return parseGwei(gwei.toFixed(9));
}

/** Fee per gas the opportunity has to outbid, when it carries one. */
export function referenceFeeGwei(opp: Opportunity): number | null {
  return opp.kind === 'sandwich' ? opp.payload.victimFeeGwei : null;
}

export class GasPricer {
  private nativePriceUsd: number;
  private readonly capWei: bigint;

  constructor(
    private readonly cfg: GasCfg,
    private readonly endpoints: EndpointManager,
    private readonly history: TipHistory,
    private readonly clock: Clock = systemClock,
  ) {
    this.nativePriceUsd = cfg.nativePriceUsd;
    this.capWei = gweiToWei(cfg.maxGasPriceGwei);
  }

  updateNativePrice(usd: number): void {
    if (!Number.isFinite(usd) || usd <= 0) {
      gasLog.warn({ usd }, 'native-price-ignored');
      return;
    }
    this.nativePriceUsd = usd;
  }

  nativePrice(): number {
    return this.nativePriceUsd;
  }

  /** Latest base fee (or legacy gas price) plus the configured buffer, capped. Read at call time. */
  async jitPrice(): Promise<bigint> {
    const baseFee = await this.endpoints.execute('jit-base-fee', (client) => client.getBaseFee());
    const reference = baseFee ?? (await this.endpoints.execute('jit-gas-price', (client) => client.getGasPrice()));
    const bufferBps = BigInt(Math.round((100 + this.cfg.baseFeeBufferPct) * 100));
    const buffered = (reference * bufferBps) / 10_000n;
    return buffered > this.capWei ? this.capWei : buffered;
  }

  tip(opp: Opportunity, gasLimit: bigint): TipQuote {
    const { minTipGwei, maxTipGwei } = this.cfg;
    let tip = minTipGwei;

    if (opp.expectedProfitUsd > 100) tip *= 2.0;
    else if (opp.expectedProfitUsd > 50) tip *= 1.5;

    const reference = referenceFeeGwei(opp);
    if (this.cfg.timeCriticalKinds.includes(opp.kind) && reference !== null) {
      tip = Math.max(tip, reference * REPLACEMENT_MARGIN);
    }

    if (this.history.count() >= this.cfg.historyMinSamples) {
      const learned = this.history.suggest(opp.kind);
      if (learned !== null) tip = RULE_WEIGHT * tip + LEARNED_WEIGHT * learned;
    }

    tip = Math.min(Math.max(tip, minTipGwei), maxTipGwei);

    const capGwei = this.profitCapGwei(opp.expectedProfitUsd, gasLimit);
    if (capGwei < minTipGwei) {
      counter.tipRefused.inc({ kind: opp.kind, reason: 'tip-cap-below-floor' });
      gasLog.debug({ kind: opp.kind, capGwei, minTipGwei }, 'tip-cap-below-floor');
      return { ok: false, reason: 'tip-cap-below-floor', capGwei };
    }
    tip = Math.min(tip, capGwei);
    gauge.lastTipGwei.set({ kind: opp.kind }, tip);
    return { ok: true, tipGwei: tip, tipWei: gweiToWei(tip) };
  }

  /** Highest tip (gwei per gas) whose total cost stays within the profit fraction. */
  profitCapGwei(expectedProfitUsd: number, gasLimit: bigint): number {
    const usdPerGwei = (Number(gasLimit) * this.nativePriceUsd) / 1e9;
    if (usdPerGwei <= 0) return 0;
    return (expectedProfitUsd * this.cfg.profitTipFraction) / usdPerGwei;
  }

  /** Configured minimum tip, for transactions that carry no opportunity (sweeps). */
  floorTipWei(): bigint {
    return gweiToWei(this.cfg.minTipGwei);
  }

  feeParameters(baseFee: bigint, tipWei: bigint): FeeParameters {
    let maxFeePerGas = baseFee * 2n + tipWei;
    if (maxFeePerGas > this.capWei) maxFeePerGas = this.capWei;
    const maxPriorityFeePerGas = tipWei > maxFeePerGas ? maxFeePerGas : tipWei;
    return { maxFeePerGas, maxPriorityFeePerGas };
  }

  async recordOutcome(kind: StrategyKind, tipGwei: number, success: boolean): Promise<void> {
    await this.history.add({ kind, tipGwei, success, at: this.clock() });
  }

  /** Gas cost in USD for a mined transaction. */
  costUsd(gasUsed: bigint, effectiveGasPrice: bigint): number {
    return Number(formatEther(gasUsed * effectiveGasPrice)) * this.nativePriceUsd;
  }
}
