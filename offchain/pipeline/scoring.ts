import type { StrategyKind } from './types';

export interface ConfidenceScorer {
  score(expectedProfitUsd: number, kind: StrategyKind): number;
}

/** Stand-in used when no trained model is plugged in. */
export class HeuristicScorer implements ConfidenceScorer {
  constructor(private readonly highProfitUsd = 10) {}

  score(expectedProfitUsd: number): number {
    return expectedProfitUsd > this.highProfitUsd ? 0.7 : 0.5;
  }
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
