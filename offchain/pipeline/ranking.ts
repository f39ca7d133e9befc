import type { Opportunity } from './types';

export type RankingCfg = {
  minConfidence: number;
  similarityBandUsd: number;
};

type Rankable = Pick<Opportunity, 'expectedProfitUsd' | 'confidence' | 'priority'>;

/**
 * Picks the cycle's winner. Profit decides, except among candidates whose
 * profit sits within `similarityBandUsd` of the best one: there the fixed
 * strategy priority decides. Equal priority inside the band keeps the higher
 * profit. Pure; returns null when nothing clears the confidence floor.
 */
export function selectBest<T extends Rankable>(candidates: readonly T[], cfg: RankingCfg): T | null {
  const confident = candidates.filter((c) => Number.isFinite(c.expectedProfitUsd) && c.confidence >= cfg.minConfidence);
  if (confident.length === 0) return null;

  const byProfit = [...confident].sort((a, b) => b.expectedProfitUsd - a.expectedProfitUsd);
  const top = byProfit[0];
  if (!top) return null;

  const band = byProfit.filter((c) => Math.abs(top.expectedProfitUsd - c.expectedProfitUsd) <= cfg.similarityBandUsd);
  let winner = top;
  for (const candidate of band) {
    if (candidate.priority > winner.priority) winner = candidate;
  }
  return winner;
}
