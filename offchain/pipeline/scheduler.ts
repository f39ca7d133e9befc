import type { SchedulerCfg } from '../infra/config';
import type { EndpointManager } from '../infra/endpoints';
import { EndpointsExhaustedError, errorMessage, isHardStop } from '../infra/errors';
import type { RiskGovernor } from '../infra/kill_switch';
import { log } from '../infra/logger';
import { counter, gauge, histogram } from '../infra/metrics';
import { sleep, systemClock, withDeadline, type Clock } from '../infra/time';
import type { ExecutionPipeline } from './execute';
import { selectBest } from './ranking';
import { clampConfidence, type ConfidenceScorer } from './scoring';
import type { RegisteredStrategy } from './strategies';
import type { ExecutionReport, Opportunity, StrategyKind } from './types';

type Candidate = {
  opportunity: Opportunity;
  strategy: RegisteredStrategy;
};

export type CycleResult =
  | { cycleId: number; selected: null; candidates: number }
  | { cycleId: number; selected: Opportunity; candidates: number; report: ExecutionReport };

type StrategyStats = {
  trades: number;
  successes: number;
  failures: number;
  realizedPnlUsd: number;
  gasSpentUsd: number;
};

export type EngineStats = StrategyStats & {
  startedAt: number;
  uptimeMs: number;
  cycles: number;
  successRate: number;
  byStrategy: Partial<Record<StrategyKind, StrategyStats>>;
};

const schedulerLog = log.child({ module: 'pipeline.scheduler' });

function emptyStats(): StrategyStats {
  return { trades: 0, successes: 0, failures: 0, realizedPnlUsd: 0, gasSpentUsd: 0 };
}

/**
 * The decision loop. Each cycle polls every producer concurrently under a
 * time budget, ranks what came back and executes at most one winner.
 */
export class OpportunityScheduler {
  private cycleId = 0;
  private readonly startedAt: number;
  private readonly totals = emptyStats();
  private readonly byStrategy = new Map<StrategyKind, StrategyStats>();

  constructor(
    private readonly strategies: readonly RegisteredStrategy[],
    private readonly scorer: ConfidenceScorer,
    private readonly pipeline: ExecutionPipeline,
    private readonly risk: RiskGovernor,
    private readonly endpoints: EndpointManager,
    private readonly cfg: SchedulerCfg,
    private readonly clock: Clock = systemClock,
  ) {
    this.startedAt = clock();
  }

  async runCycle(signal: AbortSignal): Promise<CycleResult> {
    this.cycleId += 1;
    const cycleId = this.cycleId;
    this.risk.assertArmed();
    if (this.endpoints.isExhausted()) throw new EndpointsExhaustedError(this.endpoints.currentTier());

    const candidates = await this.poll(cycleId, signal);
    const winner = selectBest(
      candidates.map((c) => ({ ...c, ...c.opportunity })),
      { minConfidence: this.cfg.minConfidence, similarityBandUsd: this.cfg.similarityBandUsd },
    );
    if (!winner) {
      schedulerLog.debug({ cycleId, candidates: candidates.length }, 'cycle-idle');
      return { cycleId, selected: null, candidates: candidates.length };
    }

    const { opportunity, strategy } = winner;
    schedulerLog.info(
      {
        cycleId,
        strategy: opportunity.kind,
        opportunityId: opportunity.id,
        expectedProfitUsd: opportunity.expectedProfitUsd,
        confidence: opportunity.confidence,
        candidates: candidates.length,
      },
      'opportunity-selected',
    );
    const report = await this.pipeline.execute(opportunity, strategy.producer, cycleId, signal);
    this.record(report);
    return { cycleId, selected: opportunity, candidates: candidates.length, report };
  }

  /** Runs cycles until aborted. Hard stops propagate; anything else fails only its cycle. */
  async run(signal: AbortSignal): Promise<void> {
    schedulerLog.info({ strategies: this.strategies.map((s) => s.producer.kind) }, 'scheduler-started');
    while (!signal.aborted) {
      const end = histogram.cycleDuration.startTimer();
      try {
        const result = await this.runCycle(signal);
        counter.cycles.inc({ result: result.selected ? 'executed' : 'idle' });
      } catch (err) {
        if (isHardStop(err)) {
          counter.cycles.inc({ result: 'hard-stop' });
          throw err;
        }
        counter.cycles.inc({ result: 'failed' });
        schedulerLog.error({ cycleId: this.cycleId, err: errorMessage(err) }, 'cycle-failed');
      } finally {
        end();
      }
      await sleep(this.cfg.idleMs, signal);
    }
    schedulerLog.info({ cycles: this.cycleId }, 'scheduler-stopped');
  }

  stats(): EngineStats {
    const byStrategy: Partial<Record<StrategyKind, StrategyStats>> = {};
    for (const [kind, stats] of this.byStrategy) byStrategy[kind] = { ...stats };
    const decided = this.totals.successes + this.totals.failures;
    return {
      ...this.totals,
      startedAt: this.startedAt,
      uptimeMs: this.clock() - this.startedAt,
      cycles: this.cycleId,
      successRate: decided === 0 ? 0 : this.totals.successes / decided,
      byStrategy,
    };
  }

  private async poll(cycleId: number, signal: AbortSignal): Promise<Candidate[]> {
    const polled = await Promise.all(
      this.strategies.map(async (strategy, idx): Promise<Candidate | null> => {
        const kind = strategy.producer.kind;
        const outcome = await withDeadline(strategy.producer.findOpportunity(signal), this.cfg.producerBudgetMs);
        if (!outcome.ok) {
          if (outcome.reason === 'error' && isHardStop(outcome.error)) throw outcome.error;
          const err = outcome.reason === 'error' ? errorMessage(outcome.error) : undefined;
          counter.producerErrors.inc({ kind, reason: outcome.reason });
          schedulerLog.warn({ cycleId, strategy: kind, reason: outcome.reason, err }, 'producer-failed');
          return null;
        }
        const finding = outcome.value;
        if (!finding) return null;
        if (finding.kind !== kind) {
          counter.producerErrors.inc({ kind, reason: 'kind-mismatch' });
          schedulerLog.warn({ cycleId, strategy: kind, produced: finding.kind }, 'producer-kind-mismatch');
          return null;
        }
        const confidence = clampConfidence(finding.confidence ?? this.scorer.score(finding.expectedProfitUsd, kind));
        const opportunity: Opportunity = {
          ...finding,
          id: `${cycleId}-${idx}-${kind}`,
          priority: strategy.priority,
          confidence,
          foundAt: this.clock(),
        };
        return { opportunity, strategy };
      }),
    );
    return polled.filter((c): c is Candidate => c !== null);
  }

  private record(report: ExecutionReport): void {
    if (report.outcome === 'skipped' || report.outcome === 'simulation-rejected') return;
    const stats = this.byStrategy.get(report.kind) ?? emptyStats();
    for (const target of [this.totals, stats]) {
      target.trades += 1;
      if (report.outcome === 'success') target.successes += 1;
      else target.failures += 1;
      target.realizedPnlUsd += report.realizedPnlUsd;
      target.gasSpentUsd += report.gasCostUsd ?? 0;
    }
    this.byStrategy.set(report.kind, stats);
    gauge.realizedPnlUsd.set(this.totals.realizedPnlUsd);
  }
}
