import type { Hash } from 'viem';
import type { Notifier } from '../infra/alerts';
import type { AttemptRecorder } from '../infra/attempts';
import { gasLimitFor, type AppConfig } from '../infra/config';
import type { EndpointManager } from '../infra/endpoints';
import { classifyRpcError, EndpointsExhaustedError, errorMessage, type RpcErrorKind } from '../infra/errors';
import type { RiskGovernor } from '../infra/kill_switch';
import { log } from '../infra/logger';
import { counter, histogram } from '../infra/metrics';
import type { ChainReceipt } from '../infra/rpc_clients';
import { systemClock, type Clock } from '../infra/time';
import { buildIntent } from '../executor/build_tx';
import type { GasPricer } from '../executor/gas';
import type { NonceSequencer } from '../executor/nonce';
import type { StuckTransactionResolver } from '../executor/recovery';
import type { TransactionSender } from '../executor/send_tx';
import { simulateIntent } from '../executor/simulate';
import type { StrategyProducer } from './strategies';
import type { ExecutionReport, Opportunity, TransactionIntent } from './types';

export type PipelineDeps = {
  cfg: Pick<AppConfig, 'scheduler' | 'gas'>;
  endpoints: EndpointManager;
  gas: GasPricer;
  nonces: NonceSequencer;
  sender: TransactionSender;
  risk: RiskGovernor;
  recovery: StuckTransactionResolver;
  notifier: Notifier;
  attempts: AttemptRecorder;
  clock?: Clock;
};

const pipelineLog = log.child({ module: 'pipeline.execute' });

/**
 * Drives one selected opportunity through pre-checks, pricing, build,
 * simulation, submission and confirmation. Expected failures end the run with
 * a report; only hard stops (risk tripped, endpoints exhausted) throw.
 */
export class ExecutionPipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async execute(
    opportunity: Opportunity,
    producer: StrategyProducer,
    cycleId: number,
    signal?: AbortSignal,
  ): Promise<ExecutionReport> {
    const { endpoints, gas, risk, cfg } = this.deps;
    const base = {
      cycleId,
      opportunityId: opportunity.id,
      kind: opportunity.kind,
      expectedProfitUsd: opportunity.expectedProfitUsd,
    };
    const runLog = pipelineLog.child({ cycleId, opportunityId: opportunity.id, strategy: opportunity.kind });
    histogram.expectedProfitUsd.observe({ kind: opportunity.kind }, opportunity.expectedProfitUsd);

    // 1. pre-checks
    risk.assertArmed();
    if (!endpoints.isHealthy()) {
      return this.finish({ ...base, outcome: 'skipped', reason: 'endpoint-unhealthy', realizedPnlUsd: 0 }, runLog);
    }

    // 2. price
    const defaultGasLimit = gasLimitFor(cfg.gas, opportunity.kind);
    const baseFee = await gas.jitPrice();
    const quote = gas.tip(opportunity, defaultGasLimit);
    if (!quote.ok) {
      return this.finish({ ...base, outcome: 'skipped', reason: quote.reason, realizedPnlUsd: 0 }, runLog);
    }
    const fees = gas.feeParameters(baseFee, quote.tipWei);

    // 3. build
    let intent: TransactionIntent;
    try {
      const draft = await producer.buildIntent(opportunity, {
        from: this.deps.sender.identity,
        fees,
        gasLimit: defaultGasLimit,
      });
      intent = buildIntent(opportunity.id, opportunity.kind, this.deps.sender.identity, draft, fees);
    } catch (err) {
      if (err instanceof EndpointsExhaustedError) throw err;
      return this.finish(
        { ...base, outcome: 'skipped', reason: `build-failed: ${errorMessage(err)}`, tipGwei: quote.tipGwei, realizedPnlUsd: 0 },
        runLog,
      );
    }

    // 4. simulate
    const sim = await simulateIntent(endpoints, intent);
    if (sim.status === 'rejected') {
      intent.state = 'rejected';
      return this.finish(
        { ...base, outcome: 'simulation-rejected', reason: sim.reason, tipGwei: quote.tipGwei, realizedPnlUsd: 0 },
        runLog,
      );
    }
    if (sim.status === 'ambiguous') {
      counter.ambiguousSimulations.inc({ kind: opportunity.kind });
      if (!cfg.scheduler.allowAmbiguousSimulation) {
        intent.state = 'rejected';
        return this.finish(
          { ...base, outcome: 'simulation-rejected', reason: `ambiguous: ${sim.reason}`, tipGwei: quote.tipGwei, realizedPnlUsd: 0 },
          runLog,
        );
      }
      runLog.warn({ reason: sim.reason }, 'simulation-ambiguous-proceeding');
    }
    intent.state = 'simulated';

    // 5. nonce, sign, submit
    const nonce = await this.deps.nonces.allocate();
    intent.nonce = nonce;
    const sent = await this.submit(nonce, intent);
    if (!sent.ok) {
      runLog.error({ nonce, kind: sent.kind, err: sent.reason }, 'submit-failed');
      // Only a conflict means the local sequence is wrong; other refusals hand back just this nonce.
      if (sent.kind === 'nonce') await this.deps.nonces.resync();
      else await this.deps.nonces.release(nonce);
      await risk.recordFailure(`submit-failed: ${sent.reason}`);
      return this.finish(
        { ...base, outcome: 'submit-failed', reason: sent.reason, nonce, tipGwei: quote.tipGwei, realizedPnlUsd: 0 },
        runLog,
      );
    }
    const { hash, submittedBlock } = sent;
    intent.hash = hash;
    intent.state = 'pending';
    await this.deps.nonces.markSubmitted(nonce, {
      hash,
      kind: intent.kind,
      to: intent.target,
      data: intent.calldata,
      value: intent.value,
      fees: intent.fees,
      gasLimit: intent.gasLimit,
      cancelled: false,
      submittedBlock,
      submittedAt: this.clock(),
    });

    // 6. confirmation
    let receipt: ChainReceipt | null;
    let pollFailed = false;
    try {
      receipt = await this.deps.sender.waitForReceipt(
        hash,
        cfg.scheduler.confirmationTimeoutMs,
        cfg.scheduler.receiptPollMs,
        signal,
      );
    } catch (err) {
      if (err instanceof EndpointsExhaustedError) throw err;
      runLog.error({ nonce, hash, err: errorMessage(err) }, 'receipt-poll-failed');
      receipt = null;
      pollFailed = true;
    }
    const submitted = { ...base, hash, nonce, tipGwei: quote.tipGwei };

    if (!receipt && signal?.aborted && !pollFailed) {
      // Left in flight; the next start resyncs the nonce from the network.
      runLog.warn({ nonce, hash }, 'confirmation-abandoned-on-shutdown');
      return this.finish({ ...submitted, outcome: 'timeout', reason: 'shutdown', realizedPnlUsd: 0 }, runLog);
    }
    if (!receipt) {
      intent.state = 'stuck';
      if (!pollFailed) runLog.warn({ nonce, hash }, 'confirmation-timeout');
      let action: string | undefined;
      try {
        const recovery = await this.deps.recovery.handleTimedOut(nonce);
        if (recovery) {
          action = recovery.error ? `${recovery.action}-failed` : recovery.action;
          if (!recovery.error) intent.state = recovery.action === 'cancel' ? 'cancelled' : 'sped-up';
        }
      } catch (err) {
        if (err instanceof EndpointsExhaustedError) throw err;
        runLog.error({ nonce, err: errorMessage(err) }, 'timeout-recovery-failed');
      }
      await gas.recordOutcome(intent.kind, quote.tipGwei, false);
      await risk.recordFailure(pollFailed ? 'receipt-poll-failed' : 'confirmation-timeout');
      const reason = pollFailed ? (action ? `receipt-poll-failed: ${action}` : 'receipt-poll-failed') : action;
      return this.finish({ ...submitted, outcome: 'timeout', reason, realizedPnlUsd: 0 }, runLog);
    }

    await this.deps.nonces.confirm(nonce);
    const gasCostUsd = gas.costUsd(receipt.gasUsed, receipt.effectiveGasPrice);
    if (receipt.status === 'success') {
      intent.state = 'confirmed';
      const realizedPnlUsd = opportunity.expectedProfitUsd - gasCostUsd;
      await gas.recordOutcome(intent.kind, quote.tipGwei, true);
      await risk.recordPnl(realizedPnlUsd);
      return this.finish({ ...submitted, outcome: 'success', gasCostUsd, realizedPnlUsd }, runLog);
    }

    intent.state = 'reverted';
    await gas.recordOutcome(intent.kind, quote.tipGwei, false);
    await risk.recordFailure('reverted');
    await risk.recordPnl(-gasCostUsd);
    return this.finish({ ...submitted, outcome: 'reverted', gasCostUsd, realizedPnlUsd: -gasCostUsd }, runLog);
  }

  private async submit(
    nonce: number,
    intent: TransactionIntent,
  ): Promise<{ ok: true; hash: Hash; submittedBlock: bigint } | { ok: false; kind: RpcErrorKind; reason: string }> {
    try {
      const submittedBlock = await this.deps.sender.currentBlock();
      const hash = await this.deps.sender.send(nonce, {
        to: intent.target,
        data: intent.calldata,
        value: intent.value,
        gasLimit: intent.gasLimit,
        fees: intent.fees,
      });
      return { ok: true, hash, submittedBlock };
    } catch (err) {
      if (err instanceof EndpointsExhaustedError) throw err;
      return { ok: false, kind: classifyRpcError(err), reason: errorMessage(err) };
    }
  }

  private async finish(report: ExecutionReport, runLog: typeof pipelineLog): Promise<ExecutionReport> {
    counter.executions.inc({ kind: report.kind, outcome: report.outcome });
    const level = report.outcome === 'success' || report.outcome === 'skipped' ? 'info' : 'warn';
    runLog[level](
      {
        outcome: report.outcome,
        reason: report.reason,
        expectedProfitUsd: report.expectedProfitUsd,
        realizedPnlUsd: report.realizedPnlUsd,
        hash: report.hash,
        nonce: report.nonce,
        tipGwei: report.tipGwei,
      },
      'execution-report',
    );
    if (report.outcome === 'reverted' || report.outcome === 'timeout') {
      this.deps.notifier.notify(
        `execution ${report.outcome}`,
        { cycleId: report.cycleId, strategy: report.kind, expectedProfitUsd: report.expectedProfitUsd, hash: report.hash },
        'warn',
      );
    }
    await this.deps.attempts.record(report);
    return report;
  }
}
