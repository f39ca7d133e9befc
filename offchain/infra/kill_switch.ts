import fs from 'fs';
import type { Notifier } from './alerts';
import type { RiskCfg } from './config';
import { RiskTrippedError } from './errors';
import { Mutex } from './lock';
import { log } from './logger';
import { gauge } from './metrics';
import { dayIndex, sleep, systemClock, type Clock } from './time';

export type RiskState = {
  dayId: number;
  accumulatedLossUsd: number;
  realizedPnlUsd: number;
  failedTxCount: number;
  tripped: boolean;
  tripReason: string | null;
  trippedAt: number | null;
};

const riskLog = log.child({ module: 'infra.kill_switch' });

/**
 * Armed until same-day realized loss reaches the ceiling (or someone trips it
 * by hand), then tripped until an explicit reset. The failed-transaction count
 * only raises a notification. Every mutation runs under one mutex.
 */
export class RiskGovernor {
  private readonly lock = new Mutex();
  private state: RiskState;
  private failureAlerted = false;
  private lossAlerted = false;

  constructor(
    private readonly cfg: RiskCfg,
    private readonly notifier: Notifier,
    private readonly clock: Clock = systemClock,
  ) {
    this.state = {
      dayId: dayIndex(clock()),
      accumulatedLossUsd: 0,
      realizedPnlUsd: 0,
      failedTxCount: 0,
      tripped: false,
      tripReason: null,
      trippedAt: null,
    };
    this.publish();
  }

  isTripped(): boolean {
    return this.state.tripped;
  }

  assertArmed(): void {
    if (this.state.tripped) throw new RiskTrippedError(this.state.tripReason ?? 'unknown');
  }

  status(): RiskState {
    const today = dayIndex(this.clock());
    if (today === this.state.dayId) return { ...this.state };
    return { ...this.state, dayId: today, accumulatedLossUsd: 0, realizedPnlUsd: 0, failedTxCount: 0 };
  }

  /** Realized PnL of one execution; only the negative part counts toward the ceiling. */
  recordPnl(pnlUsd: number): Promise<void> {
    return this.lock.runExclusive(() => {
      this.rollover();
      this.state.realizedPnlUsd += pnlUsd;
      if (pnlUsd < 0) this.addLoss(-pnlUsd);
      this.publish();
    });
  }

  recordLoss(lossUsd: number): Promise<void> {
    return this.lock.runExclusive(() => {
      this.rollover();
      const loss = Math.abs(lossUsd);
      this.state.realizedPnlUsd -= loss;
      this.addLoss(loss);
      this.publish();
    });
  }

  recordFailure(reason: string): Promise<void> {
    return this.lock.runExclusive(() => {
      this.rollover();
      this.state.failedTxCount += 1;
      riskLog.warn({ reason, failedTxCount: this.state.failedTxCount }, 'risk-failure-recorded');
      if (this.state.failedTxCount >= this.cfg.maxFailedTxPerDay && !this.failureAlerted) {
        this.failureAlerted = true;
        this.notifier.notify(
          'failed transaction ceiling reached',
          { failedTxCount: this.state.failedTxCount, max: this.cfg.maxFailedTxPerDay, lastReason: reason },
          'warn',
        );
      }
      this.publish();
    });
  }

  trip(reason: string): Promise<void> {
    return this.lock.runExclusive(() => {
      this.rollover();
      this.tripLocked(reason);
    });
  }

  reset(operator = 'manual'): Promise<void> {
    return this.lock.runExclusive(() => {
      this.rollover();
      if (!this.state.tripped) return;
      riskLog.warn({ operator, previousReason: this.state.tripReason }, 'kill-switch-reset');
      this.state.tripped = false;
      this.state.tripReason = null;
      this.state.trippedAt = null;
      this.lossAlerted = false;
      this.notifier.notify('kill switch reset', { operator }, 'info');
      this.publish();
    });
  }

  /** Trips the governor when the configured kill file appears. */
  async watchKillFile(signal: AbortSignal): Promise<void> {
    const file = this.cfg.killFile?.trim();
    if (!file) return;
    riskLog.info({ file }, 'kill-file-watch-started');
    while (!signal.aborted) {
      if (!this.state.tripped && fs.existsSync(file)) {
        await this.trip(`kill file present: ${file}`);
      }
      await sleep(this.cfg.killFilePollMs, signal);
    }
  }

  private addLoss(loss: number): void {
    this.state.accumulatedLossUsd += loss;
    if (this.state.tripped || this.state.accumulatedLossUsd < this.cfg.maxDailyLossUsd) return;
    const reason = `daily loss ${this.state.accumulatedLossUsd.toFixed(2)} reached ceiling ${this.cfg.maxDailyLossUsd}`;
    if (this.cfg.autoTrip) {
      this.tripLocked(reason);
      return;
    }
    if (!this.lossAlerted) {
      this.lossAlerted = true;
      riskLog.error({ reason }, 'loss-ceiling-reached-auto-trip-disabled');
      this.notifier.notify('loss ceiling reached', { reason, autoTrip: false }, 'critical');
    }
  }

  private tripLocked(reason: string): void {
    if (this.state.tripped) return;
    this.state.tripped = true;
    this.state.tripReason = reason;
    this.state.trippedAt = this.clock();
    riskLog.error({ reason, lossUsd: this.state.accumulatedLossUsd }, 'kill-switch-tripped');
    this.notifier.notify('kill switch tripped', { reason, lossUsd: this.state.accumulatedLossUsd }, 'critical');
    this.publish();
  }

  // Day boundary clears the counters; the tripped flag survives it.
  private rollover(): void {
    const today = dayIndex(this.clock());
    if (today === this.state.dayId) return;
    riskLog.info(
      { from: this.state.dayId, to: today, lossUsd: this.state.accumulatedLossUsd, failedTx: this.state.failedTxCount },
      'risk-day-rollover',
    );
    this.state.dayId = today;
    this.state.accumulatedLossUsd = 0;
    this.state.realizedPnlUsd = 0;
    this.state.failedTxCount = 0;
    this.failureAlerted = false;
    this.lossAlerted = false;
    this.publish();
  }

  private publish(): void {
    gauge.riskTripped.set(this.state.tripped ? 1 : 0);
    gauge.dailyLossUsd.set(this.state.accumulatedLossUsd);
    gauge.dailyFailedTx.set(this.state.failedTxCount);
  }
}
