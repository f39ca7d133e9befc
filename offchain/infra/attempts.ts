import type { ExecutionReport } from '../pipeline/types';
import { classifyDbError, type Db } from './db';
import { log } from './logger';

const CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS engine_attempts (
  id BIGSERIAL PRIMARY KEY,
  cycle_id INTEGER NOT NULL,
  opportunity_id TEXT NOT NULL,
  strategy TEXT NOT NULL,
  outcome TEXT NOT NULL,
  reason TEXT,
  tx_hash TEXT,
  nonce INTEGER,
  expected_profit_usd DOUBLE PRECISION NOT NULL,
  realized_pnl_usd DOUBLE PRECISION NOT NULL,
  details JSONB,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`;

const CREATE_INDEX = `
CREATE INDEX IF NOT EXISTS idx_engine_attempts_strategy_created
  ON engine_attempts(strategy, created_at DESC)`;

const DB_ERROR_LOG_WINDOW_MS = 60_000;

/** Durable trail of execution reports. A missing or failing database never blocks trading. */
export interface AttemptRecorder {
  record(report: ExecutionReport, details?: Record<string, unknown>): Promise<void>;
}

export class AttemptLedger implements AttemptRecorder {
  private readonly ledgerLog = log.child({ module: 'infra.attempts' });
  private lastErrorLoggedAt = 0;
  private lastErrorKey: string | null = null;

  constructor(private readonly db: Db | null) {}

  async init(): Promise<void> {
    if (!this.db) {
      this.ledgerLog.warn('attempt-store-disabled');
      return;
    }
    await this.db.query(CREATE_TABLE);
    await this.db.query(CREATE_INDEX);
  }

  async record(report: ExecutionReport, details?: Record<string, unknown>): Promise<void> {
    if (!this.db) return;
    try {
      await this.db.query(
        `INSERT INTO engine_attempts
          (cycle_id, opportunity_id, strategy, outcome, reason, tx_hash, nonce, expected_profit_usd, realized_pnl_usd, details)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          report.cycleId,
          report.opportunityId,
          report.kind,
          report.outcome,
          report.reason ?? null,
          report.hash ?? null,
          report.nonce ?? null,
          report.expectedProfitUsd,
          report.realizedPnlUsd,
          details ? JSON.stringify(details) : null,
        ],
      );
    } catch (err) {
      this.logFailure(err);
    }
  }

  private logFailure(err: unknown): void {
    const info = classifyDbError(err);
    const key = info.code ?? info.message;
    const now = Date.now();
    const repeated = key === this.lastErrorKey && now - this.lastErrorLoggedAt < DB_ERROR_LOG_WINDOW_MS;
    const payload = { code: info.code, category: info.category, message: info.message, target: this.db?.target };
    if (repeated) {
      this.ledgerLog.debug(payload, 'attempt-db-error');
      return;
    }
    this.ledgerLog.warn(payload, 'attempt-db-error');
    this.lastErrorLoggedAt = now;
    this.lastErrorKey = key;
  }
}
