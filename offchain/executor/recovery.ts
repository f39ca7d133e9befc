import type { Notifier } from '../infra/alerts';
import type { AppConfig } from '../infra/config';
import { EndpointsExhaustedError, errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import { counter } from '../infra/metrics';
import { sleep } from '../infra/time';
import type { StrategyKind } from '../pipeline/types';
import { cancellation, speedUp, type Replacement } from './build_tx';
import type { NonceSequencer, Submission } from './nonce';
import type { TransactionSender } from './send_tx';

export type RecoveryAction = 'cancel' | 'speed-up';

export type RecoveryResult = {
  nonce: number;
  action: RecoveryAction;
  hash?: string;
  error?: string;
};

type RecoveryCfg = {
  nonce: AppConfig['nonce'];
  timeCriticalKinds: readonly StrategyKind[];
};

const recoveryLog = log.child({ module: 'executor.recovery' });

/**
 * Chooses between cancelling and speeding up what the sequencer reports as
 * stuck. Time-critical kinds are cancelled outright (the opportunity is gone
 * by now); everything else is sped up until `maxSpeedUps`, then cancelled.
 */
export function chooseAction(submission: Submission, cfg: RecoveryCfg): RecoveryAction {
  if (submission.cancelled) return 'cancel';
  if (cfg.timeCriticalKinds.includes(submission.kind)) return 'cancel';
  if (submission.replacements >= cfg.nonce.maxSpeedUps) return 'cancel';
  return 'speed-up';
}

export class StuckTransactionResolver {
  constructor(
    private readonly nonces: NonceSequencer,
    private readonly sender: TransactionSender,
    private readonly cfg: RecoveryCfg,
    private readonly notifier: Notifier,
  ) {}

  /** One monitoring pass: settle what was mined, then replace what is stuck. */
  async resolveOnce(): Promise<RecoveryResult[]> {
    await this.nonces.settle();
    const block = await this.sender.currentBlock();
    const stuck = this.nonces.stuck(block, this.cfg.nonce.stuckAfterBlocks);
    const results: RecoveryResult[] = [];
    for (const entry of stuck) {
      results.push(await this.replace(entry.nonce, entry, block));
    }
    return results;
  }

  /** Confirmation timed out for `nonce`; handle it without waiting for the block threshold. */
  async handleTimedOut(nonce: number): Promise<RecoveryResult | null> {
    const submission = this.nonces.submission(nonce);
    if (!submission) return null;
    const block = await this.sender.currentBlock();
    return this.replace(nonce, submission, block);
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.cfg.nonce.monitorMs, signal);
      if (signal.aborted) break;
      try {
        await this.resolveOnce();
      } catch (err) {
        if (err instanceof EndpointsExhaustedError) throw err;
        recoveryLog.warn({ err: errorMessage(err) }, 'stuck-monitor-pass-failed');
      }
    }
  }

  private async replace(nonce: number, submission: Submission, block: bigint): Promise<RecoveryResult> {
    const action = chooseAction(submission, this.cfg);
    const replacement: Replacement =
      action === 'cancel'
        ? cancellation(this.sender.identity, submission.fees)
        : speedUp({
            to: submission.to,
            data: submission.data,
            value: submission.value,
            gasLimit: submission.gasLimit,
            fees: submission.fees,
          });
    try {
      const hash = await this.sender.send(nonce, replacement);
      await this.nonces.recordReplacement(nonce, {
        hash,
        fees: replacement.fees,
        to: replacement.to,
        data: replacement.data,
        value: replacement.value,
        gasLimit: replacement.gasLimit,
        cancelled: replacement.cancelled,
        submittedBlock: block,
      });
      counter.stuckResolved.inc({ action });
      recoveryLog.warn(
        {
          nonce,
          action,
          previousHash: submission.hash,
          hash,
          kind: submission.kind,
          maxFeePerGas: replacement.fees.maxFeePerGas.toString(),
          maxPriorityFeePerGas: replacement.fees.maxPriorityFeePerGas.toString(),
        },
        'stuck-tx-replaced',
      );
      if (action === 'cancel') {
        this.notifier.notify('stuck transaction cancelled', { nonce, kind: submission.kind, hash }, 'warn');
      }
      return { nonce, action, hash };
    } catch (err) {
      if (err instanceof EndpointsExhaustedError) throw err;
      const message = errorMessage(err);
      recoveryLog.error({ nonce, action, err: message }, 'stuck-tx-replacement-failed');
      return { nonce, action, error: message };
    }
  }
}
