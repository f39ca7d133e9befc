import type { Address, Hash, Hex } from 'viem';
import type { EndpointManager } from '../infra/endpoints';
import { Mutex } from '../infra/lock';
import { log } from '../infra/logger';
import { gauge } from '../infra/metrics';
import type { FeeParameters, StrategyKind } from '../pipeline/types';

export type Submission = {
  hash: Hash;
  kind: StrategyKind;
  to: Address;
  data: Hex;
  value: bigint;
  fees: FeeParameters;
  gasLimit: bigint;
  cancelled: boolean;
  submittedBlock: bigint;
  submittedAt: number;
  replacements: number;
};

export type StuckSubmission = Submission & { nonce: number; ageBlocks: bigint };

const nonceLog = log.child({ module: 'executor.nonce' });

/**
 * Issues sequence numbers for one signing identity. Allocation and its
 * bookkeeping happen under one mutex; network reads (resync, settle) happen
 * before the lock is taken.
 */
export class NonceSequencer {
  private next: number | null = null;
  private readonly inFlight = new Map<number, Submission | null>();
  private readonly lock = new Mutex();

  constructor(readonly address: Address, private readonly endpoints: EndpointManager) {}

  async allocate(): Promise<number> {
    return this.lock.runExclusive(() => {
      if (this.next === null) throw new Error('nonce sequencer used before resync');
      const nonce = this.next;
      this.next += 1;
      this.inFlight.set(nonce, null);
      this.publish();
      return nonce;
    });
  }

  async confirm(nonce: number): Promise<void> {
    await this.lock.runExclusive(() => {
      this.inFlight.delete(nonce);
      this.publish();
    });
  }

  /** Hands back a nonce whose transaction never reached the network. */
  async release(nonce: number): Promise<void> {
    await this.lock.runExclusive(() => {
      if (!this.inFlight.delete(nonce)) return;
      if (this.next === nonce + 1) this.next = nonce;
      else nonceLog.warn({ nonce, next: this.next }, 'nonce-released-with-gap');
      this.publish();
    });
  }

  /** Drops all in-flight bookkeeping and restarts from the network's pending count. */
  async resync(): Promise<number> {
    const pending = await this.endpoints.execute('nonce-resync', (client) =>
      client.getTransactionCount(this.address, 'pending'),
    );
    return this.lock.runExclusive(() => {
      const previous = this.next;
      this.inFlight.clear();
      this.next = pending;
      this.publish();
      nonceLog.info({ address: this.address, previous, next: pending }, 'nonce-resynced');
      return pending;
    });
  }

  pendingCount(): number {
    return this.inFlight.size;
  }

  peekNext(): number | null {
    return this.next;
  }

  async markSubmitted(nonce: number, submission: Omit<Submission, 'replacements'>): Promise<void> {
    await this.lock.runExclusive(() => {
      if (!this.inFlight.has(nonce)) {
        nonceLog.warn({ nonce }, 'nonce-submitted-not-in-flight');
        return;
      }
      this.inFlight.set(nonce, { ...submission, replacements: 0 });
    });
  }

  /** A same-nonce replacement (speed-up or cancel) went out; the stuck clock restarts. */
  async recordReplacement(
    nonce: number,
    replacement: Pick<Submission, 'hash' | 'fees' | 'to' | 'data' | 'value' | 'gasLimit' | 'cancelled' | 'submittedBlock'>,
  ): Promise<void> {
    await this.lock.runExclusive(() => {
      const current = this.inFlight.get(nonce);
      if (!current) return;
      this.inFlight.set(nonce, { ...current, ...replacement, replacements: current.replacements + 1 });
    });
  }

  submission(nonce: number): Submission | null {
    return this.inFlight.get(nonce) ?? null;
  }

  /** Submissions that have been pending for at least `thresholdBlocks`. */
  stuck(currentBlock: bigint, thresholdBlocks: number): StuckSubmission[] {
    const out: StuckSubmission[] = [];
    for (const [nonce, submission] of this.inFlight) {
      if (!submission) continue;
      const ageBlocks = currentBlock - submission.submittedBlock;
      if (ageBlocks >= BigInt(thresholdBlocks)) out.push({ ...submission, nonce, ageBlocks });
    }
    return out.sort((a, b) => a.nonce - b.nonce);
  }

  /** Confirms every in-flight nonce below the identity's mined transaction count. */
  async settle(): Promise<number[]> {
    const mined = await this.endpoints.execute('nonce-settle', (client) =>
      client.getTransactionCount(this.address, 'latest'),
    );
    return this.lock.runExclusive(() => {
      const settled: number[] = [];
      for (const nonce of [...this.inFlight.keys()]) {
        if (nonce < mined) {
          this.inFlight.delete(nonce);
          settled.push(nonce);
        }
      }
      if (settled.length > 0) {
        this.publish();
        nonceLog.debug({ settled }, 'nonces-settled');
      }
      return settled.sort((a, b) => a - b);
    });
  }

  private publish(): void {
    gauge.noncesInFlight.set(this.inFlight.size);
  }
}
