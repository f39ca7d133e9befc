import WebSocket from 'ws';
import type { Address, Hash, Hex } from 'viem';
import { z } from 'zod';
import type { MempoolCfg } from '../infra/config';
import type { EndpointManager } from '../infra/endpoints';
import { EndpointsExhaustedError, errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import { counter, gauge } from '../infra/metrics';
import type { ChainTransaction } from '../infra/rpc_clients';
import { sleep, systemClock, type Clock } from '../infra/time';

// UniswapV2-style router entry points.
export const SWAP_SELECTORS: ReadonlySet<string> = new Set([
  '0x38ed1739', // swapExactTokensForTokens
  '0x8803dbee', // swapTokensForExactTokens
  '0x7ff36ab5', // swapExactETHForTokens
  '0x4a25d94a', // swapTokensForExactETH
  '0x18cbafe5', // swapExactTokensForETH
  '0xfb3bdb41', // swapETHForExactTokens
]);

export type FeedState = 'disconnected' | 'connecting' | 'subscribed';

export type SwapCandidate = {
  hash: Hash;
  from: Address;
  router: Address;
  selector: Hex;
  input: Hex;
  value: bigint;
  /** Fee per gas the sender bid (legacy price or EIP-1559 max fee), wei. */
  feePerGas: bigint | null;
  seenAt: number;
};

/** Read side handed to strategies. */
export interface CandidateView {
  candidates(): SwapCandidate[];
  get(hash: Hash): SwapCandidate | undefined;
}

export type SocketEvents = {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(reason: string): void;
  onError(err: Error): void;
};

export interface SocketHandle {
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string, events: SocketEvents) => SocketHandle;

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export const wsSocketFactory: SocketFactory = (url, events) => {
  const socket = new WebSocket(url);
  socket.on('open', () => events.onOpen());
  socket.on('message', (data) => events.onMessage(rawToString(data)));
  socket.on('close', (code, reason) => events.onClose(`${code}${reason.length ? ` ${reason.toString('utf8')}` : ''}`));
  socket.on('error', (err) => events.onError(err));
  return {
    send: (data) => socket.send(data),
    close: () => socket.close(),
  };
};

const SUBSCRIBE_ID = 1;

const HashSchema = z.custom<Hash>((value) => typeof value === 'string' && /^0x[0-9a-fA-F]{64}$/.test(value));

const SubscribeReplySchema = z.object({
  id: z.literal(SUBSCRIBE_ID),
  result: z.string().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

const NotificationSchema = z.object({
  method: z.literal('eth_subscription'),
  params: z.object({ subscription: z.string(), result: HashSchema }),
});

const WEI_PER_ETH = 10n ** 18n;

function toWei(eth: number): bigint {
  // Six decimals is plenty for a filter threshold.
  return (BigInt(Math.round(eth * 1e6)) * WEI_PER_ETH) / 1_000_000n;
}

/** Returns the candidate shape for a swap worth watching, otherwise null. */
export function classifyPending(tx: ChainTransaction, minValueWei: bigint, seenAt: number): SwapCandidate | null {
  if (!tx.to) return null;
  if (tx.input.length < 10) return null;
  const selector = tx.input.slice(0, 10).toLowerCase();
  if (!SWAP_SELECTORS.has(selector)) return null;
  if (tx.value < minValueWei) return null;
  return {
    hash: tx.hash,
    from: tx.from,
    router: tx.to,
    selector: `0x${selector.slice(2)}`,
    input: tx.input,
    value: tx.value,
    feePerGas: tx.maxFeePerGas ?? tx.gasPrice ?? null,
    seenAt,
  };
}

const mempoolLog = log.child({ module: 'realtime.mempool' });

type MempoolOptions = {
  socketFactory?: SocketFactory;
  clock?: Clock;
};

/**
 * Pending-transaction feed. One stream message is handled at a time; the
 * per-hash detail lookup runs as a separate bounded job.
 */
export class MempoolFeed implements CandidateView {
  private feedState: FeedState = 'disconnected';
  private subscriptionId: string | null = null;
  private readonly cache = new Map<Hash, SwapCandidate>();
  private readonly lookups = new Map<Hash, Promise<void>>();
  private readonly minValueWei: bigint;
  private readonly socketFactory: SocketFactory;
  private readonly clock: Clock;

  constructor(
    private readonly endpoints: EndpointManager,
    private readonly cfg: MempoolCfg,
    options: MempoolOptions = {},
  ) {
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.clock = options.clock ?? systemClock;
    this.minValueWei = toWei(cfg.minValueEth);
    this.publishState();
  }

  state(): FeedState {
    return this.feedState;
  }

  candidates(): SwapCandidate[] {
    this.evictExpired();
    return [...this.cache.values()];
  }

  get(hash: Hash): SwapCandidate | undefined {
    this.evictExpired();
    return this.cache.get(hash);
  }

  /** Connects, subscribes and reconnects with backoff until the signal aborts. */
  async run(signal: AbortSignal): Promise<void> {
    let delay = this.cfg.reconnectDelayMs;
    while (!signal.aborted) {
      const url = this.endpoints.subscribeUrl();
      if (!url) {
        mempoolLog.warn({ delayMs: delay }, 'mempool-no-subscribe-endpoint');
      } else {
        const { reason, subscribed } = await this.session(url, signal);
        if (signal.aborted) break;
        if (subscribed) delay = this.cfg.reconnectDelayMs;
        counter.mempoolReconnects.inc();
        mempoolLog.warn({ reason, delayMs: delay }, 'mempool-disconnected');
      }
      await sleep(delay, signal);
      delay = Math.min(delay * 2, this.cfg.maxReconnectDelayMs);
    }
    await this.drain();
    mempoolLog.info({ candidates: this.cache.size }, 'mempool-feed-stopped');
  }

  /** Waits for in-flight detail lookups. */
  async drain(): Promise<void> {
    await Promise.all([...this.lookups.values()]);
  }

  private session(url: string, signal: AbortSignal): Promise<{ reason: string; subscribed: boolean }> {
    return new Promise((resolve) => {
      let settled = false;
      let subscribed = false;
      let handle: SocketHandle | null = null;

      const finish = (reason: string): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        this.subscriptionId = null;
        this.setState('disconnected');
        handle?.close();
        resolve({ reason, subscribed });
      };
      const onAbort = (): void => finish('stopped');

      this.setState('connecting');
      signal.addEventListener('abort', onAbort, { once: true });
      mempoolLog.info({ url: redact(url) }, 'mempool-connecting');

      try {
        handle = this.socketFactory(url, {
          onOpen: () => {
            handle?.send(
              JSON.stringify({ jsonrpc: '2.0', id: SUBSCRIBE_ID, method: 'eth_subscribe', params: ['newPendingTransactions'] }),
            );
          },
          onMessage: (data) => {
            if (settled) return;
            const outcome = this.handleMessage(data);
            if (outcome === 'subscribed') subscribed = true;
            else if (outcome !== null) finish(outcome);
          },
          onClose: (reason) => finish(`closed: ${reason}`),
          onError: (err) => finish(`error: ${err.message}`),
        });
      } catch (err) {
        finish(`error: ${errorMessage(err)}`);
      }
    });
  }

  /** Returns 'subscribed' on the ack, a failure reason to drop the session, or null. */
  private handleMessage(data: string): 'subscribed' | string | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      counter.mempoolMessages.inc({ result: 'malformed' });
      mempoolLog.debug({ err: errorMessage(err) }, 'mempool-message-unparseable');
      return null;
    }

    const reply = SubscribeReplySchema.safeParse(parsed);
    if (reply.success) {
      if (reply.data.error || !reply.data.result) {
        return `subscribe-failed: ${reply.data.error?.message ?? 'no subscription id'}`;
      }
      this.subscriptionId = reply.data.result;
      this.setState('subscribed');
      mempoolLog.info({ subscription: this.subscriptionId }, 'mempool-subscribed');
      return 'subscribed';
    }

    const note = NotificationSchema.safeParse(parsed);
    if (!note.success || note.data.params.subscription !== this.subscriptionId) {
      counter.mempoolMessages.inc({ result: 'ignored' });
      return null;
    }
    this.enqueue(note.data.params.result);
    return null;
  }

  private enqueue(hash: Hash): void {
    if (this.cache.has(hash) || this.lookups.has(hash)) {
      counter.mempoolMessages.inc({ result: 'duplicate' });
      return;
    }
    if (this.lookups.size >= this.cfg.maxConcurrentLookups) {
      counter.mempoolMessages.inc({ result: 'dropped-busy' });
      return;
    }
    const job = this.lookup(hash).finally(() => {
      this.lookups.delete(hash);
    });
    this.lookups.set(hash, job);
  }

  private async lookup(hash: Hash): Promise<void> {
    try {
      const tx = await this.endpoints.execute('mempool-lookup', (client) => client.getTransaction(hash));
      if (!tx) {
        counter.mempoolMessages.inc({ result: 'vanished' });
        return;
      }
      const candidate = classifyPending(tx, this.minValueWei, this.clock());
      if (!candidate) {
        counter.mempoolMessages.inc({ result: 'filtered' });
        return;
      }
      this.insert(candidate);
      counter.mempoolMessages.inc({ result: 'candidate' });
    } catch (err) {
      counter.mempoolMessages.inc({ result: 'lookup-failed' });
      const level = err instanceof EndpointsExhaustedError ? 'error' : 'debug';
      mempoolLog[level]({ hash, err: errorMessage(err) }, 'mempool-lookup-failed');
    }
  }

  private insert(candidate: SwapCandidate): void {
    this.cache.set(candidate.hash, candidate);
    while (this.cache.size > this.cfg.maxCandidates) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    gauge.mempoolCandidates.set(this.cache.size);
  }

  private evictExpired(): void {
    const cutoff = this.clock() - this.cfg.windowMs;
    for (const [hash, candidate] of this.cache) {
      if (candidate.seenAt <= cutoff) this.cache.delete(hash);
    }
    gauge.mempoolCandidates.set(this.cache.size);
  }

  private setState(next: FeedState): void {
    if (next === this.feedState) return;
    mempoolLog.debug({ from: this.feedState, to: next }, 'mempool-state');
    this.feedState = next;
    this.publishState();
  }

  private publishState(): void {
    for (const state of ['disconnected', 'connecting', 'subscribed'] as const) {
      gauge.mempoolState.set({ state }, state === this.feedState ? 1 : 0);
    }
  }
}

function redact(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return 'invalid-url';
  }
}
