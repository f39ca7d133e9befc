import type { AppConfig, Capability } from './config';
import { classifyRpcError, EndpointsExhaustedError, errorMessage, type RpcErrorKind } from './errors';
import { log } from './logger';
import { counter, gauge } from './metrics';
import { createRpcClient, type RpcClient, type RpcClientFactory } from './rpc_clients';
import { sleep, systemClock, type Clock } from './time';

type EndpointsCfg = AppConfig['endpoints'];

export type EndpointTier = {
  readonly name: string;
  readonly priority: number;
  readonly capabilities: readonly Capability[];
  readonly ws?: string;
  requestCount: number;
  failureCount: number;
  consecutiveFailures: number;
  lastFailureAt: number | null;
};

export type EndpointHandle = {
  tier: string;
  client: RpcClient;
};

export type EndpointStatus = {
  current: string;
  exhausted: boolean;
  healthy: boolean;
  tiers: Array<Omit<EndpointTier, 'ws'>>;
};

export type EndpointManagerOptions = {
  clientFactory?: RpcClientFactory;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
};

const endpointLog = log.child({ module: 'infra.endpoints' });

/**
 * Owns the ordered endpoint tiers and the process-wide current-tier pointer.
 * The pointer is a plain string swapped in place: readers never lock, and
 * only rate-limit failover, `force` and `reset` write it.
 */
export class EndpointManager {
  private readonly tiers = new Map<string, EndpointTier>();
  private readonly clients = new Map<string, RpcClient>();
  private readonly sequence: readonly string[];
  private readonly primary: string;
  private current: string;
  private exhausted = false;
  private readonly clock: Clock;
  private readonly pause: (ms: number) => Promise<void>;

  constructor(private readonly cfg: EndpointsCfg, options: EndpointManagerOptions = {}) {
    const factory = options.clientFactory ?? createRpcClient;
    this.clock = options.clock ?? systemClock;
    this.pause = options.sleep ?? ((ms) => sleep(ms));

    const ordered = [...cfg.tiers].sort((a, b) => a.priority - b.priority);
    for (const tier of ordered) {
      this.tiers.set(tier.name, {
        name: tier.name,
        priority: tier.priority,
        capabilities: tier.capabilities,
        ws: tier.ws,
        requestCount: 0,
        failureCount: 0,
        consecutiveFailures: 0,
        lastFailureAt: null,
      });
      this.clients.set(tier.name, factory(tier.http, tier.name));
    }
    this.sequence = cfg.fallbackSequence && cfg.fallbackSequence.length > 0
      ? cfg.fallbackSequence
      : ordered.map((tier) => tier.name);
    const first = this.sequence[0];
    if (first === undefined) throw new Error('no endpoint tiers configured');
    this.primary = first;
    this.current = first;
    this.publishTier();
  }

  currentTier(): string {
    return this.current;
  }

  /** Handle bound to the current tier. */
  acquire(): EndpointHandle {
    if (this.exhausted) throw new EndpointsExhaustedError(this.current);
    return { tier: this.current, client: this.clientFor(this.current) };
  }

  /**
   * Records a failed call. A rate-limit on the tier that is still current
   * advances the pointer; one reported against a tier that was already left
   * behind only counts. Running off the end of the sequence is fatal.
   */
  reportFailure(tierName: string, kind: RpcErrorKind): void {
    const tier = this.tiers.get(tierName);
    if (!tier) return;
    tier.failureCount += 1;
    tier.consecutiveFailures += 1;
    tier.lastFailureAt = this.clock();

    if (kind !== 'rate-limited' || tierName !== this.current) return;

    const next = this.nextInSequence(tierName);
    if (!next) {
      this.exhausted = true;
      gauge.endpointsExhausted.set(1);
      endpointLog.fatal({ tier: tierName }, 'endpoints-exhausted');
      throw new EndpointsExhaustedError(tierName);
    }
    endpointLog.warn({ from: tierName, to: next }, 'endpoint-failover');
    counter.failovers.inc({ from: tierName, to: next });
    this.current = next;
    this.publishTier();
  }

  reportSuccess(tierName: string): void {
    const tier = this.tiers.get(tierName);
    if (tier) tier.consecutiveFailures = 0;
  }

  force(tierName: string): void {
    if (!this.tiers.has(tierName)) throw new Error(`unknown endpoint tier ${tierName}`);
    endpointLog.info({ from: this.current, to: tierName }, 'endpoint-forced');
    this.current = tierName;
    this.exhausted = false;
    gauge.endpointsExhausted.set(0);
    this.publishTier();
  }

  /** Explicit recovery back to the head of the fallback sequence. */
  reset(): void {
    if (this.current === this.primary && !this.exhausted) return;
    endpointLog.info({ from: this.current, to: this.primary }, 'endpoint-reset');
    const tier = this.tiers.get(this.primary);
    if (tier) tier.consecutiveFailures = 0;
    this.current = this.primary;
    this.exhausted = false;
    gauge.endpointsExhausted.set(0);
    this.publishTier();
  }

  isHealthy(): boolean {
    if (this.exhausted) return false;
    const tier = this.tiers.get(this.current);
    return tier !== undefined && tier.consecutiveFailures < this.cfg.unhealthyAfter;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  /**
   * Runs `op` against the current tier. Transient failures are retried on the
   * same tier up to `maxRetries` attempts and then surfaced; rate limits fail
   * over immediately; reverts and other call-level errors are surfaced as is.
   */
  async execute<T>(label: string, op: (client: RpcClient) => Promise<T>): Promise<T> {
    for (;;) {
      const handle = this.acquire();
      const tier = this.tiers.get(handle.tier);
      let failedOver = false;
      for (let attempt = 1; attempt <= this.cfg.maxRetries; attempt += 1) {
        if (tier) tier.requestCount += 1;
        try {
          const result = await op(handle.client);
          this.reportSuccess(handle.tier);
          return result;
        } catch (err) {
          const kind = classifyRpcError(err);
          if (kind === 'revert' || kind === 'nonce' || kind === 'rejected') throw err;
          endpointLog.debug({ op: label, tier: handle.tier, kind, attempt, err: errorMessage(err) }, 'endpoint-call-failed');
          this.reportFailure(handle.tier, kind);
          if (kind === 'rate-limited') {
            failedOver = true;
            break;
          }
          if (attempt >= this.cfg.maxRetries) throw err;
          await this.pause(this.cfg.retryDelayMs * attempt);
        }
      }
      if (!failedOver) throw new Error(`endpoint call ${label} made no attempt`);
    }
  }

  /** WebSocket URL of the current tier, else the next subscribe-capable tier after it. */
  subscribeUrl(): string | null {
    const start = Math.max(0, this.sequence.indexOf(this.current));
    for (const name of this.sequence.slice(start)) {
      const tier = this.tiers.get(name);
      if (tier?.ws && tier.capabilities.includes('subscribe')) return tier.ws;
    }
    return null;
  }

  /** Client for one specific tier, bypassing the pointer; used by health probes. */
  clientFor(tierName: string): RpcClient {
    const client = this.clients.get(tierName);
    if (!client) throw new Error(`unknown endpoint tier ${tierName}`);
    return client;
  }

  primaryTier(): string {
    return this.primary;
  }

  status(): EndpointStatus {
    return {
      current: this.current,
      exhausted: this.exhausted,
      healthy: this.isHealthy(),
      tiers: [...this.tiers.values()].map(({ ws: _ws, ...rest }) => ({ ...rest })),
    };
  }

  private nextInSequence(tierName: string): string | null {
    const idx = this.sequence.indexOf(tierName);
    if (idx < 0) return null;
    return this.sequence[idx + 1] ?? null;
  }

  private publishTier(): void {
    for (const name of this.tiers.keys()) {
      gauge.currentTier.set({ tier: name }, name === this.current ? 1 : 0);
    }
  }
}

/**
 * Periodically probes the primary tier while the manager is running on a
 * fallback, and resets the pointer once the primary answers again.
 */
export class EndpointHealthChecker {
  private readonly checkLog = endpointLog.child({ component: 'health-checker' });

  constructor(private readonly endpoints: EndpointManager, private readonly intervalMs: number) {}

  async probeOnce(): Promise<boolean> {
    const primary = this.endpoints.primaryTier();
    if (this.endpoints.currentTier() === primary && !this.endpoints.isExhausted()) return true;
    try {
      await this.endpoints.clientFor(primary).getBlockNumber();
      this.endpoints.reset();
      this.checkLog.info({ tier: primary }, 'primary-endpoint-recovered');
      return true;
    } catch (err) {
      this.checkLog.debug({ tier: primary, err: errorMessage(err) }, 'primary-endpoint-still-down');
      return false;
    }
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;
      await this.probeOnce();
    }
  }
}
