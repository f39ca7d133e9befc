import type Redis from 'ioredis';
import type { Address } from 'viem';
import { signerFromEnv, type Signer } from './infra/accounts';
import { notifierFromEnv, type Notifier } from './infra/alerts';
import { AttemptLedger, type AttemptRecorder } from './infra/attempts';
import { PersistedCache } from './infra/cache';
import type { AppConfig } from './infra/config';
import { createDb, type Db } from './infra/db';
import { EndpointHealthChecker, EndpointManager } from './infra/endpoints';
import { EndpointsExhaustedError, errorMessage, isHardStop, RiskTrippedError } from './infra/errors';
import { RiskGovernor } from './infra/kill_switch';
import { log } from './infra/logger';
import { BatchReader } from './infra/multicall';
import { createRedis } from './infra/redis';
import type { RpcClientFactory } from './infra/rpc_clients';
import { systemClock, type Clock } from './infra/time';
import { GasPricer, TipHistory } from './executor/gas';
import { NonceSequencer } from './executor/nonce';
import { StuckTransactionResolver } from './executor/recovery';
import { TransactionSender } from './executor/send_tx';
import { sweepFunds } from './executor/sweep';
import { ExecutionPipeline } from './pipeline/execute';
import { OpportunityScheduler, type EngineStats } from './pipeline/scheduler';
import { HeuristicScorer, type ConfidenceScorer } from './pipeline/scoring';
import { loadStrategies, type StrategyModuleLoader } from './pipeline/strategies';
import { MempoolFeed, type SocketFactory } from './realtime/mempool';
import { NativePriceRefresher } from './realtime/price_feed';

export interface FlushableNotifier extends Notifier {
  flush(): Promise<void>;
}

/** Everything the engine runs on, built once at startup. */
export type EngineContext = {
  cfg: AppConfig;
  chainId: number;
  executor: Address;
  endpoints: EndpointManager;
  nonces: NonceSequencer;
  gas: GasPricer;
  sender: TransactionSender;
  risk: RiskGovernor;
  recovery: StuckTransactionResolver;
  health: EndpointHealthChecker;
  mempool: MempoolFeed;
  priceFeed: NativePriceRefresher | null;
  scheduler: OpportunityScheduler;
  notifier: FlushableNotifier;
  redis: Redis | null;
  db: Db | null;
};

/** Seams for tests and embedding; anything left out comes from the environment. */
export type EngineOverrides = {
  signer?: { signer: Signer; executor: Address };
  clientFactory?: RpcClientFactory;
  socketFactory?: SocketFactory;
  strategyLoader?: StrategyModuleLoader;
  scorer?: ConfidenceScorer;
  notifier?: FlushableNotifier;
  attempts?: AttemptRecorder;
  redis?: Redis | null;
  db?: Db | null;
  clock?: Clock;
};

const engineLog = log.child({ module: 'orchestrator' });

/**
 * Wires every component. Throws on anything that makes trading impossible:
 * no signing identity, no reachable endpoint, a chain id mismatch or a
 * strategy module that fails to load.
 */
export async function createEngineContext(cfg: AppConfig, overrides: EngineOverrides = {}): Promise<EngineContext> {
  const clock = overrides.clock ?? systemClock;
  const { signer, executor } = overrides.signer ?? signerFromEnv();
  const notifier = overrides.notifier ?? notifierFromEnv(cfg.alerts.minIntervalMs);
  const redis = overrides.redis !== undefined ? overrides.redis : createRedis();
  const db = overrides.db !== undefined ? overrides.db : createDb();
  const cache = new PersistedCache(redis, 'engine-cache', clock);

  let attempts = overrides.attempts;
  if (!attempts) {
    const ledger = new AttemptLedger(db);
    await ledger.init();
    attempts = ledger;
  }

  const endpoints = new EndpointManager(cfg.endpoints, { clientFactory: overrides.clientFactory, clock });
  const chainId = await endpoints.execute('chain-id', (client) => client.getChainId());
  if (chainId !== cfg.chainId) {
    throw new Error(`endpoint tier ${endpoints.currentTier()} serves chain ${chainId}, config expects ${cfg.chainId}`);
  }

  const nonces = new NonceSequencer(executor, endpoints);
  await nonces.resync();
  const history = new TipHistory(cfg.gas.historyMaxSamples, cache);
  await history.load();
  const gas = new GasPricer(cfg.gas, endpoints, history, clock);
  const sender = new TransactionSender(endpoints, signer, executor, chainId, clock);
  const risk = new RiskGovernor(cfg.risk, notifier, clock);
  const recovery = new StuckTransactionResolver(
    nonces,
    sender,
    { nonce: cfg.nonce, timeCriticalKinds: cfg.gas.timeCriticalKinds },
    notifier,
  );
  const health = new EndpointHealthChecker(endpoints, cfg.endpoints.healthCheckMs);
  const reader = new BatchReader(endpoints, cfg.multicall.address, cfg.multicall.maxBatchSize);
  const mempool = new MempoolFeed(endpoints, cfg.mempool, { socketFactory: overrides.socketFactory, clock });
  const feedAddress = cfg.gas.priceFeed.address;
  const priceFeed = feedAddress ? new NativePriceRefresher(reader, gas, feedAddress, cfg.gas.priceFeed, clock) : null;

  const strategies = await loadStrategies(
    cfg.strategies,
    { chainId, executor, endpoints, reader, cache, mempool },
    overrides.strategyLoader,
  );
  const pipeline = new ExecutionPipeline({
    cfg,
    endpoints,
    gas,
    nonces,
    sender,
    risk,
    recovery,
    notifier,
    attempts,
    clock,
  });
  const scheduler = new OpportunityScheduler(
    strategies,
    overrides.scorer ?? new HeuristicScorer(),
    pipeline,
    risk,
    endpoints,
    cfg.scheduler,
    clock,
  );

  engineLog.info(
    {
      chainId,
      executor,
      tier: endpoints.currentTier(),
      nonce: nonces.peekNext(),
      strategies: strategies.map((s) => ({ kind: s.producer.kind, priority: s.priority })),
      mempool: cfg.mempool.enabled,
      priceFeed: feedAddress ?? null,
      safeAddress: cfg.safeAddress ?? null,
    },
    'engine-context-ready',
  );

  return {
    cfg,
    chainId,
    executor,
    endpoints,
    nonces,
    gas,
    sender,
    risk,
    recovery,
    health,
    mempool,
    priceFeed,
    scheduler,
    notifier,
    redis,
    db,
  };
}

export type EngineExit =
  | { kind: 'stopped'; reason: string; stats: EngineStats }
  | { kind: 'emergency'; reason: string; stats: EngineStats; sweepHash: string | null };

type Loop = { name: string; run: (signal: AbortSignal) => Promise<void> };

/**
 * Runs the decision loop and its monitors on one abort signal. A hard stop in
 * any loop (risk tripped, endpoints exhausted) or an unexpected loop crash
 * takes the emergency path.
 */
export class Engine {
  private readonly controller = new AbortController();
  private stopReason: string | null = null;
  private running = false;

  constructor(private readonly ctx: EngineContext) {}

  isRunning(): boolean {
    return this.running;
  }

  ready(): boolean {
    return this.running && !this.ctx.risk.isTripped() && this.ctx.endpoints.isHealthy();
  }

  stop(reason: string): void {
    if (this.controller.signal.aborted) return;
    this.stopReason = reason;
    engineLog.info({ reason }, 'engine-stop-requested');
    this.controller.abort();
  }

  async run(): Promise<EngineExit> {
    const { ctx } = this;
    const signal = this.controller.signal;
    const loops: Loop[] = [
      { name: 'scheduler', run: (s) => ctx.scheduler.run(s) },
      { name: 'stuck-monitor', run: (s) => ctx.recovery.run(s) },
      { name: 'endpoint-health', run: (s) => ctx.health.run(s) },
      { name: 'kill-file', run: (s) => ctx.risk.watchKillFile(s) },
    ];
    if (ctx.cfg.mempool.enabled) loops.push({ name: 'mempool', run: (s) => ctx.mempool.run(s) });
    const priceFeed = ctx.priceFeed;
    if (priceFeed) loops.push({ name: 'native-price', run: (s) => priceFeed.run(s) });

    this.running = true;
    engineLog.info({ loops: loops.map((l) => l.name) }, 'engine-started');

    const failures: Array<{ loop: string; err: unknown }> = [];
    await Promise.all(
      loops.map(async (loop) => {
        try {
          await loop.run(signal);
        } catch (err) {
          failures.push({ loop: loop.name, err });
          engineLog.error({ loop: loop.name, err: errorMessage(err), hardStop: isHardStop(err) }, 'engine-loop-failed');
          this.controller.abort();
        }
      }),
    );
    this.running = false;

    const fatal = failures[0];
    if (fatal) {
      const reason = describeFatal(fatal.loop, fatal.err);
      const sweepHash = await this.emergencyShutdown(reason);
      return { kind: 'emergency', reason, stats: ctx.scheduler.stats(), sweepHash };
    }

    const reason = this.stopReason ?? 'stopped';
    await this.close();
    const stats = ctx.scheduler.stats();
    engineLog.info({ reason, ...stats }, 'engine-stopped');
    return { kind: 'stopped', reason, stats };
  }

  /**
   * Halts new submissions, moves withdrawable funds to the safe address and
   * pages the operator. Never restarts anything.
   */
  async emergencyShutdown(reason: string): Promise<string | null> {
    const { ctx } = this;
    this.controller.abort();
    await ctx.risk.trip(`emergency shutdown: ${reason}`);
    engineLog.fatal({ reason }, 'emergency-shutdown');
    ctx.notifier.notify('emergency shutdown', { reason, executor: ctx.executor, stats: ctx.scheduler.stats() }, 'critical');

    let sweepHash: string | null = null;
    const safe = ctx.cfg.safeAddress;
    if (!safe) {
      engineLog.warn('sweep-skipped-no-safe-address');
    } else {
      // One more pass over the tiers for the sweep alone.
      if (ctx.endpoints.isExhausted()) ctx.endpoints.reset();
      try {
        sweepHash = await sweepFunds(ctx, safe, ctx.cfg.sweepReserveEth);
        if (sweepHash) {
          ctx.notifier.notify('funds swept', { to: safe, hash: sweepHash }, 'critical');
        }
      } catch (err) {
        engineLog.error({ err: errorMessage(err), safe }, 'sweep-failed');
        ctx.notifier.notify('fund sweep failed', { err: errorMessage(err), safe }, 'critical');
      }
    }

    await this.close();
    return sweepHash;
  }

  private async close(): Promise<void> {
    const { ctx } = this;
    await ctx.mempool.drain();
    await ctx.notifier.flush();
    if (ctx.redis) {
      try {
        await ctx.redis.quit();
      } catch (err) {
        engineLog.warn({ err: errorMessage(err) }, 'redis-quit-failed');
      }
    }
    if (ctx.db) {
      try {
        await ctx.db.close();
      } catch (err) {
        engineLog.warn({ err: errorMessage(err) }, 'db-close-failed');
      }
    }
  }
}

function describeFatal(loop: string, err: unknown): string {
  if (err instanceof RiskTrippedError) return `risk tripped: ${err.reason}`;
  if (err instanceof EndpointsExhaustedError) return `endpoints exhausted after ${err.lastTier}`;
  return `${loop} loop crashed: ${errorMessage(err)}`;
}
