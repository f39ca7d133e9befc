import path from 'path';
import type { Address } from 'viem';
import type { PersistedCache } from '../infra/cache';
import type { StrategyCfg } from '../infra/config';
import type { EndpointManager } from '../infra/endpoints';
import { log, type Logger } from '../infra/logger';
import type { BatchReader } from '../infra/multicall';
import type { CandidateView } from '../realtime/mempool';
import {
  DEFAULT_PRIORITY,
  type FeeParameters,
  type Finding,
  type IntentDraft,
  type Opportunity,
  type StrategyKind,
} from './types';

/** What a strategy module gets at construction time. */
export type StrategyContext = {
  chainId: number;
  executor: Address;
  endpoints: EndpointManager;
  reader: BatchReader;
  cache: PersistedCache;
  mempool: CandidateView;
  options: Record<string, unknown>;
  log: Logger;
};

export type BuildContext = {
  from: Address;
  fees: FeeParameters;
  gasLimit: bigint;
};

/**
 * Pluggable opportunity source. `findOpportunity` is called once per cycle and
 * must honour the abort signal; `buildIntent` turns its own finding into a
 * transaction draft.
 */
export interface StrategyProducer<K extends StrategyKind = StrategyKind> {
  readonly kind: K;
  findOpportunity(signal: AbortSignal): Promise<Finding<K> | null>;
  buildIntent(opportunity: Opportunity<K>, ctx: BuildContext): Promise<IntentDraft>;
}

export type RegisteredStrategy = {
  producer: StrategyProducer;
  priority: number;
  module: string;
};

const strategyLog = log.child({ module: 'pipeline.strategies' });

function isProducer(value: unknown, kind: StrategyKind): value is StrategyProducer {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || value.kind !== kind) return false;
  return 'findOpportunity' in value && typeof value.findOpportunity === 'function'
    && 'buildIntent' in value && typeof value.buildIntent === 'function';
}

export type StrategyModuleLoader = (specifier: string) => Promise<unknown>;

const defaultLoader: StrategyModuleLoader = (specifier) => import(specifier);

function resolveSpecifier(module: string): string {
  return module.startsWith('.') || module.startsWith('/') ? path.resolve(process.cwd(), module) : module;
}

/**
 * Instantiates every enabled strategy entry. Each module exports
 * `createStrategy(ctx)` returning a producer of the configured kind.
 */
export async function loadStrategies(
  entries: readonly StrategyCfg[],
  baseCtx: Omit<StrategyContext, 'options' | 'log'>,
  loader: StrategyModuleLoader = defaultLoader,
): Promise<RegisteredStrategy[]> {
  const out: RegisteredStrategy[] = [];
  for (const entry of entries) {
    if (!entry.enabled) {
      strategyLog.info({ kind: entry.kind, module: entry.module }, 'strategy-disabled');
      continue;
    }
    const mod = await loader(resolveSpecifier(entry.module));
    if (typeof mod !== 'object' || mod === null || !('createStrategy' in mod) || typeof mod.createStrategy !== 'function') {
      throw new Error(`strategy module ${entry.module} does not export createStrategy`);
    }
    const ctx: StrategyContext = {
      ...baseCtx,
      options: entry.options,
      log: log.child({ module: `strategy.${entry.kind}` }),
    };
    const produced: unknown = await mod.createStrategy(ctx);
    if (!isProducer(produced, entry.kind)) {
      throw new Error(`strategy module ${entry.module} did not produce a ${entry.kind} producer`);
    }
    const priority = entry.priority ?? DEFAULT_PRIORITY[entry.kind];
    strategyLog.info({ kind: entry.kind, module: entry.module, priority }, 'strategy-loaded');
    out.push({ producer: produced, priority, module: entry.module });
  }
  return out;
}

