import fs from 'fs';
import path from 'path';
import { isAddress, type Address } from 'viem';
import YAML from 'yaml';
import { z } from 'zod';
import { STRATEGY_KINDS, type StrategyKind } from '../pipeline/types';
import { log } from './logger';

export const EvmAddressSchema = z.custom<Address>(
  (value) => typeof value === 'string' && isAddress(value, { strict: false }),
  { message: 'expected a 20-byte hex address' },
);

const CapabilitySchema = z.enum(['read', 'write', 'subscribe']);

const TierSchema = z.object({
  name: z.string().min(1),
  priority: z.number().int().nonnegative(),
  http: z.string().url(),
  ws: z.string().url().nullish().transform((value) => value ?? undefined),
  capabilities: z.array(CapabilitySchema).default(['read', 'write']),
});

const KindSchema = z.enum(STRATEGY_KINDS);

const GasLimitsSchema = z
  .object({
    sandwich: z.number().int().positive().default(200_000),
    liquidation: z.number().int().positive().default(350_000),
    flashloan: z.number().int().positive().default(600_000),
    triangular: z.number().int().positive().default(450_000),
    direct: z.number().int().positive().default(500_000),
  })
  .default({});

export const ConfigSchema = z
  .object({
    chainId: z.number().int().positive(),
    endpoints: z.object({
      tiers: z.array(TierSchema).min(1),
      fallbackSequence: z.array(z.string()).optional(),
      maxRetries: z.number().int().positive().default(3),
      retryDelayMs: z.number().int().nonnegative().default(250),
      unhealthyAfter: z.number().int().positive().default(3),
      healthCheckMs: z.number().int().positive().default(60_000),
    }),
    scheduler: z
      .object({
        minConfidence: z.number().min(0).max(1).default(0.75),
        similarityBandUsd: z.number().nonnegative().default(2),
        idleMs: z.number().int().positive().default(100),
        producerBudgetMs: z.number().int().positive().default(2_000),
        confirmationTimeoutMs: z.number().int().positive().default(60_000),
        receiptPollMs: z.number().int().positive().default(2_000),
        allowAmbiguousSimulation: z.boolean().default(true),
      })
      .default({}),
    gas: z
      .object({
        maxGasPriceGwei: z.number().positive().default(500),
        baseFeeBufferPct: z.number().nonnegative().default(5),
        minTipGwei: z.number().nonnegative().default(30),
        maxTipGwei: z.number().positive().default(200),
        profitTipFraction: z.number().positive().max(1).default(0.1),
        nativePriceUsd: z.number().positive().default(0.8),
        timeCriticalKinds: z.array(KindSchema).default(['sandwich']),
        defaultGasLimits: GasLimitsSchema,
        historyMinSamples: z.number().int().positive().default(10),
        historyMaxSamples: z.number().int().positive().default(100),
        // Chainlink-style native/USD aggregator; without one nativePriceUsd stays fixed.
        priceFeed: z
          .object({
            address: EvmAddressSchema.nullish().transform((value) => value ?? undefined),
            refreshMs: z.number().int().positive().default(60_000),
            maxStalenessSec: z.number().int().positive().default(3_600),
          })
          .default({}),
      })
      .default({}),
    nonce: z
      .object({
        stuckAfterBlocks: z.number().int().positive().default(10),
        maxSpeedUps: z.number().int().nonnegative().default(2),
        monitorMs: z.number().int().positive().default(15_000),
      })
      .default({}),
    risk: z
      .object({
        maxDailyLossUsd: z.number().positive().default(50),
        maxFailedTxPerDay: z.number().int().positive().default(10),
        autoTrip: z.boolean().default(true),
        killFile: z.string().optional(),
        killFilePollMs: z.number().int().positive().default(1_000),
      })
      .default({}),
    mempool: z
      .object({
        enabled: z.boolean().default(true),
        minValueEth: z.number().nonnegative().default(0),
        windowMs: z.number().int().positive().default(60_000),
        maxCandidates: z.number().int().positive().default(1_000),
        reconnectDelayMs: z.number().int().positive().default(5_000),
        maxReconnectDelayMs: z.number().int().positive().default(60_000),
        maxConcurrentLookups: z.number().int().positive().default(16),
      })
      .default({}),
    multicall: z
      .object({
        address: EvmAddressSchema.default('0xcA11bde05977b3631167028862bE2a173976CA11'),
        maxBatchSize: z.number().int().positive().default(50),
      })
      .default({}),
    alerts: z
      .object({
        minIntervalMs: z.number().int().nonnegative().default(300_000),
      })
      .default({}),
    strategies: z
      .array(
        z.object({
          kind: KindSchema,
          module: z.string().min(1),
          enabled: z.boolean().default(true),
          priority: z.number().int().optional(),
          options: z.record(z.unknown()).default({}),
        }),
      )
      .default([]),
    // An empty ${VAR} parses as null.
    safeAddress: EvmAddressSchema.nullish().transform((value) => value ?? undefined),
    sweepReserveEth: z.number().nonnegative().default(0.5),
  })
  .superRefine((cfg, ctx) => {
    const names = new Set(cfg.endpoints.tiers.map((tier) => tier.name));
    if (names.size !== cfg.endpoints.tiers.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'endpoint tier names must be unique', path: ['endpoints', 'tiers'] });
    }
    for (const name of cfg.endpoints.fallbackSequence ?? []) {
      if (!names.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `fallbackSequence references unknown tier ${name}`,
          path: ['endpoints', 'fallbackSequence'],
        });
      }
    }
    if (cfg.gas.minTipGwei > cfg.gas.maxTipGwei) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'gas.minTipGwei exceeds gas.maxTipGwei', path: ['gas'] });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;
export type TierCfg = AppConfig['endpoints']['tiers'][number];
export type StrategyCfg = AppConfig['strategies'][number];
export type GasCfg = AppConfig['gas'];
export type PriceFeedCfg = GasCfg['priceFeed'];
export type RiskCfg = AppConfig['risk'];
export type MempoolCfg = AppConfig['mempool'];
export type SchedulerCfg = AppConfig['scheduler'];
export type Capability = z.infer<typeof CapabilitySchema>;

export function parseConfig(raw: unknown): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`Invalid engine config: ${issues.join('; ')}`);
  }
  return parsed.data;
}

// ${VAR} references are expanded from the environment so secrets stay out of the file.
export function expandEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([A-Z0-9_]+)\}/g, (match, name: string) => env[name] ?? match);
}

export function loadConfig(file = process.env.ENGINE_CONFIG ?? 'config/engine.yaml'): AppConfig {
  const resolved = path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Engine config missing at ${resolved}`);
  }
  const text = expandEnv(fs.readFileSync(resolved, 'utf8'));
  const cfg = parseConfig(YAML.parse(text));
  log.info(
    {
      file: resolved,
      chainId: cfg.chainId,
      tiers: cfg.endpoints.tiers.map((tier) => tier.name),
      strategies: cfg.strategies.filter((s) => s.enabled).map((s) => s.kind),
    },
    'engine-config-loaded',
  );
  return cfg;
}

export function gasLimitFor(cfg: GasCfg, kind: StrategyKind): bigint {
  return BigInt(cfg.defaultGasLimits[kind]);
}
