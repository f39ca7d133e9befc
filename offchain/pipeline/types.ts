import type { Address, Hash, Hex } from 'viem';

export const STRATEGY_KINDS = ['sandwich', 'liquidation', 'flashloan', 'triangular', 'direct'] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

// Fixed per kind; only consulted when profits land inside the similarity band.
export const DEFAULT_PRIORITY: Record<StrategyKind, number> = {
  sandwich: 5,
  flashloan: 4,
  liquidation: 4,
  triangular: 3,
  direct: 2,
};

export type SandwichPayload = {
  victimHash: Hash;
  router: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  /** Fee per gas the victim bid, in gwei; the front-run has to outbid it. */
  victimFeeGwei: number;
};

export type LiquidationPayload = {
  protocol: string;
  borrower: Address;
  collateralAsset: Address;
  debtAsset: Address;
  debtToCover: bigint;
  healthFactor: number;
};

export type FlashloanPayload = {
  lender: Address;
  asset: Address;
  amount: bigint;
  path: readonly Address[];
  routers: readonly Address[];
};

export type TriangularPayload = {
  router: Address;
  /** Closed cycle A -> B -> C -> A. */
  path: readonly Address[];
  amountIn: bigint;
};

export type DirectPayload = {
  tokenIn: Address;
  tokenOut: Address;
  buyRouter: Address;
  sellRouter: Address;
  amountIn: bigint;
};

export type PayloadByKind = {
  sandwich: SandwichPayload;
  liquidation: LiquidationPayload;
  flashloan: FlashloanPayload;
  triangular: TriangularPayload;
  direct: DirectPayload;
};

type OpportunityOf<K extends StrategyKind> = Readonly<{
  id: string;
  kind: K;
  priority: number;
  expectedProfitUsd: number;
  confidence: number;
  foundAt: number;
  payload: Readonly<PayloadByKind[K]>;
}>;

/** Tagged by `kind`; the payload type follows the tag. */
export type Opportunity<K extends StrategyKind = StrategyKind> = { [P in StrategyKind]: OpportunityOf<P> }[K];

type FindingOf<K extends StrategyKind> = {
  kind: K;
  expectedProfitUsd: number;
  confidence?: number;
  payload: PayloadByKind[K];
};

/** What a producer hands back; the scheduler stamps id, priority, time and (if missing) confidence. */
export type Finding<K extends StrategyKind = StrategyKind> = { [P in StrategyKind]: FindingOf<P> }[K];

export type FeeParameters = {
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
};

export type IntentState =
  | 'built'
  | 'simulated'
  | 'rejected'
  | 'submitted'
  | 'pending'
  | 'confirmed'
  | 'reverted'
  | 'stuck'
  | 'cancelled'
  | 'sped-up';

export type TransactionIntent = {
  readonly opportunityId: string;
  readonly kind: StrategyKind;
  readonly from: Address;
  readonly target: Address;
  readonly calldata: Hex;
  readonly value: bigint;
  readonly gasLimit: bigint;
  fees: FeeParameters;
  nonce?: number;
  hash?: Hash;
  state: IntentState;
};

/** Strategy-built part of an intent; the pipeline owns nonce, fees and state. */
export type IntentDraft = {
  target: Address;
  calldata: Hex;
  value?: bigint;
  gasLimit: bigint;
};

export type ExecutionOutcome =
  | 'skipped'
  | 'simulation-rejected'
  | 'submit-failed'
  | 'success'
  | 'reverted'
  | 'timeout';

export type ExecutionReport = {
  cycleId: number;
  opportunityId: string;
  kind: StrategyKind;
  expectedProfitUsd: number;
  outcome: ExecutionOutcome;
  reason?: string;
  hash?: Hash;
  nonce?: number;
  tipGwei?: number;
  gasCostUsd?: number;
  realizedPnlUsd: number;
};
