import type { Address, Hex } from 'viem';
import type { UnsignedTransaction } from '../infra/accounts';
import type { FeeParameters, IntentDraft, StrategyKind, TransactionIntent } from '../pipeline/types';

export const TRANSFER_GAS = 21_000n;

// Minimum replacement bump most nodes accept: +12.5% on both fee fields.
const BUMP_NUM = 1125n;
const BUMP_DEN = 1000n;

function ceilBump(value: bigint): bigint {
  return (value * BUMP_NUM + BUMP_DEN - 1n) / BUMP_DEN;
}

export function bumpFees(fees: FeeParameters): FeeParameters {
  return {
    maxFeePerGas: ceilBump(fees.maxFeePerGas),
    maxPriorityFeePerGas: ceilBump(fees.maxPriorityFeePerGas),
  };
}

export function buildIntent(
  opportunityId: string,
  kind: StrategyKind,
  from: Address,
  draft: IntentDraft,
  fees: FeeParameters,
): TransactionIntent {
  return {
    opportunityId,
    kind,
    from,
    target: draft.target,
    calldata: draft.calldata,
    value: draft.value ?? 0n,
    gasLimit: draft.gasLimit,
    fees,
    state: 'built',
  };
}

export type Replacement = {
  to: Address;
  data: Hex;
  value: bigint;
  gasLimit: bigint;
  fees: FeeParameters;
  cancelled: boolean;
};

/** Zero-value self-transfer on the same nonce. */
export function cancellation(from: Address, previous: FeeParameters): Replacement {
  return { to: from, data: '0x', value: 0n, gasLimit: TRANSFER_GAS, fees: bumpFees(previous), cancelled: true };
}

/** Same payload, fees bumped. */
export function speedUp(previous: Omit<Replacement, 'cancelled'>): Replacement {
  return { ...previous, fees: bumpFees(previous.fees), cancelled: false };
}

export function toUnsigned(
  chainId: number,
  nonce: number,
  tx: { to: Address; data: Hex; value: bigint; gasLimit: bigint; fees: FeeParameters },
): UnsignedTransaction {
  return {
    chainId,
    nonce,
    to: tx.to,
    data: tx.data,
    value: tx.value,
    gas: tx.gasLimit,
    maxFeePerGas: tx.fees.maxFeePerGas,
    maxPriorityFeePerGas: tx.fees.maxPriorityFeePerGas,
  };
}
