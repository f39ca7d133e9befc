import {
  BaseError,
  ContractFunctionRevertedError,
  ExecutionRevertedError,
  HttpRequestError,
  InsufficientFundsError,
  LimitExceededRpcError,
  NonceTooHighError,
  NonceTooLowError,
  RawContractError,
  RpcRequestError,
  SocketClosedError,
  TimeoutError,
  TransactionRejectedRpcError,
  WebSocketRequestError,
} from 'viem';

export type RpcErrorKind = 'rate-limited' | 'transient' | 'revert' | 'nonce' | 'rejected';

const RATE_LIMIT_RPC_CODES = new Set([-32005, 429]);
const REVERT_RPC_CODES = new Set([3]);
const NONCE_CONFLICT_RE = /nonce too (low|high)|already known|transaction already imported/i;

function classifyOne(err: unknown): RpcErrorKind | null {
  if (err instanceof HttpRequestError) {
    if (err.status === 429) return 'rate-limited';
    if (err.status === undefined || err.status >= 500) return 'transient';
    return 'rejected';
  }
  if (err instanceof LimitExceededRpcError) return 'rate-limited';
  if (err instanceof TimeoutError || err instanceof SocketClosedError || err instanceof WebSocketRequestError) {
    return 'transient';
  }
  if (
    err instanceof ExecutionRevertedError ||
    err instanceof ContractFunctionRevertedError ||
    err instanceof RawContractError ||
    err instanceof InsufficientFundsError
  ) {
    return 'revert';
  }
  if (err instanceof NonceTooLowError || err instanceof NonceTooHighError) return 'nonce';
  if (err instanceof TransactionRejectedRpcError) return 'rejected';
  if (err instanceof RpcRequestError) {
    if (RATE_LIMIT_RPC_CODES.has(err.code)) return 'rate-limited';
    if (REVERT_RPC_CODES.has(err.code)) return 'revert';
    if (NONCE_CONFLICT_RE.test(err.details)) return 'nonce';
  }
  return null;
}

/**
 * Maps a failure from the network client onto the failover taxonomy. Works off
 * viem error classes, HTTP status and JSON-RPC codes; anything unrecognised is
 * treated as transient so it gets the same-tier retry budget.
 */
export function classifyRpcError(err: unknown): RpcErrorKind {
  const direct = classifyOne(err);
  if (direct) return direct;
  if (err instanceof BaseError) {
    const inner = err.walk((e) => classifyOne(e) !== null);
    const kind = inner ? classifyOne(inner) : null;
    if (kind) return kind;
  }
  return 'transient';
}

export class EndpointsExhaustedError extends Error {
  constructor(readonly lastTier: string, cause?: unknown) {
    super(`all endpoint tiers exhausted (last: ${lastTier})`, { cause });
    this.name = 'EndpointsExhaustedError';
  }
}

export class RiskTrippedError extends Error {
  constructor(readonly reason: string) {
    super(`risk governor tripped: ${reason}`);
    this.name = 'RiskTrippedError';
  }
}

export class SigningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SigningError';
  }
}

export function isHardStop(err: unknown): err is EndpointsExhaustedError | RiskTrippedError {
  return err instanceof EndpointsExhaustedError || err instanceof RiskTrippedError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof BaseError) return err.shortMessage;
  return err instanceof Error ? err.message : String(err);
}
