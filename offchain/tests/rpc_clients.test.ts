import {
  BaseError,
  LimitExceededRpcError,
  NonceTooLowError,
  RpcRequestError,
  TimeoutError,
  TransactionRejectedRpcError,
} from 'viem';
import { classifyRpcError, EndpointsExhaustedError, errorMessage, isHardStop, RiskTrippedError } from '../infra/errors';
import { metricTargetFromRpc } from '../infra/instrument';
import { createRpcClient } from '../infra/rpc_clients';
import { rateLimited, reverted, transient } from './fakes';
import { test, expect, expectEqual } from './test_harness';

test('http 429 is a rate limit and 5xx is transient', () => {
  expectEqual(classifyRpcError(rateLimited()), 'rate-limited');
  expectEqual(classifyRpcError(transient()), 'transient');
});

test('json-rpc limit codes classify as rate limits', () => {
  const limited = new RpcRequestError({ body: {}, error: { code: -32005, message: 'limit exceeded' }, url: 'http://fake.test' });
  expectEqual(classifyRpcError(limited), 'rate-limited');
  expectEqual(classifyRpcError(new LimitExceededRpcError(new Error('slow down'))), 'rate-limited');
});

test('reverts, nonce conflicts and rejections keep their own kinds', () => {
  expectEqual(classifyRpcError(reverted()), 'revert');
  expectEqual(classifyRpcError(new NonceTooLowError({ nonce: 4 })), 'nonce');
  expectEqual(classifyRpcError(new TransactionRejectedRpcError(new Error('rejected'))), 'rejected');
});

test('node nonce messages classify as nonce conflicts', () => {
  const low = new RpcRequestError({ body: {}, error: { code: -32000, message: 'nonce too low' }, url: 'http://fake.test' });
  expectEqual(classifyRpcError(low), 'nonce');
  const known = new RpcRequestError({ body: {}, error: { code: -32000, message: 'already known' }, url: 'http://fake.test' });
  expectEqual(classifyRpcError(known), 'nonce');
});

test('timeouts and unknown errors fall back to transient', () => {
  expectEqual(classifyRpcError(new TimeoutError({ body: {}, url: 'http://fake.test' })), 'transient');
  expectEqual(classifyRpcError(new Error('socket hang up')), 'transient');
  expectEqual(classifyRpcError('boom'), 'transient');
});

test('classification looks through wrapped viem errors', () => {
  const wrapped = new BaseError('request failed', { cause: rateLimited() });
  expectEqual(classifyRpcError(wrapped), 'rate-limited');
});

test('hard stops are the exhausted and tripped errors only', () => {
  expect(isHardStop(new EndpointsExhaustedError('backup')), 'exhausted is a hard stop');
  expect(isHardStop(new RiskTrippedError('loss')), 'tripped is a hard stop');
  expect(!isHardStop(transient()), 'transient is not a hard stop');
});

test('errorMessage prefers the short message of viem errors', () => {
  expectEqual(errorMessage(new BaseError('short text', { details: 'long detail' })), 'short text');
  expectEqual(errorMessage(new Error('plain')), 'plain');
  expectEqual(errorMessage(42), '42');
});

test('metric target is the rpc host, with a fallback for junk', () => {
  expectEqual(metricTargetFromRpc('https://rpc.example.com/v1/test-secret'), 'rpc.example.com');
  expectEqual(metricTargetFromRpc('not a url', 'primary'), 'primary');
});

test('createRpcClient builds a client without touching the network', () => {
  const client = createRpcClient('http://127.0.0.1:8545', 'local');
  expectEqual(client.url, 'http://127.0.0.1:8545');
});
