import fs from 'fs';
import os from 'os';
import path from 'path';
import { expandEnv, gasLimitFor, loadConfig, parseConfig } from '../infra/config';
import { testConfig } from './fakes';
import { test, expect, expectEqual } from './test_harness';

function parseError(raw: unknown): string {
  try {
    parseConfig(raw);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error('expected parseConfig to throw');
}

test('defaults fill every section the file leaves out', () => {
  const cfg = testConfig();
  expectEqual(cfg.scheduler.minConfidence, 0.75);
  expectEqual(cfg.scheduler.similarityBandUsd, 2);
  expectEqual(cfg.gas.minTipGwei, 30);
  expectEqual(cfg.nonce.stuckAfterBlocks, 10);
  expectEqual(cfg.mempool.windowMs, 60_000);
  expectEqual(cfg.multicall.maxBatchSize, 50);
  expectEqual(cfg.multicall.address, '0xcA11bde05977b3631167028862bE2a173976CA11');
  expectEqual(cfg.strategies.length, 0);
  expectEqual(cfg.safeAddress, undefined);
});

test('gas limit defaults are per strategy kind', () => {
  const cfg = testConfig();
  expectEqual(gasLimitFor(cfg.gas, 'sandwich'), 200_000n);
  expectEqual(gasLimitFor(cfg.gas, 'flashloan'), 600_000n);
});

test('duplicate tier names are rejected', () => {
  const message = parseError({
    chainId: 137,
    endpoints: {
      tiers: [
        { name: 'a', priority: 0, http: 'http://a.test' },
        { name: 'a', priority: 1, http: 'http://b.test' },
      ],
    },
  });
  expect(message.includes('endpoint tier names must be unique'), message);
});

test('fallback sequence must name known tiers', () => {
  const message = parseError({
    chainId: 137,
    endpoints: { tiers: [{ name: 'a', priority: 0, http: 'http://a.test' }], fallbackSequence: ['a', 'z'] },
  });
  expect(message.includes('fallbackSequence references unknown tier z'), message);
});

test('a tip floor above the ceiling is rejected', () => {
  const message = parseError({
    chainId: 137,
    endpoints: { tiers: [{ name: 'a', priority: 0, http: 'http://a.test' }] },
    gas: { minTipGwei: 300, maxTipGwei: 200 },
  });
  expect(message.includes('gas.minTipGwei exceeds gas.maxTipGwei'), message);
});

test('malformed safe address is rejected, empty is treated as unset', () => {
  const base = { chainId: 137, endpoints: { tiers: [{ name: 'a', priority: 0, http: 'http://a.test' }] } };
  const message = parseError({ ...base, safeAddress: '0x1234' });
  expect(message.startsWith('Invalid engine config: safeAddress'), message);
  expectEqual(parseConfig({ ...base, safeAddress: null }).safeAddress, undefined);
});

test('unknown strategy kinds are rejected', () => {
  const message = parseError({
    chainId: 137,
    endpoints: { tiers: [{ name: 'a', priority: 0, http: 'http://a.test' }] },
    strategies: [{ kind: 'arbitrary', module: './x' }],
  });
  expect(message.includes('strategies.0.kind'), message);
});

test('expandEnv substitutes known variables and leaves unknown ones', () => {
  const out = expandEnv('http: ${RPC_A}\nws: ${RPC_MISSING}', { RPC_A: 'http://a.test' });
  expectEqual(out, 'http: http://a.test\nws: ${RPC_MISSING}');
});

test('loadConfig reads yaml and expands environment references', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-config-'));
  const file = path.join(dir, 'engine.yaml');
  fs.writeFileSync(
    file,
    [
      'chainId: 137',
      'endpoints:',
      '  tiers:',
      '    - name: main',
      '      priority: 0',
      '      http: ${ENGINE_TEST_RPC}',
      '      ws: ${ENGINE_TEST_WS}',
      'strategies:',
      '  - kind: direct',
      '    module: ./strategies/direct',
      '    priority: 7',
      'safeAddress: ${ENGINE_TEST_SAFE}',
    ].join('\n'),
  );
  process.env.ENGINE_TEST_RPC = 'http://main.test';
  process.env.ENGINE_TEST_WS = '';
  process.env.ENGINE_TEST_SAFE = '';
  try {
    const cfg = loadConfig(file);
    const tier = cfg.endpoints.tiers[0];
    expectEqual(tier?.http, 'http://main.test');
    expectEqual(tier?.ws, undefined);
    expectEqual(cfg.strategies[0]?.priority, 7);
    expectEqual(cfg.strategies[0]?.enabled, true);
    expectEqual(cfg.safeAddress, undefined);
  } finally {
    delete process.env.ENGINE_TEST_RPC;
    delete process.env.ENGINE_TEST_WS;
    delete process.env.ENGINE_TEST_SAFE;
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('loadConfig fails when the file is missing', () => {
  let message = '';
  try {
    loadConfig('/nonexistent/engine.yaml');
  } catch (err) {
    message = err instanceof Error ? err.message : String(err);
  }
  expectEqual(message, 'Engine config missing at /nonexistent/engine.yaml');
});
