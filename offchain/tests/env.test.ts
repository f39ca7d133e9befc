import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadEnv, missingEnv } from '../infra/env';
import { test, expectEqual } from './test_harness';

function tempEnvFile(contents: string): { file: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-env-'));
  const file = path.join(dir, '.env');
  fs.writeFileSync(file, contents);
  return { file, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

test('the first existing env file is loaded with expansion', () => {
  const { file, cleanup } = tempEnvFile('ENGINE_TEST_HOST=rpc.local\nENGINE_TEST_URL=https://${ENGINE_TEST_HOST}/v1\n');
  try {
    const result = loadEnv([path.join(path.dirname(file), 'absent.env'), file], ['ENGINE_TEST_URL', 'ENGINE_TEST_ABSENT']);
    expectEqual(result.file, file);
    expectEqual(process.env.ENGINE_TEST_URL, 'https://rpc.local/v1');
    expectEqual(result.missing.join(','), 'ENGINE_TEST_ABSENT');
  } finally {
    cleanup();
    delete process.env.ENGINE_TEST_HOST;
    delete process.env.ENGINE_TEST_URL;
  }
});

test('shell values win over the file for operator overrides', () => {
  const before = process.env.LOG_LEVEL;
  const { file, cleanup } = tempEnvFile('LOG_LEVEL=trace\n');
  try {
    loadEnv([file], []);
    expectEqual(process.env.LOG_LEVEL, before);
  } finally {
    cleanup();
    process.env.LOG_LEVEL = before;
  }
});

test('no env file leaves the environment alone', () => {
  const result = loadEnv([path.join(os.tmpdir(), 'engine-env-none', '.env')], ['ENGINE_TEST_ABSENT']);
  expectEqual(result.file, null);
  expectEqual(result.missing.join(','), 'ENGINE_TEST_ABSENT');
});

test('empty and unexpanded values count as missing', () => {
  const env = { A: 'set', B: '', C: '${RPC_TIER1_HTTP}', D: '  ' };
  expectEqual(missingEnv(['A', 'B', 'C', 'D', 'E'], env).join(','), 'B,C,D,E');
});
