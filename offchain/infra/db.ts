import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import { instrument } from './instrument';
import { log } from './logger';
import { sleep } from './time';

type DbErrorCategory = 'connection' | 'timeout' | 'auth' | 'serialization' | 'other';

export type DbErrorInfo = {
  code?: string;
  message: string;
  category: DbErrorCategory;
  retryable: boolean;
};

function parseNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

const connectionErrorCodes = new Set(['57P01', '57P02', '57P03', '53300', '08000', '08001', '08003', '08006', 'ECONNRESET', 'ECONNREFUSED']);
const authErrorCodes = new Set(['28P01', '28000']);
const serializationErrorCodes = new Set(['40001', '40P01']);
const timeoutErrorCodes = new Set(['57014', 'ETIMEDOUT']);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export function classifyDbError(err: unknown): DbErrorInfo {
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);
  let category: DbErrorCategory = 'other';
  if (code && connectionErrorCodes.has(code)) category = 'connection';
  else if (code && authErrorCodes.has(code)) category = 'auth';
  else if (code && serializationErrorCodes.has(code)) category = 'serialization';
  else if (code && timeoutErrorCodes.has(code)) category = 'timeout';
  const retryable = category === 'connection' || category === 'timeout' || category === 'serialization';
  return { code, message, category, retryable };
}

export function connectionTarget(url: string): string {
  try {
    const parsed = new URL(url);
    return parsed.port ? `${parsed.hostname}:${parsed.port}` : parsed.hostname;
  } catch {
    return 'primary';
  }
}

const QUERY_RETRIES = parseNumberEnv('DATABASE_QUERY_MAX_RETRIES', 3);
const QUERY_RETRY_DELAY_MS = parseNumberEnv('DATABASE_QUERY_RETRY_DELAY_MS', 250);

export type Db = {
  readonly target: string;
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: readonly unknown[]): Promise<R[]>;
  close(): Promise<void>;
};

export function createDb(connectionString = process.env.DATABASE_URL): Db | null {
  if (!connectionString) {
    log.warn({ env: 'DATABASE_URL' }, 'db-missing-connection-string');
    return null;
  }
  const config: PoolConfig = {
    connectionString,
    max: parseNumberEnv('DATABASE_POOL_MAX', 5),
    idleTimeoutMillis: parseNumberEnv('DATABASE_IDLE_MS', 30_000),
    connectionTimeoutMillis: parseNumberEnv('DATABASE_CONN_TIMEOUT_MS', 5_000),
    keepAlive: true,
  };
  const pool = new Pool(config);
  const target = connectionTarget(connectionString);
  pool.on('error', (err: Error) => {
    const info = classifyDbError(err);
    log.error({ code: info.code, category: info.category, target, message: info.message }, 'db-pool-error');
  });

  async function run<R extends QueryResultRow>(text: string, values: readonly unknown[] | undefined, attempt: number): Promise<R[]> {
    const name = text.trim().split(/\s+/)[0]?.toLowerCase() ?? 'unknown';
    try {
      const result = await instrument('db', name, () => pool.query<R>(text, values ? [...values] : undefined), { target });
      return result.rows;
    } catch (err) {
      const info = classifyDbError(err);
      if (info.retryable && attempt < QUERY_RETRIES) {
        const delayMs = QUERY_RETRY_DELAY_MS * attempt;
        log.warn({ attempt, code: info.code, category: info.category, target, delayMs, query: name }, 'db-query-retry');
        await sleep(delayMs);
        return run<R>(text, values, attempt + 1);
      }
      log.error({ attempt, code: info.code, category: info.category, target, query: name }, 'db-query-failed');
      throw err;
    }
  }

  return {
    target,
    query: (text, values) => run(text, values, 1),
    close: () => pool.end(),
  };
}
