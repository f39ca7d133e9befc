import Redis from 'ioredis';
import { log } from './logger';

export function createRedis(url = process.env.REDIS_URL): Redis | null {
  if (!url) return null;
  const client = new Redis(url, { maxRetriesPerRequest: 2, lazyConnect: false });
  client.on('error', (err: Error) => log.warn({ err: err.message }, 'redis-client-error'));
  return client;
}
