import { mkdirSync } from 'fs';
import { resolve } from 'path';
import pino, { type TransportTargetOptions } from 'pino';

const level = process.env.LOG_LEVEL || 'info';
const targets: TransportTargetOptions[] = [];

// File output only when LOG_DIR is set; otherwise the plain stdout destination.
if (process.env.LOG_DIR) {
  const logDir = resolve(process.cwd(), process.env.LOG_DIR);
  const logFileName = process.env.LOG_FILE_NAME ?? 'engine.log';
  try {
    mkdirSync(logDir, { recursive: true });
    if (process.env.LOG_DISABLE_STDOUT !== '1') {
      targets.push({ target: 'pino/file', options: { destination: 1 }, level });
    }
    targets.push({
      target: 'pino/file',
      options: { destination: resolve(logDir, logFileName), mkdir: true },
      level,
    });
  } catch (err) {
    console.warn('logger-file-init-failed', err instanceof Error ? err.message : String(err));
  }
}

const transport = targets.length > 0 ? pino.transport({ targets }) : undefined;

export const log = transport ? pino({ level }, transport) : pino({ level });

export type Logger = typeof log;
