#!/usr/bin/env node
import './infra/env';
import { loadConfig } from './infra/config';
import { errorMessage } from './infra/errors';
import { log } from './infra/logger';
import { startMetricsServer, stopMetricsServer } from './infra/metrics_server';
import { createEngineContext, Engine } from './orchestrator';

const EXIT_CLEAN = 0;
const EXIT_STARTUP_FAILURE = 1;
const EXIT_EMERGENCY = 2;

const PROM_PORT = Number(process.env.PROM_PORT ?? 9464);

async function main(): Promise<number> {
  let engine: Engine;
  try {
    const cfg = loadConfig();
    engine = new Engine(await createEngineContext(cfg));
  } catch (err) {
    log.fatal({ err: errorMessage(err) }, 'engine-startup-failed');
    return EXIT_STARTUP_FAILURE;
  }

  const metrics = startMetricsServer(Number.isFinite(PROM_PORT) ? PROM_PORT : 9464, () => engine.ready());
  process.once('SIGINT', () => engine.stop('SIGINT'));
  process.once('SIGTERM', () => engine.stop('SIGTERM'));

  try {
    const exit = await engine.run();
    if (exit.kind === 'emergency') {
      log.fatal({ reason: exit.reason, sweepHash: exit.sweepHash, stats: exit.stats }, 'engine-exit-emergency');
      return EXIT_EMERGENCY;
    }
    log.info({ reason: exit.reason }, 'engine-exit-clean');
    return EXIT_CLEAN;
  } finally {
    await stopMetricsServer(metrics);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log.fatal({ err: errorMessage(err) }, 'engine-fatal');
    process.exit(EXIT_EMERGENCY);
  });
