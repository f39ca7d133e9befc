#!/usr/bin/env tsx
import './setup_env';
import { runAll } from './test_harness';

import './env.test';
import './config.test';
import './rpc_clients.test';
import './endpoints.test';
import './cache.test';
import './multicall.test';
import './alerts.test';
import './accounts.test';
import './kill_switch.test';
import './nonce.test';
import './gas.test';
import './simulate.test';
import './recovery.test';
import './ranking.test';
import './strategies.test';
import './execute.test';
import './scheduler.test';
import './mempool.test';
import './price_feed.test';
import './orchestrator.test';

runAll()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
