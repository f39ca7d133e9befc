import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

const registers = [registry];

export const gauge = {
  currentTier: new client.Gauge({
    name: 'endpoint_current_tier',
    help: 'Endpoint tier currently serving requests (1=current)',
    labelNames: ['tier'],
    registers,
  }),
  endpointsExhausted: new client.Gauge({
    name: 'endpoints_exhausted',
    help: 'Set to 1 once every tier in the fallback sequence has failed',
    registers,
  }),
  riskTripped: new client.Gauge({ name: 'risk_tripped', help: 'Kill switch state (1=tripped)', registers }),
  dailyLossUsd: new client.Gauge({ name: 'risk_daily_loss_usd', help: 'Accumulated realized loss for the current day', registers }),
  dailyFailedTx: new client.Gauge({ name: 'risk_daily_failed_tx', help: 'Failed transactions recorded for the current day', registers }),
  noncesInFlight: new client.Gauge({ name: 'nonces_in_flight', help: 'Issued nonces not yet confirmed or cancelled', registers }),
  mempoolState: new client.Gauge({
    name: 'mempool_feed_state',
    help: 'Mempool feed connection state (1=active)',
    labelNames: ['state'],
    registers,
  }),
  mempoolCandidates: new client.Gauge({ name: 'mempool_candidates', help: 'Swap candidates held in the mempool cache', registers }),
  lastTipGwei: new client.Gauge({
    name: 'tip_last_gwei',
    help: 'Most recent priority tip quoted',
    labelNames: ['kind'],
    registers,
  }),
  realizedPnlUsd: new client.Gauge({ name: 'realized_pnl_usd', help: 'Realized PnL since start', registers }),
  nativePriceUsd: new client.Gauge({ name: 'native_price_usd', help: 'Native token USD price used for gas costing', registers }),
};

export const histogram = {
  rpcCallDuration: new client.Histogram({
    name: 'rpc_call_duration_seconds',
    help: 'Duration of RPC calls in seconds',
    labelNames: ['operation', 'status', 'target'],
    registers,
  }),
  dbQueryDuration: new client.Histogram({
    name: 'db_query_duration_seconds',
    help: 'Duration of database queries in seconds',
    labelNames: ['operation', 'status', 'target'],
    registers,
  }),
  cycleDuration: new client.Histogram({
    name: 'scheduler_cycle_seconds',
    help: 'Wall time of one scheduler cycle',
    buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers,
  }),
  confirmLatency: new client.Histogram({
    name: 'confirm_latency_seconds',
    help: 'Latency between submission and receipt',
    buckets: [0.5, 1, 2, 4, 8, 15, 30, 60],
    registers,
  }),
  expectedProfitUsd: new client.Histogram({
    name: 'opportunity_expected_profit_usd',
    help: 'Expected profit of selected opportunities',
    labelNames: ['kind'],
    buckets: [1, 2, 5, 10, 25, 50, 100, 250, 1000],
    registers,
  }),
};

export const counter = {
  rpcErrors: new client.Counter({
    name: 'rpc_errors_total',
    help: 'Failed RPC calls',
    labelNames: ['operation', 'target'],
    registers,
  }),
  dbErrors: new client.Counter({
    name: 'db_errors_total',
    help: 'Failed database queries',
    labelNames: ['operation', 'target'],
    registers,
  }),
  failovers: new client.Counter({
    name: 'endpoint_failovers_total',
    help: 'Tier advances triggered by rate limiting',
    labelNames: ['from', 'to'],
    registers,
  }),
  cycles: new client.Counter({
    name: 'scheduler_cycles_total',
    help: 'Scheduler cycles by result',
    labelNames: ['result'],
    registers,
  }),
  producerErrors: new client.Counter({
    name: 'producer_errors_total',
    help: 'Strategy producers that failed or ran past their budget',
    labelNames: ['kind', 'reason'],
    registers,
  }),
  executions: new client.Counter({
    name: 'executions_total',
    help: 'Execution outcomes by strategy',
    labelNames: ['kind', 'outcome'],
    registers,
  }),
  ambiguousSimulations: new client.Counter({
    name: 'simulation_ambiguous_total',
    help: 'Simulations that neither succeeded nor reverted cleanly',
    labelNames: ['kind'],
    registers,
  }),
  tipRefused: new client.Counter({
    name: 'tip_refused_total',
    help: 'Tip quotes refused',
    labelNames: ['kind', 'reason'],
    registers,
  }),
  stuckResolved: new client.Counter({
    name: 'stuck_resolved_total',
    help: 'Stuck transactions handled by recovery',
    labelNames: ['action'],
    registers,
  }),
  mempoolMessages: new client.Counter({
    name: 'mempool_messages_total',
    help: 'Pending-transaction notifications by disposition',
    labelNames: ['result'],
    registers,
  }),
  mempoolReconnects: new client.Counter({ name: 'mempool_reconnects_total', help: 'Mempool feed reconnect attempts', registers }),
  multicallChunks: new client.Counter({
    name: 'multicall_chunks_total',
    help: 'Multicall round-trips by result',
    labelNames: ['result'],
    registers,
  }),
  alerts: new client.Counter({
    name: 'alerts_total',
    help: 'Operator notifications by disposition',
    labelNames: ['priority', 'result'],
    registers,
  }),
  cacheFallback: new client.Counter({ name: 'cache_fallback_total', help: 'Cache operations served from memory after a redis failure', registers }),
};
