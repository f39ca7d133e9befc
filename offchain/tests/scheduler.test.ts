import { EndpointsExhaustedError, RiskTrippedError } from '../infra/errors';
import { OpportunityScheduler } from '../pipeline/scheduler';
import { HeuristicScorer } from '../pipeline/scoring';
import type { RegisteredStrategy } from '../pipeline/strategies';
import type { StrategyKind } from '../pipeline/types';
import {
  directFinding,
  pipelineRig,
  sandwichFinding,
  ScriptedProducer,
  successReceipt,
  type PipelineRig,
} from './fakes';
import { test, expect, expectClose, expectEqual } from './test_harness';

function register(producer: ScriptedProducer, priority: number): RegisteredStrategy {
  return { producer, priority, module: `test-${producer.kind}` };
}

function schedulerFor(rig: PipelineRig, strategies: RegisteredStrategy[]): OpportunityScheduler {
  return new OpportunityScheduler(
    strategies,
    new HeuristicScorer(),
    rig.pipeline,
    rig.risk,
    rig.endpoints,
    rig.cfg.scheduler,
    rig.clock.read,
  );
}

function quiet(kind: StrategyKind = 'direct'): ScriptedProducer {
  return new ScriptedProducer(kind, async () => null);
}

async function caught(work: Promise<unknown>): Promise<unknown> {
  try {
    await work;
  } catch (err) {
    return err;
  }
  return null;
}

test('priority breaks a near tie and the winner is executed', async () => {
  const rig = await pipelineRig();
  rig.fleet.client('primary').autoReceipt = successReceipt;
  const direct = new ScriptedProducer('direct', async () => directFinding(10, 0.9));
  const sandwich = new ScriptedProducer('sandwich', async () => sandwichFinding(9, 0.9));
  const scheduler = schedulerFor(rig, [register(direct, 2), register(sandwich, 5)]);

  const result = await scheduler.runCycle(new AbortController().signal);
  expectEqual(result.candidates, 2);
  expectEqual(result.selected?.kind, 'sandwich');
  expectEqual(result.selected?.id, '1-1-sandwich');
  expectEqual(result.selected?.priority, 5);
  expectEqual(result.selected?.foundAt, rig.clock.now);
  if (result.selected) expectEqual(result.report.outcome, 'success');
  expectEqual(direct.built.length, 0);
  expectEqual(sandwich.built.length, 1);
});

test('missing confidence is filled by the scorer', async () => {
  const rig = await pipelineRig();
  const scheduler = schedulerFor(rig, [register(new ScriptedProducer('direct', async () => directFinding(5)), 2)]);
  const result = await scheduler.runCycle(new AbortController().signal);
  expectEqual(result.candidates, 1);
  expectEqual(result.selected, null, 'heuristic 0.5 is under the floor');
  expectEqual(rig.attempts.reports.length, 0);
});

test('slow and failing producers drop out of the cycle', async () => {
  const rig = await pipelineRig({ scheduler: { producerBudgetMs: 20 } });
  rig.fleet.client('primary').autoReceipt = successReceipt;
  const slow = new ScriptedProducer(
    'sandwich',
    () => new Promise((resolve) => setTimeout(() => resolve(sandwichFinding(500, 0.99)), 200)),
  );
  const broken = new ScriptedProducer('triangular', async () => {
    throw new Error('pool read failed');
  });
  const direct = new ScriptedProducer('direct', async () => directFinding(20, 0.8));
  const scheduler = schedulerFor(rig, [register(slow, 5), register(broken, 3), register(direct, 2)]);

  const result = await scheduler.runCycle(new AbortController().signal);
  expectEqual(result.candidates, 1);
  expectEqual(result.selected?.kind, 'direct');
  expectEqual(result.selected?.id, '1-2-direct');
});

test('a finding of the wrong kind is discarded', async () => {
  const rig = await pipelineRig();
  const liar = new ScriptedProducer<StrategyKind>('direct', async () => sandwichFinding(50, 0.9));
  const scheduler = schedulerFor(rig, [register(liar, 2)]);
  const result = await scheduler.runCycle(new AbortController().signal);
  expectEqual(result.candidates, 0);
  expectEqual(result.selected, null);
});

test('a hard stop raised by a producer ends the cycle', async () => {
  const rig = await pipelineRig();
  const failing = new ScriptedProducer('direct', async () => {
    throw new EndpointsExhaustedError('backup');
  });
  const scheduler = schedulerFor(rig, [register(failing, 2)]);
  expect((await caught(scheduler.runCycle(new AbortController().signal))) instanceof EndpointsExhaustedError, 'expected hard stop');
});

test('no cycle starts while tripped or exhausted', async () => {
  const rig = await pipelineRig();
  const producer = quiet();
  const scheduler = schedulerFor(rig, [register(producer, 2)]);
  await rig.risk.trip('test');
  expect((await caught(scheduler.runCycle(new AbortController().signal))) instanceof RiskTrippedError, 'tripped');
  await rig.risk.reset();

  rig.endpoints.reportFailure('primary', 'rate-limited');
  const exhausting = await caught(Promise.resolve().then(() => rig.endpoints.reportFailure('backup', 'rate-limited')));
  expect(exhausting instanceof EndpointsExhaustedError, 'backup was the last tier');
  expect((await caught(scheduler.runCycle(new AbortController().signal))) instanceof EndpointsExhaustedError, 'exhausted');
  expectEqual(producer.polls, 0);
});

test('stats count executed trades but not skips', async () => {
  const rig = await pipelineRig();
  rig.fleet.client('primary').autoReceipt = successReceipt;
  let profit = 20;
  const direct = new ScriptedProducer('direct', async () => directFinding(profit, 0.9));
  const scheduler = schedulerFor(rig, [register(direct, 2)]);
  const signal = new AbortController().signal;

  await scheduler.runCycle(signal);
  profit = 0.1;
  await scheduler.runCycle(signal);
  rig.clock.advance(5_000);

  const stats = scheduler.stats();
  expectEqual(stats.cycles, 2);
  expectEqual(stats.trades, 1);
  expectEqual(stats.successes, 1);
  expectEqual(stats.successRate, 1);
  expectEqual(stats.uptimeMs, 5_000);
  expectEqual(stats.byStrategy.direct?.trades, 1);
  expectClose(stats.realizedPnlUsd, 19.992, 1e-9, `pnl ${stats.realizedPnlUsd}`);
  expectClose(stats.gasSpentUsd, 0.008, 1e-12, `gas ${stats.gasSpentUsd}`);
  expectEqual(rig.attempts.reports.map((r) => r.outcome).join(','), 'success,skipped');
});

test('the loop runs until aborted', async () => {
  const rig = await pipelineRig({ scheduler: { idleMs: 1 } });
  const controller = new AbortController();
  const producer: ScriptedProducer<'direct'> = new ScriptedProducer('direct', async () => {
    if (producer.polls >= 3) controller.abort();
    return null;
  });
  const scheduler = schedulerFor(rig, [register(producer, 2)]);
  await scheduler.run(controller.signal);
  expectEqual(producer.polls, 3);
  expectEqual(scheduler.stats().cycles, 3);
});

test('ordinary cycle failures are survived, hard stops end the loop', async () => {
  const rig = await pipelineRig({ scheduler: { idleMs: 1 } });
  const producer = new ScriptedProducer('direct', async () => directFinding(20, 0.9));
  const scheduler = schedulerFor(rig, [register(producer, 2)]);
  rig.fleet.client('primary').failNext('getBaseFee', new Error('flaky'), new Error('flaky'), new Error('flaky'));
  const running = scheduler.run(new AbortController().signal);
  producer.respond = async () => {
    if (producer.polls >= 3) await rig.risk.trip('loss');
    return null;
  };
  expect((await caught(running)) instanceof RiskTrippedError, 'expected the trip to end the loop');
  expect(scheduler.stats().cycles >= 3, 'survived the failed cycle');
});
