import type { EndpointManager } from '../infra/endpoints';
import { classifyRpcError, EndpointsExhaustedError, errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import type { TransactionIntent } from '../pipeline/types';

export type SimulationOutcome =
  | { status: 'ok' }
  | { status: 'rejected'; reason: string }
  | { status: 'ambiguous'; reason: string };

const simLog = log.child({ module: 'executor.simulate' });

/**
 * Dry-runs the intent with eth_call from the executing identity. Reverts and
 * insufficient-funds failures reject; any other failure is ambiguous and the
 * caller decides whether to proceed.
 */
export async function simulateIntent(endpoints: EndpointManager, intent: TransactionIntent): Promise<SimulationOutcome> {
  try {
    await endpoints.execute('simulate', (client) =>
      client.call({
        from: intent.from,
        to: intent.target,
        data: intent.calldata,
        value: intent.value,
        gas: intent.gasLimit,
      }),
    );
    return { status: 'ok' };
  } catch (err) {
    if (err instanceof EndpointsExhaustedError) throw err;
    const reason = errorMessage(err);
    if (classifyRpcError(err) === 'revert') {
      simLog.debug({ opportunityId: intent.opportunityId, reason }, 'simulation-reverted');
      return { status: 'rejected', reason };
    }
    simLog.warn({ opportunityId: intent.opportunityId, reason }, 'simulation-ambiguous');
    return { status: 'ambiguous', reason };
  }
}
