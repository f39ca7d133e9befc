import { formatEther, parseEther, type Address, type Hash } from 'viem';
import type { EndpointManager } from '../infra/endpoints';
import { log } from '../infra/logger';
import { TRANSFER_GAS } from './build_tx';
import type { GasPricer } from './gas';
import type { NonceSequencer } from './nonce';
import type { TransactionSender } from './send_tx';

export type SweepDeps = {
  endpoints: EndpointManager;
  nonces: NonceSequencer;
  sender: TransactionSender;
  gas: GasPricer;
};

const sweepLog = log.child({ module: 'executor.sweep' });

/**
 * Moves the executor's native balance above `reserveEth` (and the transfer's
 * own fee) to the safe address. Returns the transfer hash, or null when there
 * is nothing worth moving.
 */
export async function sweepFunds(deps: SweepDeps, safe: Address, reserveEth: number): Promise<Hash | null> {
  const { endpoints, nonces, sender, gas } = deps;
  const identity = sender.identity;
  if (safe.toLowerCase() === identity.toLowerCase()) {
    sweepLog.warn({ safe }, 'sweep-target-is-executor');
    return null;
  }
  const balance = await endpoints.execute('sweep-balance', (client) => client.getBalance(identity));
  const baseFee = await gas.jitPrice();
  const fees = gas.feeParameters(baseFee, gas.floorTipWei());
  const reserve = parseEther(reserveEth.toFixed(18));
  const amount = balance - reserve - TRANSFER_GAS * fees.maxFeePerGas;
  if (amount <= 0n) {
    sweepLog.info({ balance: formatEther(balance), reserveEth }, 'sweep-nothing-to-move');
    return null;
  }
  const nonce = await nonces.allocate();
  try {
    const hash = await sender.send(nonce, { to: safe, data: '0x', value: amount, gasLimit: TRANSFER_GAS, fees });
    sweepLog.warn({ safe, amount: formatEther(amount), hash, nonce }, 'funds-swept');
    return hash;
  } catch (err) {
    await nonces.resync();
    throw err;
  }
}
