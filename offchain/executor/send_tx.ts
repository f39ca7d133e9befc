import type { Address, Hash, Hex } from 'viem';
import type { Signer } from '../infra/accounts';
import type { EndpointManager } from '../infra/endpoints';
import { log } from '../infra/logger';
import { histogram } from '../infra/metrics';
import type { ChainReceipt } from '../infra/rpc_clients';
import { sleep, systemClock, type Clock } from '../infra/time';
import type { FeeParameters } from '../pipeline/types';
import { toUnsigned } from './build_tx';

export type OutgoingTransaction = {
  to: Address;
  data: Hex;
  value: bigint;
  gasLimit: bigint;
  fees: FeeParameters;
};

const sendLog = log.child({ module: 'executor.send_tx' });

export class TransactionSender {
  constructor(
    private readonly endpoints: EndpointManager,
    private readonly signer: Signer,
    readonly identity: Address,
    private readonly chainId: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Signs with the executing identity and broadcasts through the current endpoint tier. */
  async send(nonce: number, tx: OutgoingTransaction): Promise<Hash> {
    const serialized = await this.signer.sign(toUnsigned(this.chainId, nonce, tx), this.identity);
    const hash = await this.endpoints.execute('send-raw-transaction', (client) => client.sendRawTransaction(serialized));
    sendLog.info({ nonce, hash, to: tx.to, maxFeePerGas: tx.fees.maxFeePerGas.toString() }, 'tx-submitted');
    return hash;
  }

  /** Polls for the receipt until `timeoutMs` elapses; null means still pending. */
  async waitForReceipt(hash: Hash, timeoutMs: number, pollMs: number, signal?: AbortSignal): Promise<ChainReceipt | null> {
    const started = this.clock();
    const end = histogram.confirmLatency.startTimer();
    for (;;) {
      const receipt = await this.endpoints.execute('receipt', (client) => client.getTransactionReceipt(hash));
      if (receipt) {
        end();
        return receipt;
      }
      if (signal?.aborted || this.clock() - started >= timeoutMs) return null;
      await sleep(Math.min(pollMs, Math.max(0, timeoutMs - (this.clock() - started))), signal);
    }
  }

  async currentBlock(): Promise<bigint> {
    return this.endpoints.execute('block-number', (client) => client.getBlockNumber());
  }
}
