import {
  createPublicClient,
  http,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type Address,
  type Hash,
  type Hex,
} from 'viem';
import { instrument, metricTargetFromRpc } from './instrument';
import { log } from './logger';

export type CallRequest = {
  from?: Address;
  to: Address;
  data: Hex;
  value?: bigint;
  gas?: bigint;
};

export type ChainTransaction = {
  hash: Hash;
  from: Address;
  to: Address | null;
  value: bigint;
  input: Hex;
  nonce: number;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
};

export type ChainReceipt = {
  hash: Hash;
  status: 'success' | 'reverted';
  blockNumber: bigint;
  gasUsed: bigint;
  effectiveGasPrice: bigint;
};

/** The slice of JSON-RPC the engine needs from one endpoint tier. */
export interface RpcClient {
  readonly url: string;
  getChainId(): Promise<number>;
  getBlockNumber(): Promise<bigint>;
  /** Base fee of the latest block; null on chains without EIP-1559. */
  getBaseFee(): Promise<bigint | null>;
  getGasPrice(): Promise<bigint>;
  getTransactionCount(address: Address, blockTag: 'latest' | 'pending'): Promise<number>;
  getBalance(address: Address): Promise<bigint>;
  call(request: CallRequest): Promise<Hex>;
  sendRawTransaction(serialized: Hex): Promise<Hash>;
  getTransaction(hash: Hash): Promise<ChainTransaction | null>;
  getTransactionReceipt(hash: Hash): Promise<ChainReceipt | null>;
}

export type RpcClientFactory = (url: string, tierName: string) => RpcClient;

const HTTP_TIMEOUT_MS = Number(process.env.RPC_HTTP_TIMEOUT_MS ?? 10_000);

// Retries and failover belong to the endpoint manager, so the transport gets none.
export const createRpcClient: RpcClientFactory = (url, tierName) => {
  const client = createPublicClient({ transport: http(url, { retryCount: 0, timeout: HTTP_TIMEOUT_MS }) });
  const target = metricTargetFromRpc(url, tierName);
  log.info({ tier: tierName, target }, 'rpc-http-client-created');

  return {
    url,
    getChainId: () => instrument('rpc', 'getChainId', () => client.getChainId(), { target }),
    getBlockNumber: () => instrument('rpc', 'getBlockNumber', () => client.getBlockNumber({ cacheTime: 0 }), { target }),
    getBaseFee: () =>
      instrument(
        'rpc',
        'getBlock',
        async () => {
          const block = await client.getBlock({ blockTag: 'latest' });
          return block.baseFeePerGas ?? null;
        },
        { target },
      ),
    getGasPrice: () => instrument('rpc', 'getGasPrice', () => client.getGasPrice(), { target }),
    getTransactionCount: (address, blockTag) =>
      instrument('rpc', 'getTransactionCount', () => client.getTransactionCount({ address, blockTag }), { target }),
    getBalance: (address) => instrument('rpc', 'getBalance', () => client.getBalance({ address }), { target }),
    call: (request) =>
      instrument(
        'rpc',
        'call',
        async () => {
          const result = await client.call({
            account: request.from,
            to: request.to,
            data: request.data,
            value: request.value,
            gas: request.gas,
          });
          return result.data ?? '0x';
        },
        { target },
      ),
    sendRawTransaction: (serialized) =>
      instrument('rpc', 'sendRawTransaction', () => client.sendRawTransaction({ serializedTransaction: serialized }), {
        target,
      }),
    getTransaction: (hash) =>
      instrument(
        'rpc',
        'getTransaction',
        async () => {
          try {
            const tx = await client.getTransaction({ hash });
            return {
              hash: tx.hash,
              from: tx.from,
              to: tx.to,
              value: tx.value,
              input: tx.input,
              nonce: tx.nonce,
              gasPrice: tx.gasPrice,
              maxFeePerGas: tx.maxFeePerGas,
              maxPriorityFeePerGas: tx.maxPriorityFeePerGas,
            };
          } catch (err) {
            if (err instanceof TransactionNotFoundError) return null;
            throw err;
          }
        },
        { target },
      ),
    getTransactionReceipt: (hash) =>
      instrument(
        'rpc',
        'getTransactionReceipt',
        async () => {
          try {
            const receipt = await client.getTransactionReceipt({ hash });
            return {
              hash: receipt.transactionHash,
              status: receipt.status,
              blockNumber: receipt.blockNumber,
              gasUsed: receipt.gasUsed,
              effectiveGasPrice: receipt.effectiveGasPrice,
            };
          } catch (err) {
            if (err instanceof TransactionReceiptNotFoundError) return null;
            throw err;
          }
        },
        { target },
      ),
  };
};
