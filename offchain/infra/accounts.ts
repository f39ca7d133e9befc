import type { Address, Hex } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import { SigningError } from './errors';

export type UnsignedTransaction = {
  chainId: number;
  to: Address;
  data: Hex;
  value: bigint;
  gas: bigint;
  nonce: number;
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
};

/** Signing service boundary. Unknown identities and malformed input fail with SigningError. */
export interface Signer {
  sign(tx: UnsignedTransaction, identity: Address): Promise<Hex>;
}

const PRIVATE_KEY_RE = /^0x[0-9a-fA-F]{64}$/;

function isPrivateKey(value: string): value is Hex {
  return PRIVATE_KEY_RE.test(value);
}

export class LocalKeySigner implements Signer {
  private readonly accounts = new Map<string, PrivateKeyAccount>();

  constructor(privateKeys: readonly string[]) {
    for (const raw of privateKeys) {
      const pk = raw.trim();
      if (!isPrivateKey(pk)) throw new SigningError('malformed private key');
      const account = privateKeyToAccount(pk);
      this.accounts.set(account.address.toLowerCase(), account);
    }
  }

  identities(): Address[] {
    return [...this.accounts.values()].map((account) => account.address);
  }

  async sign(tx: UnsignedTransaction, identity: Address): Promise<Hex> {
    const account = this.accounts.get(identity.toLowerCase());
    if (!account) throw new SigningError(`unknown signing identity ${identity}`);
    if (tx.gas <= 0n || tx.nonce < 0 || !Number.isInteger(tx.nonce)) {
      throw new SigningError(`malformed transaction for nonce ${tx.nonce}`);
    }
    try {
      return await account.signTransaction({
        type: 'eip1559',
        chainId: tx.chainId,
        to: tx.to,
        data: tx.data,
        value: tx.value,
        gas: tx.gas,
        nonce: tx.nonce,
        maxFeePerGas: tx.maxFeePerGas,
        maxPriorityFeePerGas: tx.maxPriorityFeePerGas,
      });
    } catch (err) {
      throw new SigningError(`signing failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

/** Executor key from WALLET_PK; the first identity is the executing wallet. */
export function signerFromEnv(env: NodeJS.ProcessEnv = process.env): { signer: LocalKeySigner; executor: Address } {
  const pk = env.WALLET_PK;
  if (!pk) throw new SigningError('WALLET_PK is not set');
  const signer = new LocalKeySigner([pk]);
  const [executor] = signer.identities();
  if (!executor) throw new SigningError('no signing identity configured');
  return { signer, executor };
}
