/**
 * Decoded `getTxDetails` tuple. A zero `proposer` means the pool holds no
 * record for the hash.
 */
export interface TxDetails {
  safe: string;
  to: string;
  value: bigint;
  data: string;
  operation: number;
  proposer: string;
  nonce: bigint;
}

/** Read-only view of a SafeTxPool deployment. */
export interface TxPoolContract {
  readonly address: string;
  getTxDetails(txHash: string): Promise<TxDetails>;
  getSignatures(txHash: string): Promise<string[]>;
  getPendingTxHashes(safe: string): Promise<string[]>;
  hasSignedTx(txHash: string, signer: string): Promise<boolean>;
}

export interface ChainClient {
  readonly rpcUrl: string;
  getChainId(): Promise<bigint>;
  /** Deployed bytecode, `0x` when nothing lives at the address. */
  getCode(address: string): Promise<string>;
  txPool(address: string): TxPoolContract;
  destroy(): void;
}

export interface ChainClientFactory {
  connect(rpcUrl: string): ChainClient;
}

export const CHAIN_CLIENT_FACTORY = 'ChainClientFactory';
