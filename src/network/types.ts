export interface NetworkEntry {
  chainId: bigint;
  displayName: string;
  safeTxPool: string;
}

export interface ResolvedNetwork {
  chainId: bigint;
  displayName: string;
  defaultPoolAddress: string;
  known: boolean;
}

export const NETWORK_TABLE = 'NetworkTable';
