import { ResolvedNetwork } from '../network/types';
import { SignatureCheck, TxQueryResult } from '../tx-pool/types';

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatQueryResult(result: TxQueryResult): string {
  switch (result.mode) {
    case 'single':
      return toJson(result.transaction);
    case 'pending':
      return toJson(result.transactions);
    case 'none':
      return `No pending transactions found for Safe ${result.safe}`;
  }
}

export function formatSignatureCheck(check: SignatureCheck): string {
  return toJson(check);
}

// chainId is a bigint, which JSON.stringify rejects
export function formatNetworks(networks: ResolvedNetwork[]): string {
  return toJson(
    networks.map((network) => ({
      chainId: network.chainId.toString(),
      name: network.displayName,
      safeTxPool: network.defaultPoolAddress,
    })),
  );
}
