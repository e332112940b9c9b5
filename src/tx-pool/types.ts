import {
  DetailsFetchFailedError,
  SignaturesFetchFailedError,
  TxNotFoundError,
} from '../common/errors';
import { ResolvedNetwork } from '../network/types';

export interface TransactionRecord {
  readonly hash: string;
  readonly safe: string;
  readonly to: string;
  readonly value: string;
  readonly data: string;
  readonly operation: number;
  readonly proposer: string;
  readonly nonce: string;
  readonly signatures: readonly string[];
}

export type FetchOneError = DetailsFetchFailedError | TxNotFoundError | SignaturesFetchFailedError;

export interface SkippedTransaction {
  hash: string;
  reason: FetchOneError;
}

export interface PendingTransactions {
  /** Number of hashes the pool reported, before any were skipped. */
  total: number;
  records: TransactionRecord[];
  skipped: SkippedTransaction[];
}

export type PoolAddressSource = 'override' | 'network';

export interface PoolAddressChoice {
  address: string;
  source: PoolAddressSource;
}

export interface TxQuery {
  safe: string;
  rpcUrl?: string;
  hash?: string;
  txPool?: string;
}

export interface SignatureQuery {
  safe: string;
  hash: string;
  signer: string;
  rpcUrl?: string;
  txPool?: string;
}

export type TxQueryResult =
  | { mode: 'single'; network: ResolvedNetwork; transaction: TransactionRecord }
  | {
      mode: 'pending';
      network: ResolvedNetwork;
      transactions: TransactionRecord[];
      skipped: SkippedTransaction[];
    }
  | { mode: 'none'; network: ResolvedNetwork; safe: string };

export interface SignatureCheck {
  hash: string;
  signer: string;
  signed: boolean;
}
