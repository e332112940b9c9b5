import { Injectable, Logger } from '@nestjs/common';
import { Result, err, ok } from 'neverthrow';
import { TxDetails, TxPoolContract } from '../chain/types';
import {
  DetailsFetchFailedError,
  HashListFetchFailedError,
  SignaturesFetchFailedError,
  TxNotFoundError,
  describeError,
} from '../common/errors';
import { isZeroAddress, sortByNonce, toHex, toTransactionRecord } from './normalizer';
import { FetchOneError, PendingTransactions, TransactionRecord } from './types';

export interface FetchOneOptions {
  /** Report a found transaction with no signatures instead of failing when `getSignatures` reverts. */
  tolerateMissingSignatures: boolean;
}

/**
 * Reads pool records one hash at a time. Every remote call is awaited before
 * the next one is issued and none is retried.
 */
@Injectable()
export class TxFetcher {
  private readonly logger = new Logger(TxFetcher.name);

  async fetchOne(
    pool: TxPoolContract,
    hash: string,
    options: FetchOneOptions,
  ): Promise<Result<TransactionRecord, FetchOneError>> {
    let details: TxDetails;
    try {
      details = await pool.getTxDetails(hash);
    } catch (error) {
      return err(new DetailsFetchFailedError(hash, error));
    }

    if (isZeroAddress(details.proposer)) {
      return err(new TxNotFoundError(hash));
    }

    let signatures: string[];
    try {
      signatures = await pool.getSignatures(hash);
    } catch (error) {
      if (!options.tolerateMissingSignatures) {
        return err(new SignaturesFetchFailedError(hash, error));
      }
      this.logger.warn(
        `Failed to fetch signatures for transaction ${hash}, reporting it without signatures: ${describeError(error)}`,
      );
      signatures = [];
    }

    return ok(toTransactionRecord(hash, details, signatures));
  }

  fetchSingle(pool: TxPoolContract, hash: string): Promise<Result<TransactionRecord, FetchOneError>> {
    return this.fetchOne(pool, hash, { tolerateMissingSignatures: false });
  }

  /**
   * Fetches every pending transaction of a Safe. Only the hash list call is
   * fatal; a hash whose details cannot be read is skipped with a warning.
   */
  async fetchPending(
    pool: TxPoolContract,
    safe: string,
  ): Promise<Result<PendingTransactions, HashListFetchFailedError>> {
    let hashes: string[];
    try {
      hashes = await pool.getPendingTxHashes(safe);
    } catch (error) {
      return err(new HashListFetchFailedError(safe, error));
    }

    const pending: PendingTransactions = { total: hashes.length, records: [], skipped: [] };
    if (hashes.length === 0) {
      return ok(pending);
    }

    this.logger.log(`Found ${hashes.length} pending transactions`);

    for (const rawHash of hashes) {
      const hash = toHex(rawHash);
      const result = await this.fetchOne(pool, hash, { tolerateMissingSignatures: true });
      if (result.isOk()) {
        pending.records.push(result.value);
        continue;
      }
      this.logger.warn(`Skipping transaction ${hash}: ${result.error.message}`);
      pending.skipped.push({ hash, reason: result.error });
    }

    return ok({ ...pending, records: sortByNonce(pending.records) });
  }
}
