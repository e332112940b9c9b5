import { ethers } from 'ethers';
import { TxDetails } from '../chain/types';
import { TransactionRecord } from './types';

export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === ethers.ZeroAddress;
}

export function toHex(bytes: ethers.BytesLike): string {
  return ethers.hexlify(bytes);
}

export function toTransactionRecord(hash: string, details: TxDetails, signatures: string[]): TransactionRecord {
  return Object.freeze({
    hash: toHex(hash),
    safe: details.safe.toLowerCase(),
    to: details.to.toLowerCase(),
    value: details.value.toString(),
    data: toHex(details.data),
    operation: details.operation,
    proposer: details.proposer.toLowerCase(),
    nonce: details.nonce.toString(),
    signatures: Object.freeze(signatures.map(toHex)),
  });
}

const MAX_SORTABLE_NONCE = 2n ** 64n - 1n;

// Malformed nonces and nonces wider than 64 bits sort as 0
export function nonceOf(record: TransactionRecord): bigint {
  if (!/^\d+$/.test(record.nonce)) return 0n;
  const nonce = BigInt(record.nonce);
  return nonce > MAX_SORTABLE_NONCE ? 0n : nonce;
}

/** Ascending by nonce; equal nonces keep their input order. */
export function sortByNonce(records: readonly TransactionRecord[]): TransactionRecord[] {
  return [...records].sort((a, b) => {
    const left = nonceOf(a);
    const right = nonceOf(b);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });
}
