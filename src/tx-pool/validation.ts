import { ethers } from 'ethers';
import { Result, err, ok } from 'neverthrow';
import { AddressRole, InvalidAddressError, InvalidHashError } from '../common/errors';
import { ResolvedNetwork } from '../network/types';
import { PoolAddressChoice } from './types';

export function parseAddress(value: string, role: AddressRole): Result<string, InvalidAddressError> {
  const trimmed = value.trim();
  if (!ethers.isAddress(trimmed)) {
    return err(new InvalidAddressError(role, value));
  }
  return ok(ethers.getAddress(trimmed));
}

export function parseOptionalAddress(
  value: string | undefined,
  role: AddressRole,
): Result<string | undefined, InvalidAddressError> {
  return value === undefined ? ok(undefined) : parseAddress(value, role);
}

export function parseTxHash(value: string): Result<string, InvalidHashError> {
  const trimmed = value.trim();
  if (!ethers.isHexString(trimmed, 32)) {
    return err(new InvalidHashError(value));
  }
  return ok(trimmed.toLowerCase());
}

/** A validated override always beats the network's deployment. */
export function choosePoolAddress(override: string | undefined, network: ResolvedNetwork): PoolAddressChoice {
  if (override !== undefined) {
    return { address: override, source: 'override' };
  }
  // Table entries are not checksum-verified, so re-derive the checksum
  return { address: ethers.getAddress(network.defaultPoolAddress.toLowerCase()), source: 'network' };
}
