export type AddressRole = 'safe' | 'pool' | 'signer';

/**
 * Extracts a readable message from whatever an RPC call rejected with.
 * ethers errors carry a `shortMessage` without the appended request dump.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const shortMessage: unknown = Reflect.get(error, 'shortMessage');
    return typeof shortMessage === 'string' && shortMessage.length > 0 ? shortMessage : error.message;
  }
  return String(error);
}

export abstract class TxPoolError extends Error {
  abstract readonly kind: string;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

const ADDRESS_LABELS: Record<AddressRole, string> = {
  safe: 'Invalid Safe wallet address format',
  pool: 'Invalid custom Safe transaction pool address',
  signer: 'Invalid signer address format',
};

export class InvalidAddressError extends TxPoolError {
  readonly kind = 'InvalidAddress';

  constructor(
    readonly role: AddressRole,
    readonly value: string,
  ) {
    super(`${ADDRESS_LABELS[role]}: ${value}`);
  }
}

export class InvalidHashError extends TxPoolError {
  readonly kind = 'InvalidHash';

  constructor(readonly value: string) {
    super(`Invalid transaction hash format: ${value}`);
  }
}

export class NetworkUnreachableError extends TxPoolError {
  readonly kind = 'NetworkUnreachable';

  constructor(
    readonly rpcUrl: string,
    cause: unknown,
  ) {
    super(`Failed to query the network at ${rpcUrl}: ${describeError(cause)}`, cause);
  }
}

export class WalletNotDeployedError extends TxPoolError {
  readonly kind = 'WalletNotDeployed';

  constructor(
    readonly address: string,
    readonly network: string,
  ) {
    super(`Safe wallet address ${address} not found on ${network}`);
  }
}

export class PoolNotDeployedError extends TxPoolError {
  readonly kind = 'PoolNotDeployed';

  constructor(
    readonly address: string,
    readonly network: string,
  ) {
    super(
      `Transaction pool contract not found at ${address}. Please verify the contract address for ${network} is correct.`,
    );
  }
}

export class DetailsFetchFailedError extends TxPoolError {
  readonly kind = 'DetailsFetchFailed';

  constructor(
    readonly hash: string,
    cause: unknown,
  ) {
    super(
      `Failed to fetch transaction details for ${hash}: ${describeError(cause)}. ` +
        'This could be because the transaction does not exist or the contract interface is incorrect.',
      cause,
    );
  }
}

export class SignaturesFetchFailedError extends TxPoolError {
  readonly kind = 'SignaturesFetchFailed';

  constructor(
    readonly hash: string,
    cause: unknown,
  ) {
    super(`Failed to fetch transaction signatures for ${hash}: ${describeError(cause)}`, cause);
  }
}

export class HashListFetchFailedError extends TxPoolError {
  readonly kind = 'HashListFetchFailed';

  constructor(
    readonly safe: string,
    cause: unknown,
  ) {
    super(
      `Failed to fetch pending transaction hashes for Safe ${safe}: ${describeError(cause)}. ` +
        'This could be because the contract interface is incorrect or the contract does not support this function.',
      cause,
    );
  }
}

/** The pool answered, but the proposer slot holds the zero address. */
export class TxNotFoundError extends TxPoolError {
  readonly kind = 'NotFound';

  constructor(readonly hash: string) {
    super(`Transaction ${hash} not found or has already been executed`);
  }
}

export class SignatureCheckFailedError extends TxPoolError {
  readonly kind = 'SignatureCheckFailed';

  constructor(
    readonly hash: string,
    readonly signer: string,
    cause: unknown,
  ) {
    super(`Failed to check whether ${signer} signed ${hash}: ${describeError(cause)}`, cause);
  }
}

export type TxPoolFailure =
  | InvalidAddressError
  | InvalidHashError
  | NetworkUnreachableError
  | WalletNotDeployedError
  | PoolNotDeployedError
  | DetailsFetchFailedError
  | SignaturesFetchFailedError
  | HashListFetchFailedError
  | TxNotFoundError
  | SignatureCheckFailedError;

export type TxPoolErrorKind = TxPoolFailure['kind'];
