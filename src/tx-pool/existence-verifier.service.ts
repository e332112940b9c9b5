import { Injectable, Logger } from '@nestjs/common';
import { ethers } from 'ethers';
import { Result, err, ok } from 'neverthrow';
import { ChainClient } from '../chain/types';
import { NetworkUnreachableError, PoolNotDeployedError, WalletNotDeployedError } from '../common/errors';
import { ResolvedNetwork } from '../network/types';

@Injectable()
export class ExistenceVerifier {
  private readonly logger = new Logger(ExistenceVerifier.name);

  /**
   * Succeeds iff the address holds non-empty bytecode. `onMissing` builds the
   * caller's own error so wallet and pool failures stay distinguishable.
   */
  async verifyDeployed<E>(
    client: ChainClient,
    address: string,
    onMissing: () => E,
  ): Promise<Result<void, E | NetworkUnreachableError>> {
    let code: string;
    try {
      code = await client.getCode(address);
    } catch (error) {
      return err(new NetworkUnreachableError(client.rpcUrl, error));
    }

    const size = ethers.dataLength(code);
    this.logger.debug(`Code size at ${address}: ${size} bytes`);
    return size > 0 ? ok(undefined) : err(onMissing());
  }

  verifyWallet(
    client: ChainClient,
    address: string,
    network: ResolvedNetwork,
  ): Promise<Result<void, WalletNotDeployedError | NetworkUnreachableError>> {
    return this.verifyDeployed(client, address, () => new WalletNotDeployedError(address, network.displayName));
  }

  verifyPool(
    client: ChainClient,
    address: string,
    network: ResolvedNetwork,
  ): Promise<Result<void, PoolNotDeployedError | NetworkUnreachableError>> {
    return this.verifyDeployed(client, address, () => new PoolNotDeployedError(address, network.displayName));
  }
}
