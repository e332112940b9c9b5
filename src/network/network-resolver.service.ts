import { Inject, Injectable } from '@nestjs/common';
import { DEFAULT_SAFE_TX_POOL_ADDRESS, UNKNOWN_NETWORK_NAME } from '../config/networks';
import { NETWORK_TABLE, NetworkEntry, ResolvedNetwork } from './types';

@Injectable()
export class NetworkResolver {
  constructor(
    @Inject(NETWORK_TABLE)
    private readonly networks: readonly NetworkEntry[],
  ) {}

  /**
   * Maps a chain id to its display name and SafeTxPool deployment.
   * Never fails: unlisted chains get the fallback pool address.
   */
  resolve(chainId: bigint): ResolvedNetwork {
    const entry = this.networks.find((network) => network.chainId === chainId);
    if (!entry) {
      return {
        chainId,
        displayName: UNKNOWN_NETWORK_NAME,
        defaultPoolAddress: DEFAULT_SAFE_TX_POOL_ADDRESS,
        known: false,
      };
    }

    return {
      chainId,
      displayName: entry.displayName,
      defaultPoolAddress: entry.safeTxPool,
      known: true,
    };
  }

  list(): ResolvedNetwork[] {
    return this.networks.map((network) => this.resolve(network.chainId));
  }
}
