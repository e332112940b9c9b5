import { Module } from '@nestjs/common';
import { EthersChainClientFactory } from './ethers-chain-client';
import { CHAIN_CLIENT_FACTORY } from './types';

@Module({
  providers: [
    {
      provide: CHAIN_CLIENT_FACTORY,
      useClass: EthersChainClientFactory,
    },
  ],
  exports: [CHAIN_CLIENT_FACTORY],
})
export class ChainModule {}
