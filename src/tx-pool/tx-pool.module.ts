import { Module } from '@nestjs/common';
import { ChainModule } from '../chain/chain.module';
import { NetworkModule } from '../network/network.module';
import { ExistenceVerifier } from './existence-verifier.service';
import { TxFetcher } from './tx-fetcher.service';
import { TxPoolService } from './tx-pool.service';

@Module({
  imports: [ChainModule, NetworkModule],
  providers: [ExistenceVerifier, TxFetcher, TxPoolService],
  exports: [TxPoolService],
})
export class TxPoolModule {}
