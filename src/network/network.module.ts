import { Module } from '@nestjs/common';
import { NETWORKS } from '../config/networks';
import { NetworkResolver } from './network-resolver.service';
import { NETWORK_TABLE } from './types';

@Module({
  providers: [{ provide: NETWORK_TABLE, useValue: NETWORKS }, NetworkResolver],
  exports: [NetworkResolver],
})
export class NetworkModule {}
