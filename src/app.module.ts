import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NetworkModule } from './network/network.module';
import { TxPoolModule } from './tx-pool/tx-pool.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: '.env', // Explicitly specify .env file
      isGlobal: true, // Make env vars globally available
    }),
    NetworkModule,
    TxPoolModule,
  ],
})
export class AppModule {}
