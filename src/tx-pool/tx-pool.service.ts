import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Result, err, ok } from 'neverthrow';
import { CHAIN_CLIENT_FACTORY, ChainClient, ChainClientFactory, TxPoolContract } from '../chain/types';
import { NetworkUnreachableError, SignatureCheckFailedError, TxPoolFailure } from '../common/errors';
import { DEFAULT_RPC_URL } from '../config/networks';
import { NetworkResolver } from '../network/network-resolver.service';
import { ResolvedNetwork } from '../network/types';
import { ExistenceVerifier } from './existence-verifier.service';
import { TxFetcher } from './tx-fetcher.service';
import { SignatureCheck, SignatureQuery, TxQuery, TxQueryResult } from './types';
import { choosePoolAddress, parseAddress, parseOptionalAddress, parseTxHash } from './validation';

interface PoolSession {
  network: ResolvedNetwork;
  safe: string;
  pool: TxPoolContract;
}

@Injectable()
export class TxPoolService {
  private readonly logger = new Logger(TxPoolService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(CHAIN_CLIENT_FACTORY)
    private readonly chainClientFactory: ChainClientFactory,
    private readonly networkResolver: NetworkResolver,
    private readonly existenceVerifier: ExistenceVerifier,
    private readonly txFetcher: TxFetcher,
  ) {}

  /**
   * Fetches one transaction when `query.hash` is set, otherwise every pending
   * transaction of the Safe. All input is validated before the first RPC call.
   */
  async getTransactions(query: TxQuery): Promise<Result<TxQueryResult, TxPoolFailure>> {
    const safe = parseAddress(query.safe, 'safe');
    if (safe.isErr()) return err(safe.error);

    const override = parseOptionalAddress(query.txPool ?? this.configuredPoolAddress(), 'pool');
    if (override.isErr()) return err(override.error);

    const requestedHash = query.hash;
    if (requestedHash === undefined) {
      return this.withSession(safe.value, override.value, query.rpcUrl, (session) => this.fetchPending(session));
    }

    const hash = parseTxHash(requestedHash);
    if (hash.isErr()) return err(hash.error);

    return this.withSession<TxQueryResult>(safe.value, override.value, query.rpcUrl, async ({ network, pool }) => {
      this.logger.log(`Fetching transaction with hash ${hash.value} for Safe ${safe.value}`);
      const record = await this.txFetcher.fetchSingle(pool, hash.value);
      if (record.isErr()) return err(record.error);
      return ok({ mode: 'single', network, transaction: record.value });
    });
  }

  async checkSignature(query: SignatureQuery): Promise<Result<SignatureCheck, TxPoolFailure>> {
    const safe = parseAddress(query.safe, 'safe');
    if (safe.isErr()) return err(safe.error);

    const override = parseOptionalAddress(query.txPool ?? this.configuredPoolAddress(), 'pool');
    if (override.isErr()) return err(override.error);

    const hash = parseTxHash(query.hash);
    if (hash.isErr()) return err(hash.error);

    const signer = parseAddress(query.signer, 'signer');
    if (signer.isErr()) return err(signer.error);

    return this.withSession<SignatureCheck>(safe.value, override.value, query.rpcUrl, async ({ pool }) => {
      try {
        const signed = await pool.hasSignedTx(hash.value, signer.value);
        return ok({ hash: hash.value, signer: signer.value.toLowerCase(), signed });
      } catch (error) {
        return err(new SignatureCheckFailedError(hash.value, signer.value, error));
      }
    });
  }

  private async fetchPending(session: PoolSession): Promise<Result<TxQueryResult, TxPoolFailure>> {
    const { network, pool, safe } = session;
    this.logger.log(`Fetching all pending transactions for Safe ${safe}`);

    const pending = await this.txFetcher.fetchPending(pool, safe);
    if (pending.isErr()) return err(pending.error);

    const { total, records, skipped } = pending.value;
    if (total === 0) {
      return ok({ mode: 'none', network, safe });
    }
    if (skipped.length > 0) {
      this.logger.warn(`Skipped ${skipped.length} of ${total} pending transactions`);
    }
    return ok({ mode: 'pending', network, transactions: records, skipped });
  }

  // The client lives for exactly one query
  private async withSession<T>(
    safe: string,
    override: string | undefined,
    rpcUrl: string | undefined,
    work: (session: PoolSession) => Promise<Result<T, TxPoolFailure>>,
  ): Promise<Result<T, TxPoolFailure>> {
    const client = this.chainClientFactory.connect(this.resolveRpcUrl(rpcUrl));
    try {
      const session = await this.openSession(client, safe, override);
      if (session.isErr()) return err(session.error);
      return await work(session.value);
    } finally {
      client.destroy();
    }
  }

  private async openSession(
    client: ChainClient,
    safe: string,
    override: string | undefined,
  ): Promise<Result<PoolSession, TxPoolFailure>> {
    let chainId: bigint;
    try {
      chainId = await client.getChainId();
    } catch (error) {
      return err(new NetworkUnreachableError(client.rpcUrl, error));
    }

    const network = this.networkResolver.resolve(chainId);
    this.logger.log(`Connected to ${network.displayName} (Chain ID: ${chainId})`);

    const wallet = await this.existenceVerifier.verifyWallet(client, safe, network);
    if (wallet.isErr()) return err(wallet.error);

    const poolAddress = choosePoolAddress(override, network);
    if (poolAddress.source === 'override') {
      this.logger.log(`Using custom Safe transaction pool address: ${poolAddress.address}`);
    } else {
      this.logger.log(`Using Safe transaction pool at ${poolAddress.address} for ${network.displayName}`);
    }

    const deployed = await this.existenceVerifier.verifyPool(client, poolAddress.address, network);
    if (deployed.isErr()) return err(deployed.error);

    return ok({ network, safe, pool: client.txPool(poolAddress.address) });
  }

  private resolveRpcUrl(explicit: string | undefined): string {
    const rpcUrl = explicit ?? this.configService.get<string>('RPC_URL');
    if (rpcUrl) {
      return rpcUrl;
    }
    this.logger.log('No RPC URL provided, using default Ethereum mainnet RPC');
    return DEFAULT_RPC_URL;
  }

  private configuredPoolAddress(): string | undefined {
    return this.configService.get<string>('TX_POOL_ADDRESS') || undefined;
  }
}
