import { Injectable, Logger } from '@nestjs/common';
import { ethers } from 'ethers';
import { SAFE_TX_POOL_ABI } from './safe-tx-pool.abi';
import { ChainClient, ChainClientFactory, TxDetails, TxPoolContract } from './types';

type TxDetailsTuple = [string, string, bigint, string, bigint, string, bigint];

export class EthersTxPoolContract implements TxPoolContract {
  private readonly contract: ethers.Contract;

  constructor(
    readonly address: string,
    runner: ethers.ContractRunner,
  ) {
    this.contract = new ethers.Contract(address, SAFE_TX_POOL_ABI, runner);
  }

  async getTxDetails(txHash: string): Promise<TxDetails> {
    const [safe, to, value, data, operation, proposer, nonce]: TxDetailsTuple = await this.contract
      .getFunction('getTxDetails')
      .staticCall(txHash);

    return { safe, to, value, data, operation: Number(operation), proposer, nonce };
  }

  async getSignatures(txHash: string): Promise<string[]> {
    const signatures: string[] = await this.contract.getFunction('getSignatures').staticCall(txHash);
    return [...signatures];
  }

  async getPendingTxHashes(safe: string): Promise<string[]> {
    const hashes: string[] = await this.contract.getFunction('getPendingTxHashes').staticCall(safe);
    return [...hashes];
  }

  async hasSignedTx(txHash: string, signer: string): Promise<boolean> {
    const signed: boolean = await this.contract.getFunction('hasSignedTx').staticCall(txHash, signer);
    return signed;
  }
}

export class EthersChainClient implements ChainClient {
  private readonly provider: ethers.JsonRpcProvider;

  constructor(readonly rpcUrl: string) {
    this.provider = new ethers.JsonRpcProvider(rpcUrl);
  }

  async getChainId(): Promise<bigint> {
    const network = await this.provider.getNetwork();
    return network.chainId;
  }

  getCode(address: string): Promise<string> {
    return this.provider.getCode(address);
  }

  txPool(address: string): TxPoolContract {
    return new EthersTxPoolContract(address, this.provider);
  }

  destroy(): void {
    this.provider.destroy();
  }
}

@Injectable()
export class EthersChainClientFactory implements ChainClientFactory {
  private readonly logger = new Logger(EthersChainClientFactory.name);

  connect(rpcUrl: string): ChainClient {
    this.logger.debug(`Creating JSON-RPC provider for ${rpcUrl}`);
    return new EthersChainClient(rpcUrl);
  }
}
