import { INestApplicationContext } from '@nestjs/common';
import { Command } from 'commander';
import { NetworkResolver } from '../network/network-resolver.service';
import { TxPoolService } from '../tx-pool/tx-pool.service';
import { LogFlags } from './cli-logger';
import { formatNetworks, formatQueryResult, formatSignatureCheck } from './output';

interface TxCommandOptions {
  safe: string;
  rpc?: string;
  hash?: string;
  txPool?: string;
}

interface SignedCommandOptions {
  safe: string;
  hash: string;
  signer: string;
  rpc?: string;
  txPool?: string;
}

export interface ProgramIo {
  createContext(flags: LogFlags): Promise<INestApplicationContext>;
  /** Command output (stdout). */
  write(text: string): void;
  /** Reports a failed command; the caller decides the exit code. */
  fail(message: string): void;
}

async function withContext(
  io: ProgramIo,
  flags: LogFlags,
  run: (app: INestApplicationContext) => Promise<void>,
): Promise<void> {
  const app = await io.createContext(flags);
  try {
    await run(app);
  } finally {
    await app.close();
  }
}

export function createProgram(io: ProgramIo): Command {
  const program = new Command('txpool')
    .description('Inspect pending Safe multisig transactions stored in a SafeTxPool contract')
    .option('--verbose', 'include debug logs')
    .option('--quiet', 'only log errors');

  program
    .command('tx')
    .description('Fetch one transaction by hash, or every pending transaction of a Safe')
    .requiredOption('-s, --safe <address>', 'Safe wallet address')
    .option('-r, --rpc <url>', 'JSON-RPC endpoint (defaults to RPC_URL, then a public mainnet endpoint)')
    .option('--hash <hash>', 'transaction hash to fetch')
    .option('--tx-pool <address>', 'SafeTxPool contract address, overriding the network default')
    .action(async (options: TxCommandOptions) => {
      await withContext(io, program.opts<LogFlags>(), async (app) => {
        const result = await app.get(TxPoolService).getTransactions({
          safe: options.safe,
          rpcUrl: options.rpc,
          hash: options.hash,
          txPool: options.txPool,
        });
        if (result.isErr()) {
          io.fail(result.error.message);
          return;
        }
        io.write(formatQueryResult(result.value));
      });
    });

  program
    .command('signed')
    .description('Check whether an owner has signed a pending transaction')
    .requiredOption('-s, --safe <address>', 'Safe wallet address')
    .requiredOption('--hash <hash>', 'transaction hash')
    .requiredOption('--signer <address>', 'owner address to check')
    .option('-r, --rpc <url>', 'JSON-RPC endpoint (defaults to RPC_URL, then a public mainnet endpoint)')
    .option('--tx-pool <address>', 'SafeTxPool contract address, overriding the network default')
    .action(async (options: SignedCommandOptions) => {
      await withContext(io, program.opts<LogFlags>(), async (app) => {
        const result = await app.get(TxPoolService).checkSignature({
          safe: options.safe,
          hash: options.hash,
          signer: options.signer,
          rpcUrl: options.rpc,
          txPool: options.txPool,
        });
        if (result.isErr()) {
          io.fail(result.error.message);
          return;
        }
        io.write(formatSignatureCheck(result.value));
      });
    });

  program
    .command('networks')
    .description('List networks with a known SafeTxPool deployment')
    .action(async () => {
      await withContext(io, program.opts<LogFlags>(), async (app) => {
        io.write(formatNetworks(app.get(NetworkResolver).list()));
      });
    });

  return program;
}
