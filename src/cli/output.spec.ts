import { ResolvedNetwork } from '../network/types';
import { PROPOSER, SAFE, TARGET, txHash } from '../testing/fake-chain';
import { TransactionRecord } from '../tx-pool/types';
import { formatNetworks, formatQueryResult, formatSignatureCheck } from './output';

const network: ResolvedNetwork = {
  chainId: 8453n,
  displayName: 'Base',
  defaultPoolAddress: '0x2d340e22C5A33c1Ea01DAC41E331b7FE4c033C3b',
  known: true,
};

const record: TransactionRecord = {
  hash: txHash('0a'),
  safe: SAFE,
  to: TARGET,
  value: '1000000000000000000',
  data: '0x',
  operation: 0,
  proposer: PROPOSER,
  nonce: '12',
  signatures: ['0x01'],
};

describe('formatQueryResult', () => {
  it('prints a single record as indented JSON', () => {
    expect(formatQueryResult({ mode: 'single', network, transaction: record })).toBe(
      [
        '{',
        `  "hash": "${txHash('0a')}",`,
        `  "safe": "${SAFE}",`,
        `  "to": "${TARGET}",`,
        '  "value": "1000000000000000000",',
        '  "data": "0x",',
        '  "operation": 0,',
        `  "proposer": "${PROPOSER}",`,
        '  "nonce": "12",',
        '  "signatures": [',
        '    "0x01"',
        '  ]',
        '}',
      ].join('\n'),
    );
  });

  it('prints pending records as a JSON array', () => {
    const output = formatQueryResult({ mode: 'pending', network, transactions: [record, record], skipped: [] });

    expect(JSON.parse(output)).toEqual([record, record]);
  });

  it('prints an empty array when every hash was skipped', () => {
    expect(formatQueryResult({ mode: 'pending', network, transactions: [], skipped: [] })).toBe('[]');
  });

  it('says so when the Safe has nothing pending', () => {
    expect(formatQueryResult({ mode: 'none', network, safe: SAFE })).toBe(`No pending transactions found for Safe ${SAFE}`);
  });
});

describe('formatSignatureCheck', () => {
  it('prints the check as JSON', () => {
    expect(JSON.parse(formatSignatureCheck({ hash: txHash('0a'), signer: SAFE, signed: false }))).toEqual({
      hash: txHash('0a'),
      signer: SAFE,
      signed: false,
    });
  });
});

describe('formatNetworks', () => {
  it('renders chain ids as decimal text', () => {
    expect(JSON.parse(formatNetworks([network]))).toEqual([
      { chainId: '8453', name: 'Base', safeTxPool: '0x2d340e22C5A33c1Ea01DAC41E331b7FE4c033C3b' },
    ]);
  });
});
