import { InvalidAddressError, InvalidHashError } from '../common/errors';
import { ResolvedNetwork } from '../network/types';
import { OTHER_POOL, SAFE } from '../testing/fake-chain';
import { choosePoolAddress, parseAddress, parseOptionalAddress, parseTxHash } from './validation';

const sepolia: ResolvedNetwork = {
  chainId: 11155111n,
  displayName: 'Sepolia Testnet',
  defaultPoolAddress: '0xa2ad21dc93B362570D0159b9E3A2fE5D8ecA0424',
  known: true,
};

describe('parseAddress', () => {
  it('accepts a well-formed address', () => {
    expect(parseAddress(SAFE, 'safe')._unsafeUnwrap()).toBe(SAFE);
  });

  it('trims surrounding whitespace', () => {
    expect(parseAddress(`  ${SAFE}\n`, 'safe')._unsafeUnwrap()).toBe(SAFE);
  });

  it.each(['', '0x1234', 'not-an-address', `${SAFE}00`])('rejects %p', (value) => {
    const error = parseAddress(value, 'safe')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidAddressError);
    expect(error.kind).toBe('InvalidAddress');
    expect(error.role).toBe('safe');
    expect(error.value).toBe(value);
  });

  it('names the role in the message', () => {
    expect(parseAddress('0xzz', 'pool')._unsafeUnwrapErr().message).toBe(
      'Invalid custom Safe transaction pool address: 0xzz',
    );
    expect(parseAddress('0xzz', 'safe')._unsafeUnwrapErr().message).toBe('Invalid Safe wallet address format: 0xzz');
  });
});

describe('parseOptionalAddress', () => {
  it('passes undefined through', () => {
    expect(parseOptionalAddress(undefined, 'pool')._unsafeUnwrap()).toBeUndefined();
  });

  it('validates a present value', () => {
    expect(parseOptionalAddress('0x12', 'pool').isErr()).toBe(true);
  });
});

describe('parseTxHash', () => {
  it('keeps a lowercase prefixed hash unchanged', () => {
    const hash = `0x${'0123456789abcdef'.repeat(4)}`;

    expect(parseTxHash(hash)._unsafeUnwrap()).toBe(hash);
  });

  it('lowercases hex digits', () => {
    expect(parseTxHash(`0x${'AB'.repeat(32)}`)._unsafeUnwrap()).toBe(`0x${'ab'.repeat(32)}`);
  });

  it.each([`0x${'ab'.repeat(31)}`, `0x${'ab'.repeat(33)}`, 'ab'.repeat(32), `0x${'zz'.repeat(32)}`])(
    'rejects %p',
    (value) => {
      const error = parseTxHash(value)._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(InvalidHashError);
      expect(error.message).toBe(`Invalid transaction hash format: ${value}`);
    },
  );
});

describe('choosePoolAddress', () => {
  it('prefers the override over the network default', () => {
    expect(choosePoolAddress(OTHER_POOL, sepolia)).toEqual({ address: OTHER_POOL, source: 'override' });
  });

  it('uses the network default without an override', () => {
    const choice = choosePoolAddress(undefined, sepolia);

    expect(choice.source).toBe('network');
    expect(choice.address.toLowerCase()).toBe('0xa2ad21dc93b362570d0159b9e3a2fe5d8eca0424');
  });
});
