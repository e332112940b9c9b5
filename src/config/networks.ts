import { NetworkEntry } from '../network/types';

// Public fallback endpoint; use your own API key for anything beyond a quick look
export const DEFAULT_RPC_URL = 'https://eth-mainnet.g.alchemy.com/v2/demo';

export const UNKNOWN_NETWORK_NAME = 'Unknown Network';

// Used when the connected chain is not listed below
export const DEFAULT_SAFE_TX_POOL_ADDRESS = '0x6b8e1f0D2c34A0AeaD9A25B6966f7C0CAD653E5c';

// SafeTxPool deployments per chain
export const NETWORKS: readonly NetworkEntry[] = Object.freeze([
  {
    chainId: 1n,
    displayName: 'Ethereum Mainnet',
    safeTxPool: '0x6b8e1f0D2c34A0AeaD9A25B6966f7C0CAD653E5c',
  },
  {
    chainId: 5n,
    displayName: 'Goerli Testnet',
    safeTxPool: '0x3A4fA54b8AaB5E2E2DBD0a41f41f629e4e71e2E7',
  },
  {
    chainId: 11155111n,
    displayName: 'Sepolia Testnet',
    safeTxPool: '0xa2ad21dc93B362570D0159b9E3A2fE5D8ecA0424',
  },
  {
    chainId: 137n,
    displayName: 'Polygon',
    safeTxPool: '0xA3B9Ff95a78e04845a82ee5F75595E7bDaB8723D',
  },
  {
    chainId: 42161n,
    displayName: 'Arbitrum',
    safeTxPool: '0x7c4A2Db70E5f39BA5Db11B8A942f02A8D3B3aA1B',
  },
  {
    chainId: 10n,
    displayName: 'Optimism',
    safeTxPool: '0x6E4d941A6fAD76B3d26E0c5447B4f5A7EfcA8ab8',
  },
  {
    chainId: 8453n,
    displayName: 'Base',
    safeTxPool: '0x2d340e22C5A33c1Ea01DAC41E331b7FE4c033C3b',
  },
  {
    chainId: 100n,
    displayName: 'Gnosis Chain',
    safeTxPool: '0x8d0C7BC9c4c588534dC1BF96d3ee9A4bCcBf28C7',
  },
]);
