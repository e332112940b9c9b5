export const SAFE_TX_POOL_ABI = [
  'function getTxDetails(bytes32 txHash) view returns (address safe, address to, uint256 value, bytes data, uint8 operation, address proposer, uint256 nonce)',
  'function getSignatures(bytes32 txHash) view returns (bytes[] memory)',
  'function getPendingTxHashes(address safe) view returns (bytes32[])',
  'function hasSignedTx(bytes32 txHash, address signer) view returns (bool)',
] as const;
