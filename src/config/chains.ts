import type { ChainEntry } from './parseEnv.js';

/** Chains on which the Morpho Blue API indexes markets and vaults. */
export const DEFAULT_CHAINS: ChainEntry[] = [
  { name: 'ethereum', chainId: 1 },
  { name: 'base', chainId: 8453 },
  { name: 'arbitrum', chainId: 42161 },
  { name: 'optimism', chainId: 10 },
  { name: 'plume', chainId: 98866 },
  { name: 'unichain', chainId: 130 },
  { name: 'polygon', chainId: 137 },
  { name: 'hyperevm', chainId: 999 }
];

export function chainName(chains: readonly ChainEntry[], chainId: number): string {
  return chains.find((chain) => chain.chainId === chainId)?.name ?? `chain-${chainId}`;
}
