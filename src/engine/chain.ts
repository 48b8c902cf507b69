import type { AdvisorConfig } from '../config/schema.js';

export interface ChainNetwork {
  name: string;
  rpcUrl: string;
}

export function networkName(rpcUrl: string): string {
  return rpcUrl.toLowerCase().includes('devnet') ? 'Solana Devnet' : 'Solana Mainnet';
}

/** Null unless chain features are enabled with an RPC endpoint. */
export function resolveChainNetwork(config: Pick<AdvisorConfig, 'enableChainFeatures' | 'chainRpcUrl'>): ChainNetwork | null {
  if (!config.enableChainFeatures || !config.chainRpcUrl) return null;
  return { name: networkName(config.chainRpcUrl), rpcUrl: config.chainRpcUrl };
}
