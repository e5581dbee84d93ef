/**
 * Registry of networks and stablecoins the client can pay with.
 *
 * x402 v1 challenges name networks by slug ("base"), v2 challenges by CAIP-2
 * ("eip155:8453"). Both resolve to the same entry here.
 *
 * IMPORTANT: eip712.name MUST match the on-chain USDC `name()` for the chain.
 * Base mainnet reports "USD Coin", Base Sepolia reports "USDC".
 */

export type ChainFamily = 'evm' | 'solana';

export interface AssetInfo {
  readonly symbol: string;
  readonly decimals: number;
  readonly address: string;
  readonly eip712?: { readonly name: string; readonly version: string };
}

export interface NetworkInfo {
  readonly id: string;
  readonly caip2: `${string}:${string}`;
  readonly family: ChainFamily;
  readonly name: string;
  readonly chainId?: number;
  readonly assets: readonly AssetInfo[];
}

const NETWORKS: readonly NetworkInfo[] = [
  {
    id: 'base',
    caip2: 'eip155:8453',
    family: 'evm',
    name: 'Base',
    chainId: 8453,
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
      eip712: { name: 'USD Coin', version: '2' },
    }],
  },
  {
    id: 'base-sepolia',
    caip2: 'eip155:84532',
    family: 'evm',
    name: 'Base Sepolia',
    chainId: 84532,
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: '0x036CbD53842c5426634e7929541eC2318f3dCF7e',
      eip712: { name: 'USDC', version: '2' },
    }],
  },
  {
    id: 'ethereum',
    caip2: 'eip155:1',
    family: 'evm',
    name: 'Ethereum',
    chainId: 1,
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
      eip712: { name: 'USD Coin', version: '2' },
    }],
  },
  {
    id: 'polygon',
    caip2: 'eip155:137',
    family: 'evm',
    name: 'Polygon',
    chainId: 137,
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: '0x3c499c542cEF5E3811e1192ce70d8cC03d5c3359',
      eip712: { name: 'USD Coin', version: '2' },
    }],
  },
  {
    id: 'avalanche',
    caip2: 'eip155:43114',
    family: 'evm',
    name: 'Avalanche C-Chain',
    chainId: 43114,
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: '0xB97EF9Ef8734C71904D8002F8b6Bc66Dd9c48a6E',
      eip712: { name: 'USD Coin', version: '2' },
    }],
  },
  {
    id: 'solana',
    caip2: 'solana:5eykt4UsFv8P8NJdTREpY1vzqKqZKvdp',
    family: 'solana',
    name: 'Solana',
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v',
    }],
  },
  {
    id: 'solana-devnet',
    caip2: 'solana:EtWTRABZaYq6iMfeYKouRu166VU2xqa1',
    family: 'solana',
    name: 'Solana Devnet',
    assets: [{
      symbol: 'USDC',
      decimals: 6,
      address: '4zMMC9srt5Ri5X14GAgXhaHii3GnPAEERYPJgZJDncDU',
    }],
  },
];

/**
 * Resolve a network by slug or CAIP-2 identifier. Returns null when unknown.
 */
export function findNetwork(idOrCaip2: string): NetworkInfo | null {
  const key = idOrCaip2.trim();
  return NETWORKS.find((n) => n.id === key || n.caip2 === key) ?? null;
}

/**
 * Like findNetwork, but throws for unknown networks.
 */
export function getNetwork(idOrCaip2: string): NetworkInfo {
  const network = findNetwork(idOrCaip2);
  if (!network) {
    throw new Error(`unsupported network: "${idOrCaip2}"`);
  }
  return network;
}

/**
 * Look up an asset on a network by its token address.
 * EVM addresses compare case-insensitively; Solana mints are case-sensitive.
 */
export function findAsset(network: NetworkInfo, address: string): AssetInfo | null {
  const match = network.family === 'evm'
    ? (a: AssetInfo) => a.address.toLowerCase() === address.toLowerCase()
    : (a: AssetInfo) => a.address === address;
  return network.assets.find(match) ?? null;
}

/**
 * Extract the numeric chain ID from an EVM network ("base" or "eip155:8453").
 */
export function parseChainId(idOrCaip2: string): number {
  const known = findNetwork(idOrCaip2);
  if (known?.chainId !== undefined) {
    return known.chainId;
  }

  const match = /^eip155:(\d+)$/.exec(idOrCaip2);
  if (!match?.[1]) {
    throw new Error(`not an EVM network: "${idOrCaip2}"`);
  }
  return Number(match[1]);
}

export function listNetworks(): readonly NetworkInfo[] {
  return NETWORKS;
}
