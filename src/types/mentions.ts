export enum Chain {
  SOLANA = 'solana',
  EVM = 'evm'
}

// Order drives per-chain detection and command output.
export const KNOWN_CHAINS: readonly Chain[] = [Chain.SOLANA, Chain.EVM];

export function parseChain(value: string): Chain | null {
  for (const chain of KNOWN_CHAINS) {
    if (chain === value) return chain;
  }
  return null;
}

export interface Mention {
  contract: string;
  chain: Chain;
  sourceId: number;
  occurrenceId: number;
  observedAt: number; // epoch ms, UTC
}

export interface WindowAggregate {
  contract: string;
  chain: Chain;
  mentionCount: number;
  uniqueSources: number;
}

export interface AggregateQuery {
  since: number;
  chain?: Chain | undefined;
  minMentions: number;
  minUniqueSources: number;
}

export interface AlertRecord {
  id: number;
  contract: string;
  chain: Chain;
  score: number;
  mentionCount: number;
  uniqueSources: number;
  velocity: number;
  alertedAt: number;
}
