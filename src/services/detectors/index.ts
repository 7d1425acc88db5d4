import { Chain, KNOWN_CHAINS } from '../../types/mentions';
import { ContractDetector } from './base';
import { EvmDetector } from './evm';
import { SolanaDetector } from './solana';

export { ContractDetector } from './base';
export { SolanaDetector } from './solana';
export { EvmDetector } from './evm';

const REGISTRY: Record<Chain, () => ContractDetector> = {
  [Chain.SOLANA]: () => new SolanaDetector(),
  [Chain.EVM]: () => new EvmDetector()
};

export function createDetectors(chains: readonly Chain[] = KNOWN_CHAINS): ContractDetector[] {
  return chains.map(chain => REGISTRY[chain]());
}
