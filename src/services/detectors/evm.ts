import { Chain } from '../../types/mentions';
import { ContractDetector } from './base';

const EVM_PATTERN = /\b(0x[0-9a-fA-F]{40})\b/g;

const BURN_ADDRESSES = new Set<string>([
  '0x0000000000000000000000000000000000000000',
  '0xffffffffffffffffffffffffffffffffffffffff',
  '0x000000000000000000000000000000000000dead',
  '0xdead000000000000000000000000000000000000'
]);

export class EvmDetector implements ContractDetector {
  readonly chain = Chain.EVM;

  detect(text: string): string[] {
    const found: string[] = [];
    const seen = new Set<string>();

    for (const match of text.matchAll(EVM_PATTERN)) {
      const raw = match[1];
      if (!raw) continue;

      // Checksummed and lower-case spellings are the same contract.
      const normalized = raw.toLowerCase();
      if (seen.has(normalized) || BURN_ADDRESSES.has(normalized)) continue;

      seen.add(normalized);
      found.push(normalized);
    }

    return found;
  }
}
