import { Chain } from '../../types/mentions';
import { ContractDetector } from './base';
import ignoreList from './solanaIgnoreList.json';

// Base58 alphabet: no 0, O, I or l.
const BASE58_PATTERN = /\b([1-9A-HJ-NP-Za-km-z]{32,44})\b/g;

const FALSE_POSITIVE_WORDS = new Set<string>(ignoreList.falsePositiveWords);
const SYSTEM_ADDRESSES = new Set<string>(ignoreList.systemAddresses);

export function hasMixedCharacters(candidate: string): boolean {
  return /[A-Z]/.test(candidate) && /[a-z]/.test(candidate) && /[0-9]/.test(candidate);
}

export class SolanaDetector implements ContractDetector {
  readonly chain = Chain.SOLANA;

  detect(text: string): string[] {
    const found: string[] = [];
    const seen = new Set<string>();

    for (const match of text.matchAll(BASE58_PATTERN)) {
      const candidate = match[1];
      if (!candidate || seen.has(candidate)) continue;
      if (FALSE_POSITIVE_WORDS.has(candidate) || SYSTEM_ADDRESSES.has(candidate)) continue;
      if (!hasMixedCharacters(candidate)) continue;

      seen.add(candidate);
      found.push(candidate);
    }

    return found;
  }
}
