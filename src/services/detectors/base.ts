import { Chain } from '../../types/mentions';

export interface ContractDetector {
  readonly chain: Chain;
  /** Distinct contract addresses in `text`, in order of first appearance. */
  detect(text: string): string[];
}
