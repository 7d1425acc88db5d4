import { Chain, Mention } from '../types/mentions';
import { IncomingMessage, MessageFilters } from '../types/telegram';
import { logger } from '../utils/logger';
import { ContractDetector } from './detectors';
import { MentionStore } from './mentionStore';
import { RadarStats } from './stats';

export class MentionIngestor {
  constructor(
    private readonly store: MentionStore,
    private readonly detectors: ContractDetector[],
    private readonly filters: MessageFilters,
    private readonly stats: RadarStats
  ) {}

  shouldProcess(message: IncomingMessage): boolean {
    if (this.filters.ignoreForwarded && message.forwarded) {
      return false;
    }
    return message.text.trim().length >= this.filters.minMessageLength;
  }

  /**
   * Extracts contracts from one message and stores each as a mention.
   * Resolves with the number of new mentions; redelivered messages add none.
   */
  async processMessage(message: IncomingMessage): Promise<number> {
    if (!this.shouldProcess(message)) {
      return 0;
    }
    this.stats.messageProcessed();

    const mentions: Mention[] = [];
    for (const detector of this.detectors) {
      for (const contract of detector.detect(message.text)) {
        mentions.push({
          contract,
          chain: detector.chain,
          sourceId: message.chatId,
          occurrenceId: message.messageId,
          observedAt: message.date
        });
      }
    }

    let recorded = 0;
    const byChain = new Map<Chain, number>();
    for (const mention of mentions) {
      if (await this.store.recordMention(mention)) {
        recorded++;
        byChain.set(mention.chain, (byChain.get(mention.chain) ?? 0) + 1);
        logger.debug(`Mention recorded: ${mention.contract}`, {
          chain: mention.chain,
          chatId: mention.sourceId,
          messageId: mention.occurrenceId
        });
      }
    }

    for (const [chain, count] of byChain) {
      this.stats.mentionRecorded(chain, count);
    }
    return recorded;
  }
}
