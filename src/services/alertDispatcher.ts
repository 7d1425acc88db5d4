import { MessageSender } from '../types/telegram';
import { TokenNameResolver, TrendingToken } from '../types/trending';
import { errorMessage } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { logger } from '../utils/logger';
import { CooldownGate } from './cooldown';
import { MentionStore } from './mentionStore';

export interface DispatcherOptions {
  alertChatId: string;
  windowMinutes: number;
  dryRun: boolean;
}

export class AlertDispatcher {
  constructor(
    private readonly sender: MessageSender,
    private readonly cooldown: CooldownGate,
    private readonly store: MentionStore,
    private readonly options: DispatcherOptions,
    private readonly now: () => number = Date.now,
    private readonly names: TokenNameResolver | null = null
  ) {}

  /**
   * Delivers tokens in rank order, skipping any on cooldown. Cooldown and
   * alert history are written only for tokens that were delivered.
   * Resolves with the number delivered.
   */
  async dispatch(tokens: TrendingToken[]): Promise<number> {
    let sent = 0;

    for (const token of tokens) {
      if (this.cooldown.isOnCooldown(token.contract)) {
        logger.debug(`Skipping ${token.contract}, on cooldown`, {
          remainingMs: this.cooldown.remainingMs(token.contract)
        });
        continue;
      }

      const delivered = await this.deliver(token);
      if (!delivered) continue;

      this.cooldown.recordAlert(token.contract);
      sent++;

      try {
        await this.store.recordAlertHistory(token, this.now());
      } catch (error) {
        logger.error(`Failed to record alert history for ${token.contract}:`, error);
      }
    }

    return sent;
  }

  private async resolveName(contract: string): Promise<string> {
    if (!this.names) return '';
    try {
      return await this.names.lookupTokenName(contract);
    } catch (error) {
      logger.debug(`Token name unavailable for ${contract}`, { error: errorMessage(error) });
      return '';
    }
  }

  private async deliver(token: TrendingToken): Promise<boolean> {
    const name = await this.resolveName(token.contract);
    const text = Formatters.formatTrendingAlert(token, this.options.windowMinutes, name);

    if (this.options.dryRun) {
      logger.info(`[dry-run] Alert for ${token.contract}`, {
        chain: token.chain,
        score: token.score,
        text
      });
      return true;
    }

    try {
      const ok = await this.sender.sendMessage(this.options.alertChatId, text, 'MarkdownV2');
      if (ok) {
        logger.info(`Alert sent for ${token.contract}`, {
          chain: token.chain,
          score: token.score,
          mentions: token.mentionCount,
          uniqueSources: token.uniqueSources
        });
      } else {
        logger.warn(`Alert delivery failed for ${token.contract}, cooldown not recorded`);
      }
      return ok;
    } catch (error) {
      logger.error(`Alert delivery threw for ${token.contract}:`, { error: errorMessage(error) });
      return false;
    }
  }
}
