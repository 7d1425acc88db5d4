import { Telegraf } from 'telegraf';
import { channelPost, message } from 'telegraf/filters';
import { IncomingMessage, MessageSender, ParseMode, TelegramBot } from '../types/telegram';
import { errorMessage } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { logger } from '../utils/logger';
import { CooldownGate } from './cooldown';
import { MentionIngestor } from './ingestion';
import { MentionStore } from './mentionStore';
import { RadarStats } from './stats';
import { TrendingEngine } from './trending';

const MAX_MESSAGE_LENGTH = 4096;

export interface TelegramServiceDeps {
  ingestor: MentionIngestor;
  engine: TrendingEngine;
  store: MentionStore;
  stats: RadarStats;
  cooldown: CooldownGate;
  timezone: string;
  dryRun: boolean;
}

/**
 * Splits on line boundaries so no chunk exceeds `maxLength` as measured by
 * `measure`, which lets callers budget for escaping applied afterwards.
 */
export function splitMessage(
  text: string,
  maxLength: number = MAX_MESSAGE_LENGTH,
  measure: (chunk: string) => number = chunk => chunk.length
): string[] {
  if (measure(text) <= maxLength) return [text];

  const chunks: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    const candidate = current === '' ? line : `${current}\n${line}`;
    if (measure(candidate) <= maxLength) {
      current = candidate;
      continue;
    }
    if (current !== '') chunks.push(current);
    // A single line longer than the limit is hard-wrapped.
    let rest = line;
    while (measure(rest) > maxLength) {
      let cut = Math.min(rest.length, maxLength);
      while (cut > 1 && measure(rest.slice(0, cut)) > maxLength) cut--;
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }
  if (current !== '') chunks.push(current);
  return chunks;
}

const escapedLength = (chunk: string): number => Formatters.escapeMarkdown(chunk).length;

export class TelegramService implements MessageSender {
  private bot: TelegramBot;
  private running = false;

  constructor(token: string, private readonly deps: TelegramServiceDeps) {
    this.bot = new Telegraf(token);

    this.setupCommands();
    this.registerEventHandlers();
  }

  private setupCommands(): void {
    this.bot.command('start', ctx => this.handleStart(ctx.chat.id.toString()));
    this.bot.command('help', ctx => this.handleHelp(ctx.chat.id.toString()));
    this.bot.command('status', ctx => this.handleStatus(ctx.chat.id.toString()));
    this.bot.command('trending', ctx => this.handleTrending(ctx.chat.id.toString()));
    this.bot.command('alerts', ctx => this.handleAlerts(ctx.chat.id.toString()));
  }

  private registerEventHandlers(): void {
    this.bot.on(message('text'), async (ctx) => {
      await this.handleIncoming({
        text: ctx.message.text,
        chatId: ctx.message.chat.id,
        messageId: ctx.message.message_id,
        date: ctx.message.date * 1000,
        forwarded: ctx.message.forward_origin !== undefined
      });
    });

    this.bot.on(channelPost('text'), async (ctx) => {
      await this.handleIncoming({
        text: ctx.channelPost.text,
        chatId: ctx.channelPost.chat.id,
        messageId: ctx.channelPost.message_id,
        date: ctx.channelPost.date * 1000,
        forwarded: ctx.channelPost.forward_origin !== undefined
      });
    });

    this.bot.catch((error: unknown) => {
      logger.error('Telegram bot error:', { error: errorMessage(error) });
    });
  }

  async handleIncoming(incoming: IncomingMessage): Promise<void> {
    try {
      const recorded = await this.deps.ingestor.processMessage(incoming);
      if (recorded > 0) {
        logger.debug(`Recorded ${recorded} mentions from chat ${incoming.chatId}`);
      }
    } catch (error) {
      logger.error('Failed to process incoming message:', {
        chatId: incoming.chatId,
        messageId: incoming.messageId,
        error: errorMessage(error)
      });
    }
  }

  private async handleStart(chatId: string): Promise<void> {
    const mode = this.deps.dryRun ? 'dry-run' : 'live';
    await this.sendMessage(
      chatId,
      `📡 *Alpha Radar Started*\n\n` +
      `Watching every chat this bot is in for contract mentions.\n` +
      `Mode: ${mode}\n\n` +
      `Use /help to see the available commands.`,
      'MarkdownV2'
    );
  }

  private async handleHelp(chatId: string): Promise<void> {
    await this.sendMessage(
      chatId,
      `🤖 *Alpha Radar Commands*\n\n` +
      `/status - counters, cooldowns and uptime\n` +
      `/trending - current ranking per chain (no alerts sent)\n` +
      `/alerts - most recent alerts\n` +
      `/help - this message`,
      'MarkdownV2'
    );
  }

  private async handleStatus(chatId: string): Promise<void> {
    const stats = this.deps.stats.snapshot();
    let text = `📊 *Radar Status*\n\n`;
    text += `⏰ *Uptime:* ${Formatters.formatDuration(stats.uptimeMs)}\n`;
    text += `💬 *Messages processed:* ${stats.messagesProcessed}\n`;
    text += `🔎 *Mentions recorded:* ${stats.mentionsRecorded}\n`;
    text += `🚨 *Alerts sent:* ${stats.alertsSent}\n`;
    text += `🔁 *Cycles:* ${stats.cyclesRun} ok, ${stats.cyclesFailed} failed, ${stats.cyclesSkipped} skipped\n`;
    text += `🧊 *Active cooldowns:* ${this.deps.cooldown.size()}\n`;
    text += `🧪 *Mode:* ${this.deps.dryRun ? 'dry-run' : 'live'}\n`;

    await this.sendMessage(chatId, text, 'MarkdownV2');
  }

  private async handleTrending(chatId: string): Promise<void> {
    try {
      const byChain = await this.deps.engine.detectByChain();
      await this.sendMessage(
        chatId,
        Formatters.formatTrendingList(byChain, this.deps.engine.windowMinutes),
        'MarkdownV2'
      );
    } catch (error) {
      await this.sendMessage(chatId, `❌ Failed to compute trending tokens: ${errorMessage(error)}`, 'MarkdownV2');
    }
  }

  private async handleAlerts(chatId: string): Promise<void> {
    try {
      const records = await this.deps.store.getRecentAlerts(10);
      await this.sendMessage(chatId, Formatters.formatAlertHistory(records, this.deps.timezone), 'MarkdownV2');
    } catch (error) {
      await this.sendMessage(chatId, `❌ Failed to load alert history: ${errorMessage(error)}`, 'MarkdownV2');
    }
  }

  async sendMessage(chatId: string, text: string, parseMode?: ParseMode): Promise<boolean> {
    const markdown = parseMode === 'MarkdownV2';
    // Split the raw text so no escape sequence is cut in half.
    const chunks = splitMessage(text, MAX_MESSAGE_LENGTH, markdown ? escapedLength : undefined);

    try {
      for (const chunk of chunks) {
        const body = markdown ? Formatters.escapeMarkdown(chunk) : chunk;
        await this.bot.telegram.sendMessage(chatId, body, {
          ...(parseMode ? { parse_mode: parseMode } : {}),
          link_preview_options: { is_disabled: true }
        });
      }
      return true;
    } catch (error) {
      logger.error('Failed to send message:', {
        chatId,
        parseMode,
        preview: Formatters.truncateText(text, 100),
        error: errorMessage(error)
      });
      return false;
    }
  }

  async start(): Promise<void> {
    logger.info('Starting Telegram bot...');

    try {
      const me = await this.bot.telegram.getMe();
      logger.info(`Authenticated as @${me.username}`);
    } catch (error) {
      throw new Error(`Invalid bot token: ${errorMessage(error)}`);
    }

    this.running = true;
    // Resolves only once polling stops.
    this.bot.launch().catch((error: unknown) => {
      this.running = false;
      logger.error('Telegram polling stopped with an error:', { error: errorMessage(error) });
    });

    logger.info('Telegram bot started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    try {
      this.bot.stop();
      logger.info('Telegram bot stopped');
    } catch (error) {
      logger.warn('Telegram bot was not polling at shutdown:', { error: errorMessage(error) });
    }
  }

  isRunning(): boolean {
    return this.running;
  }
}
