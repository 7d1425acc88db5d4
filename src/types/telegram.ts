import { Context, Telegraf } from 'telegraf';
import { Update } from 'telegraf/typings/core/types/typegram';

export type TelegramBot = Telegraf<Context<Update>>;
export type ParseMode = 'MarkdownV2' | 'HTML';

export interface IncomingMessage {
  text: string;
  chatId: number;
  messageId: number;
  date: number; // epoch ms
  forwarded: boolean;
}

export interface MessageFilters {
  minMessageLength: number;
  ignoreForwarded: boolean;
}

export interface MessageSender {
  sendMessage(chatId: string, text: string, parseMode?: ParseMode): Promise<boolean>;
}
