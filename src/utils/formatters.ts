import { AlertRecord, Chain } from '../types/mentions';
import { TrendingToken } from '../types/trending';

const EXPLORER_LINKS: Record<Chain, Array<{ label: string; url: (contract: string) => string }>> = {
  [Chain.SOLANA]: [
    { label: 'DS', url: contract => `https://dexscreener.com/solana/${contract}` },
    { label: 'GMGN', url: contract => `https://gmgn.ai/sol/token/${contract}` }
  ],
  [Chain.EVM]: [
    { label: 'DS', url: contract => `https://dexscreener.com/ethereum/${contract}` },
    { label: 'GMGN', url: contract => `https://gmgn.ai/eth/token/${contract}` },
    { label: 'Etherscan', url: contract => `https://etherscan.io/token/${contract}` }
  ]
};

export class Formatters {
  static formatChain(chain: Chain): string {
    return chain.toUpperCase();
  }

  static formatVelocity(token: Pick<TrendingToken, 'velocity' | 'previousCount'>): string {
    if (token.previousCount === 0) return 'NEW';
    const pct = Math.round(token.velocity * 100);
    return `${pct >= 0 ? '+' : ''}${pct}%`;
  }

  static formatScore(score: number): string {
    return score.toFixed(1);
  }

  static shortenAddress(address: string): string {
    if (address.length <= 12) return address;
    return `${address.slice(0, 6)}...${address.slice(-4)}`;
  }

  static buildLinks(chain: Chain, contract: string): string {
    return EXPLORER_LINKS[chain]
      .map(link => `[${link.label}](${link.url(contract)})`)
      .join(' | ');
  }

  /** Drops characters that would open or close an entity inside the alert. */
  static sanitizeTokenName(name: string): string {
    return name.replace(/[*`[\]]/g, '').trim();
  }

  /** Raw MarkdownV2 source; the sender escapes it. The token line is left out when the name is empty. */
  static formatTrendingAlert(token: TrendingToken, windowMinutes: number, tokenName: string = ''): string {
    const name = this.sanitizeTokenName(tokenName);
    return (
      `🚨 *TRENDING TOKEN DETECTED*\n` +
      `\n` +
      `🔗 *Chain:* ${this.formatChain(token.chain)}\n` +
      (name ? `🪙 *Token:* ${name}\n` : '') +
      `📋 *Contract:* \`${token.contract}\`\n` +
      `💬 *Mentions (${windowMinutes}m):* ${token.mentionCount}\n` +
      `👥 *Unique Groups:* ${token.uniqueSources}\n` +
      `📈 *Velocity:* ${this.formatVelocity(token)}\n` +
      `⭐ *Score:* ${this.formatScore(token.score)}\n` +
      `\n` +
      `🔗 ${this.buildLinks(token.chain, token.contract)}\n`
    );
  }

  static formatTrendingList(byChain: Map<Chain, TrendingToken[]>, windowMinutes: number): string {
    if (byChain.size === 0) {
      return '📭 No tokens trending right now';
    }

    let message = `📊 *Trending now* (${windowMinutes}m window)\n`;
    for (const [chain, tokens] of byChain) {
      message += `\n*${this.formatChain(chain)}*\n`;
      tokens.forEach((token, index) => {
        message += `${index + 1}. \`${token.contract}\` ${this.formatScore(token.score)} pts, ` +
          `${token.mentionCount} mentions, ${token.uniqueSources} groups, ${this.formatVelocity(token)}\n`;
      });
    }
    return message;
  }

  static formatAlertHistory(records: AlertRecord[], timezone: string = 'UTC'): string {
    if (records.length === 0) {
      return '📭 No alerts sent yet';
    }

    let message = `🔔 *Recent Alerts*\n\n`;
    for (const record of records) {
      message += `${this.formatTimestamp(record.alertedAt, timezone)} ${this.formatChain(record.chain)} ` +
        `\`${this.shortenAddress(record.contract)}\` score ${this.formatScore(record.score)}\n`;
    }
    return message;
  }

  static formatDuration(milliseconds: number): string {
    const seconds = Math.floor(milliseconds / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) return `${days}d ${hours % 24}h`;
    if (hours > 0) return `${hours}h ${minutes % 60}m`;
    if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
    return `${seconds}s`;
  }

  static formatTimestamp(timestampMs: number, timezone: string = 'UTC'): string {
    return new Date(timestampMs).toLocaleString('en-US', {
      timeZone: timezone,
      hour12: false,
      month: 'short',
      day: 'numeric',
      hour: '2-digit',
      minute: '2-digit'
    });
  }

  static escapeMarkdown(text: string): string {
    if (!text) return '';

    const links: string[] = [];
    const linkRegex = /\[(.*?)\]\((.*?)\)/g;

    const textWithPlaceholders = text.replace(linkRegex, (match) => {
      links.push(match);
      return `%%LINK${links.length - 1}%%`;
    });

    const escapeChars = /[\\_[\]()~>#+=|{}.!-]/g;
    let result = textWithPlaceholders.replace(escapeChars, '\\$&');

    links.forEach((link, index) => {
      result = result.replace(`%%LINK${index}%%`, link);
    });

    return result;
  }

  static truncateText(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength - 3) + '...';
  }
}
