import { DexScreenerConfig } from '../types/dexscreener';
import { MessageFilters } from '../types/telegram';
import { AppError, ErrorSeverity, createErrorContext } from './errorHandler';
import {
  isValidChatId,
  parseBoolean,
  parseNumber,
  validateCronCadence,
  validateInteger,
  validateNumericRange
} from './validation';

export interface TrendingSettings {
  windowMinutes: number;
  minMentions: number;
  minUniqueSources: number;
  cooldownMinutes: number;
  checkIntervalSeconds: number;
  retentionHours: number;
}

export interface AppConfig {
  telegramBotToken: string;
  alertChatId: string;
  databasePath: string;
  databaseSaveIntervalSeconds: number;
  storeQueryTimeoutMs: number;
  trending: TrendingSettings;
  filters: MessageFilters;
  dexScreener: DexScreenerConfig & { enabled: boolean; tokenNames: boolean };
  healthEnabled: boolean;
  metricsEnabled: boolean;
  healthPort: number;
  logLevel: string;
  dryRun: boolean;
  timezone: string;
  nodeEnv: string;
}

export const DEFAULT_DEXSCREENER_URL = 'https://api.dexscreener.com/latest/dex/tokens';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

interface NumericRule {
  name: string;
  value: number;
  min: number;
  max: number;
  integer: boolean;
}

/**
 * Builds the runtime configuration from environment variables and CLI flags.
 * Every problem found is reported in a single CONFIG_ERROR.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): AppConfig {
  const dryRun = argv.includes('--dry-run') || parseBoolean(env.DRY_RUN, false);
  const debug = argv.includes('--debug');

  const problems: string[] = [];

  const required = dryRun ? ['TELEGRAM_BOT_TOKEN'] : ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_ALERT_CHAT_ID'];
  const missing = required.filter(key => !env[key] || env[key]?.trim() === '');
  if (missing.length > 0) {
    problems.push(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const alertChatId = (env.TELEGRAM_ALERT_CHAT_ID || '').trim();
  if (alertChatId !== '' && !isValidChatId(alertChatId)) {
    problems.push('TELEGRAM_ALERT_CHAT_ID must be a numeric chat id or an @channel name');
  }

  const trending: TrendingSettings = {
    windowMinutes: parseNumber(env.TRENDING_WINDOW_MINUTES, 5),
    minMentions: parseNumber(env.TRENDING_MIN_MENTIONS, 3),
    minUniqueSources: parseNumber(env.TRENDING_MIN_UNIQUE_SOURCES, 2),
    cooldownMinutes: parseNumber(env.TRENDING_COOLDOWN_MINUTES, 15),
    checkIntervalSeconds: parseNumber(env.TRENDING_CHECK_INTERVAL_SECONDS, 30),
    retentionHours: parseNumber(env.MENTION_RETENTION_HOURS, 24)
  };

  const filters: MessageFilters = {
    minMessageLength: parseNumber(env.FILTER_MIN_MSG_LENGTH, 5),
    ignoreForwarded: parseBoolean(env.FILTER_IGNORE_FORWARDED, false)
  };

  const dexScreener = {
    enabled: parseBoolean(env.DEXSCREENER_ENABLED, false),
    tokenNames: parseBoolean(env.DEXSCREENER_TOKEN_NAMES, true),
    baseUrl: (env.DEXSCREENER_API_URL || DEFAULT_DEXSCREENER_URL).replace(/\/+$/, ''),
    minLiquidityUsd: parseNumber(env.DEXSCREENER_MIN_LIQUIDITY, 1000),
    timeoutMs: parseNumber(env.DEXSCREENER_TIMEOUT_MS, 5000)
  };

  const databaseSaveIntervalSeconds = parseNumber(env.DATABASE_SAVE_INTERVAL_SECONDS, 30);
  const storeQueryTimeoutMs = parseNumber(env.STORE_QUERY_TIMEOUT_MS, 5000);
  const healthPort = parseNumber(env.HEALTH_CHECK_PORT, 8080);

  const rules: NumericRule[] = [
    { name: 'TRENDING_WINDOW_MINUTES', value: trending.windowMinutes, min: 1, max: 1440, integer: true },
    { name: 'TRENDING_MIN_MENTIONS', value: trending.minMentions, min: 1, max: 100000, integer: true },
    { name: 'TRENDING_MIN_UNIQUE_SOURCES', value: trending.minUniqueSources, min: 1, max: 100000, integer: true },
    { name: 'TRENDING_COOLDOWN_MINUTES', value: trending.cooldownMinutes, min: 1, max: 10080, integer: false },
    { name: 'TRENDING_CHECK_INTERVAL_SECONDS', value: trending.checkIntervalSeconds, min: 5, max: 3600, integer: true },
    { name: 'MENTION_RETENTION_HOURS', value: trending.retentionHours, min: 1, max: 8760, integer: false },
    { name: 'FILTER_MIN_MSG_LENGTH', value: filters.minMessageLength, min: 0, max: 4096, integer: true },
    { name: 'DEXSCREENER_MIN_LIQUIDITY', value: dexScreener.minLiquidityUsd, min: 0, max: 1e12, integer: false },
    { name: 'DEXSCREENER_TIMEOUT_MS', value: dexScreener.timeoutMs, min: 100, max: 60000, integer: true },
    { name: 'DATABASE_SAVE_INTERVAL_SECONDS', value: databaseSaveIntervalSeconds, min: 1, max: 3600, integer: true },
    { name: 'STORE_QUERY_TIMEOUT_MS', value: storeQueryTimeoutMs, min: 100, max: 60000, integer: true },
    { name: 'HEALTH_CHECK_PORT', value: healthPort, min: 1, max: 65535, integer: true }
  ];

  for (const rule of rules) {
    const range = validateNumericRange(rule.value, rule.min, rule.max, rule.name);
    if (!range.valid && range.error) {
      problems.push(range.error);
      continue;
    }
    if (rule.integer) {
      const whole = validateInteger(rule.value, rule.name);
      if (!whole.valid && whole.error) problems.push(whole.error);
    }
  }

  if (Number.isInteger(trending.checkIntervalSeconds) && trending.checkIntervalSeconds >= 5) {
    const cadence = validateCronCadence(trending.checkIntervalSeconds, 'TRENDING_CHECK_INTERVAL_SECONDS');
    if (!cadence.valid && cadence.error) problems.push(cadence.error);
  }

  // Velocity reads one full window before the current one.
  if (trending.retentionHours * 60 < trending.windowMinutes * 2) {
    problems.push('MENTION_RETENTION_HOURS must cover at least two trending windows');
  }

  const logLevel = debug ? 'debug' : (env.LOG_LEVEL || 'info').toLowerCase();
  if (!LOG_LEVELS.includes(logLevel)) {
    problems.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (problems.length > 0) {
    throw new AppError(
      `Invalid configuration: ${problems.join('; ')}`,
      'CONFIG_ERROR',
      ErrorSeverity.CRITICAL,
      createErrorContext('load_config', { additionalData: { problems } }),
      false
    );
  }

  return {
    telegramBotToken: (env.TELEGRAM_BOT_TOKEN || '').trim(),
    alertChatId,
    databasePath: env.DATABASE_PATH || 'data/radar.db',
    databaseSaveIntervalSeconds,
    storeQueryTimeoutMs,
    trending,
    filters,
    dexScreener,
    healthEnabled: parseBoolean(env.HEALTH_ENABLED, true),
    metricsEnabled: parseBoolean(env.METRICS_ENABLED, false),
    healthPort,
    logLevel,
    dryRun,
    timezone: env.TIMEZONE || 'UTC',
    nodeEnv: env.NODE_ENV || 'development'
  };
}
