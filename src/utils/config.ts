import { RsiInterval, isRsiInterval } from '../types/rsi';
import { RsiAlertKey } from './alertKeys';
import { AppError, ErrorSeverity, isAppError } from './errorHandler';
import { Formatters } from './formatters';
import { logger } from './logger';
import { isValidWalletAddress, parseNumberList, splitList } from './validation';

export const USDC_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';

export interface AppConfig {
  inputMint: string;
  outputMint: string;
  inputDecimals: number;
  outputDecimals: number;
  usdAmount: number;
  checkIntervalSeconds: number;
  alertResetMinutes: number;
  buyAlerts: number[];
  sellAlerts: number[];
  rsiCheckIntervalMinutes: number;
  rsiAlerts: RsiAlertKey[];
  rsiInterval: RsiInterval;
  rsiResetEnabled: boolean;
  walletAddresses: string[];
  ntfyTopic: string | null;
  ntfyServer: string;
  timezone: string;
  solanaTrackerApiKey: string | null;
  telegramBotToken: string | null;
  telegramChatId: string | null;
  databasePath: string;
  healthCheckPort: number;
  pnlRefreshCron: string | null;
  jupiterApiUrl: string;
  solanaTrackerApiUrl: string;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function numberOr(env: Env, name: string, fallback: number, isValid: (value: number) => boolean): number {
  const raw = optional(env, name);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!isValid(value)) {
    logger.warn(`Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

const positive = (value: number): boolean => Number.isFinite(value) && value > 0;
const positiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;
const nonNegativeInteger = (value: number): boolean => Number.isInteger(value) && value >= 0;

function parseRsiAlerts(raw: string | undefined): RsiAlertKey[] {
  const keys: RsiAlertKey[] = [];
  for (const entry of splitList(raw)) {
    try {
      keys.push(RsiAlertKey.parse(entry));
    } catch (error) {
      if (!isAppError(error, 'INVALID_INPUT')) throw error;
      logger.warn(`Skipping malformed RSI_ALERTS entry "${entry}": ${error.message}`);
    }
  }
  return keys;
}

function parseWallets(raw: string | undefined): string[] {
  const wallets: string[] = [];
  for (const entry of splitList(raw)) {
    if (!isValidWalletAddress(entry)) {
      logger.warn(`Skipping malformed WALLET_ADDRESSES entry "${entry}"`);
    } else if (!wallets.includes(entry)) {
      wallets.push(entry);
    }
  }
  return wallets;
}

/**
 * Builds the typed configuration from environment variables. Only
 * `OUTPUT_MINT` is required; malformed list entries are dropped with a warning.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const outputMint = optional(env, 'OUTPUT_MINT');
  if (outputMint === null) {
    throw new AppError(
      'OUTPUT_MINT must be set',
      'CONFIGURATION_MISSING',
      ErrorSeverity.CRITICAL,
      { operation: 'load_config' },
      false
    );
  }

  const rawInterval = optional(env, 'RSI_INTERVAL');
  let rsiInterval: RsiInterval = '1s';
  if (rawInterval !== null) {
    if (isRsiInterval(rawInterval)) {
      rsiInterval = rawInterval;
    } else {
      logger.warn(`Ignoring unsupported RSI_INTERVAL="${rawInterval}", using 1s`);
    }
  }

  const rawTimezone = optional(env, 'TIMEZONE') ?? optional(env, 'TZ');
  let timezone = 'UTC';
  if (rawTimezone !== null) {
    if (Formatters.isValidTimeZone(rawTimezone)) {
      timezone = rawTimezone;
    } else {
      logger.warn(`Ignoring unknown TIMEZONE="${rawTimezone}", using UTC`);
    }
  }

  const warnEntry = (name: string) => (entry: string) =>
    logger.warn(`Skipping malformed ${name} entry "${entry}"`);

  return {
    inputMint: optional(env, 'INPUT_MINT') ?? USDC_MINT,
    outputMint,
    inputDecimals: numberOr(env, 'INPUT_DECIMALS', 6, nonNegativeInteger),
    outputDecimals: numberOr(env, 'OUTPUT_DECIMALS', 6, nonNegativeInteger),
    usdAmount: numberOr(env, 'USD_AMOUNT', 100, positive),
    checkIntervalSeconds: numberOr(env, 'CHECK_INTERVAL', 60, positiveInteger),
    alertResetMinutes: numberOr(env, 'ALERT_RESET_MINUTES', 0, nonNegativeInteger),
    buyAlerts: parseNumberList(env.BUY_ALERTS, warnEntry('BUY_ALERTS')),
    sellAlerts: parseNumberList(env.SELL_ALERTS, warnEntry('SELL_ALERTS')),
    rsiCheckIntervalMinutes: numberOr(env, 'RSI_CHECK_INTERVAL', 5, positive),
    rsiAlerts: parseRsiAlerts(env.RSI_ALERTS),
    rsiInterval,
    rsiResetEnabled: (optional(env, 'RSI_RESET_ENABLED') ?? 'false').toLowerCase() === 'true',
    walletAddresses: parseWallets(env.WALLET_ADDRESSES),
    ntfyTopic: optional(env, 'NTFY_TOPIC'),
    ntfyServer: (optional(env, 'NTFY_SERVER') ?? 'https://ntfy.sh').replace(/\/+$/, ''),
    timezone,
    solanaTrackerApiKey: optional(env, 'SOLANATRACKER_API_KEY'),
    telegramBotToken: optional(env, 'TELEGRAM_BOT_TOKEN'),
    telegramChatId: optional(env, 'TELEGRAM_CHAT_ID'),
    databasePath: optional(env, 'DATABASE_PATH') ?? './data/alerts.db',
    healthCheckPort: numberOr(env, 'HEALTH_CHECK_PORT', 3000, positiveInteger),
    pnlRefreshCron: optional(env, 'PNL_REFRESH_CRON'),
    jupiterApiUrl: optional(env, 'JUPITER_API_URL') ?? 'https://quote-api.jup.ag/v6',
    solanaTrackerApiUrl: optional(env, 'SOLANATRACKER_API_URL') ?? 'https://data.solanatracker.io'
  };
}
