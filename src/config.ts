import 'dotenv/config';
import { ConfigurationError } from './core/errors.js';
import { parseLogLevel, type LogLevel } from './core/logger.js';
import { pickInt, pickNumber } from './tools/utils.js';

export interface AppConfig {
  anthropicApiKey: string;
  perplexityApiKey: string;
  claudeModel: string;
  perplexityModel: string;
  polymarketApiUrl: string;

  maxMarketsToScan: number;
  maxMarketsToResearch: number;
  maxMarketsToJudge: number;

  minLiquidityUsd: number;
  minVolume24hUsd: number;
  minDaysToResolution: number;
  maxDaysToResolution: number;

  claudeTemperature: number;
  claudeMaxTokens: number;
  perplexityTemperature: number;
  perplexityMaxTokens: number;

  apiTimeoutMs: number;
  researchTimeoutMs: number;

  dbPath: string;
  scanIntervalHours: number;
  reportOutputDir: string;
  maxOpportunitiesInReport: number;

  telegramBotToken: string;
  telegramChatId: string;

  logLevel: LogLevel;

  // Keys that were set but did not parse; their defaults were used
  parseErrors: string[];
}

function str(env: NodeJS.ProcessEnv, key: string, fallback = ''): string {
  const v = env[key];
  return v == null || v.trim() === '' ? fallback : v.trim();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseErrors: string[] = [];

  const float = (key: string, fallback: number): number => {
    const raw = str(env, key);
    if (raw === '') return fallback;
    const n = pickNumber(raw);
    if (n == null) {
      parseErrors.push(`${key} must be a number (got "${raw}")`);
      return fallback;
    }
    return n;
  };

  const int = (key: string, fallback: number, opts: { min?: number } = {}): number => {
    const raw = str(env, key);
    if (raw === '') return fallback;
    const n = pickNumber(raw);
    if (n == null || !Number.isInteger(n)) {
      parseErrors.push(`${key} must be an integer (got "${raw}")`);
      return fallback;
    }
    return pickInt(n, fallback, opts);
  };

  return {
    anthropicApiKey: str(env, 'ANTHROPIC_API_KEY'),
    perplexityApiKey: str(env, 'PERPLEXITY_API_KEY'),
    claudeModel: str(env, 'CLAUDE_MODEL', 'claude-3-5-sonnet-20241022'),
    perplexityModel: str(env, 'PERPLEXITY_MODEL', 'llama-3.1-sonar-large-128k-online'),
    polymarketApiUrl: str(env, 'POLYMARKET_API_URL', 'https://gamma-api.polymarket.com'),

    maxMarketsToScan: int('MAX_MARKETS_TO_SCAN', 100),
    maxMarketsToResearch: int('MAX_MARKETS_TO_RESEARCH', 10),
    maxMarketsToJudge: int('MAX_MARKETS_TO_JUDGE', 5),

    minLiquidityUsd: float('MIN_LIQUIDITY_USD', 1000),
    minVolume24hUsd: float('MIN_VOLUME_24H_USD', 500),
    minDaysToResolution: float('MIN_DAYS_TO_RESOLUTION', 1),
    maxDaysToResolution: float('MAX_DAYS_TO_RESOLUTION', 90),

    claudeTemperature: float('CLAUDE_TEMPERATURE', 0.3),
    claudeMaxTokens: int('CLAUDE_MAX_TOKENS', 4096, { min: 1 }),
    perplexityTemperature: float('PERPLEXITY_TEMPERATURE', 0.2),
    perplexityMaxTokens: int('PERPLEXITY_MAX_TOKENS', 4096, { min: 1 }),

    apiTimeoutMs: float('API_TIMEOUT', 30) * 1000,
    researchTimeoutMs: float('RESEARCH_TIMEOUT', 60) * 1000,

    dbPath: str(env, 'DB_PATH', 'data/edge-scout.db'),
    scanIntervalHours: float('SCAN_INTERVAL_HOURS', 6),
    reportOutputDir: str(env, 'REPORT_OUTPUT_DIR', 'reports'),
    maxOpportunitiesInReport: int('MAX_OPPORTUNITIES_IN_REPORT', 10, { min: 1 }),

    telegramBotToken: str(env, 'TELEGRAM_BOT_TOKEN'),
    telegramChatId: str(env, 'TELEGRAM_CHAT_ID'),

    logLevel: parseLogLevel(env.LOG_LEVEL),

    parseErrors
  };
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [...config.parseErrors];

  if (!config.anthropicApiKey) errors.push('ANTHROPIC_API_KEY is required but not set');
  if (!config.perplexityApiKey) errors.push('PERPLEXITY_API_KEY is required but not set');

  if (config.maxMarketsToScan < 1) errors.push('MAX_MARKETS_TO_SCAN must be at least 1');
  if (config.maxMarketsToResearch < 1) errors.push('MAX_MARKETS_TO_RESEARCH must be at least 1');
  if (config.maxMarketsToJudge < 1) errors.push('MAX_MARKETS_TO_JUDGE must be at least 1');

  if (config.minLiquidityUsd < 0) errors.push('MIN_LIQUIDITY_USD cannot be negative');
  if (config.minVolume24hUsd < 0) errors.push('MIN_VOLUME_24H_USD cannot be negative');
  if (config.maxDaysToResolution < config.minDaysToResolution) {
    errors.push('MAX_DAYS_TO_RESOLUTION must be >= MIN_DAYS_TO_RESOLUTION');
  }

  if (config.claudeTemperature < 0 || config.claudeTemperature > 1) {
    errors.push('CLAUDE_TEMPERATURE must be between 0.0 and 1.0');
  }
  if (config.perplexityTemperature < 0 || config.perplexityTemperature > 1) {
    errors.push('PERPLEXITY_TEMPERATURE must be between 0.0 and 1.0');
  }

  if (!(config.scanIntervalHours > 0)) errors.push('SCAN_INTERVAL_HOURS must be positive');

  return errors;
}

export function requireValidConfig(config: AppConfig): AppConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) throw new ConfigurationError(errors);
  return config;
}
