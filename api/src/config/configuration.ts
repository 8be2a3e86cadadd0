// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.
import { join } from 'node:path';

export type LogLevelName = 'error' | 'warn' | 'log' | 'debug' | 'verbose';

export interface SourceConfig {
  baseUrl: string;
  symbolSuffix: string;
  timeoutMs: number;
  historyDays: number;
  autoRefreshMinutes: number;
  rateLimit: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  unavailable: {
    retries: number;
    delayMs: number;
  };
}

export interface TrainingConfig {
  epochs: number;
  batchSize: number;
  minBars: number;
  historyDays: number;
  maxConcurrent: number;
  learningRate: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevelName;
  instruments: string[];
  tradingHolidays: string[];
  lookbackWindow: number;
  storage: {
    dataDir: string;
    databaseFile: string;
    modelsDir: string;
  };
  cache: {
    retentionTradingDays: number;
    modelCacheMax: number;
  };
  source: SourceConfig;
  training: TrainingConfig;
}

const LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function int(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

function float(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function list(name: string, fallback: string): string[] {
  return (process.env[name] ?? fallback)
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function logLevel(raw: string | undefined): LogLevelName {
  return LOG_LEVELS.find((l) => l === raw) ?? 'log';
}

export default (): AppConfig => {
  const dataDir = process.env.DATA_DIR ?? join(process.cwd(), 'data');

  return {
    nodeEnv: process.env.NODE_ENV ?? 'development',
    port: int('PORT', 4000),
    logLevel: logLevel(process.env.LOG_LEVEL),

    // B3 tickers; the provider symbol adds source.symbolSuffix
    instruments: list('INSTRUMENTS', 'ITSA4,VALE3,TAEE11,PETR4,MGLU3').map((s) =>
      s.toUpperCase(),
    ),
    tradingHolidays: list('TRADING_HOLIDAYS', ''),
    lookbackWindow: int('LOOKBACK_WINDOW', 60),

    storage: {
      dataDir,
      databaseFile: process.env.DATABASE_FILE ?? join(dataDir, 'market.db'),
      modelsDir: process.env.MODELS_DIR ?? join(dataDir, 'models'),
    },

    cache: {
      retentionTradingDays: int('CACHE_RETENTION_TRADING_DAYS', 0), // 0 = keep everything
      modelCacheMax: int('MODEL_CACHE_MAX', 8),
    },

    source: {
      baseUrl: process.env.SOURCE_BASE_URL ?? 'https://query1.finance.yahoo.com',
      symbolSuffix: process.env.SOURCE_SYMBOL_SUFFIX ?? '.SA',
      timeoutMs: int('SOURCE_TIMEOUT_MS', 10_000),
      historyDays: int('SOURCE_HISTORY_DAYS', 1095),
      autoRefreshMinutes: int('SOURCE_AUTO_REFRESH_MINUTES', 0),
      rateLimit: {
        maxAttempts: int('SOURCE_RATE_LIMIT_ATTEMPTS', 5),
        baseDelayMs: int('SOURCE_BACKOFF_BASE_MS', 500),
        maxDelayMs: int('SOURCE_BACKOFF_MAX_MS', 8_000),
      },
      unavailable: {
        retries: int('SOURCE_UNAVAILABLE_RETRIES', 2),
        delayMs: int('SOURCE_UNAVAILABLE_DELAY_MS', 250),
      },
    },

    training: {
      epochs: int('TRAINING_EPOCHS', 100),
      batchSize: int('TRAINING_BATCH_SIZE', 32),
      minBars: int('TRAINING_MIN_BARS', 200),
      historyDays: int('TRAINING_HISTORY_DAYS', 1095),
      maxConcurrent: int('RETRAIN_MAX_CONCURRENT', 2),
      learningRate: float('TRAINING_LEARNING_RATE', 0.05),
    },
  };
};
