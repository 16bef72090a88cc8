import { normalizeStoreKey } from '../utils/text-normalize.utils';

export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  INVENTORY_DB_URL: string;
  INVENTORY_DB_POOL_MAX: number;
  INVENTORY_DB_STATEMENT_TIMEOUT_MS: number;
  CENTRAL_WAREHOUSE_MARKER: string;
  ALLOWED_ORIGINS: string[];
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
}

const DEFAULT_CENTRAL_WAREHOUSE_MARKER = 'bodega';

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseOrigins(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'log' ||
    value === 'info' ||
    value === 'warn' ||
    value === 'error'
  ) {
    return value;
  }

  return 'log';
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const INVENTORY_DB_URL = String(config.INVENTORY_DB_URL ?? '').trim();
  const ALLOWED_ORIGINS = parseOrigins(config.ALLOWED_ORIGINS);
  const CENTRAL_WAREHOUSE_MARKER =
    normalizeStoreKey(String(config.CENTRAL_WAREHOUSE_MARKER ?? '')) ||
    DEFAULT_CENTRAL_WAREHOUSE_MARKER;

  if (INVENTORY_DB_URL.length === 0) {
    throw new Error('INVENTORY_DB_URL is required');
  }

  if (NODE_ENV === 'production' && ALLOWED_ORIGINS.length === 0) {
    throw new Error('ALLOWED_ORIGINS is required in production');
  }

  const poolMax = parseNumber(config.INVENTORY_DB_POOL_MAX, 10);
  if (!Number.isInteger(poolMax) || poolMax < 1) {
    throw new Error(`Invalid INVENTORY_DB_POOL_MAX: ${String(config.INVENTORY_DB_POOL_MAX)}`);
  }

  return {
    NODE_ENV,
    PORT: parseNumber(config.PORT, 3080),
    INVENTORY_DB_URL,
    INVENTORY_DB_POOL_MAX: poolMax,
    INVENTORY_DB_STATEMENT_TIMEOUT_MS: Math.max(
      1000,
      parseNumber(config.INVENTORY_DB_STATEMENT_TIMEOUT_MS, 15_000),
    ),
    CENTRAL_WAREHOUSE_MARKER,
    ALLOWED_ORIGINS,
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
  };
}
