import type { AppEnv } from '../config/env.validation';
import { createLogger } from '../utils/logger';

type CorsOriginCallback = (error: Error | null, allow?: boolean) => void;

export type CorsOriginHandler = (
  origin: string | undefined,
  callback: CorsOriginCallback,
) => void;

const corsLogger = createLogger('CorsPolicy');

export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  if (trimmed.length === 0) {
    return trimmed;
  }

  try {
    const parsed = new URL(trimmed);
    return `${parsed.protocol}//${parsed.host}`.toLowerCase();
  } catch {
    return trimmed.replace(/\/+$/, '').toLowerCase();
  }
}

/**
 * Browsers of the planning team call the service from the back-office UI.
 * Outside production every origin is accepted; in production only the allow-list.
 */
export function buildCorsOriginHandler(
  env: Pick<AppEnv, 'NODE_ENV' | 'ALLOWED_ORIGINS'>,
): CorsOriginHandler {
  const allowList = new Set(env.ALLOWED_ORIGINS.map((origin) => normalizeOrigin(origin)));
  const strict = env.NODE_ENV === 'production';

  return (origin, callback) => {
    if (!strict || !origin || allowList.has(normalizeOrigin(origin))) {
      callback(null, true);
      return;
    }

    corsLogger.warn('cors_origin_rejected', {
      event: 'cors_origin_rejected',
      origin,
      allowed_origins_count: allowList.size,
    });
    callback(new Error('Origin not allowed by CORS'));
  };
}
