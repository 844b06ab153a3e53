import { BoundingBox } from '@ticket-dispatch/shared-models';

export type EngineLogLevel = 'debug' | 'log' | 'warn' | 'error';

export interface EngineEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  LOG_LEVEL: EngineLogLevel;
  ROUTING_TIE_BREAK_RADIUS_KM: number;
  ROUTING_FALLBACK_HUBS: [string, string];
  ROUTING_WORKER_CONCURRENCY: number;
  ROUTING_REFERENCE_DIR?: string;
  GEO_PROVIDER_MIN_INTERVAL_MS: number;
  GEO_FUZZY_THRESHOLD: number;
  GEO_BOUNDING_BOX: BoundingBox;
  GEO_COUNTRY_QUALIFIER: string;
  GEO_DOMESTIC_COUNTRY_NAMES: string[];
}

export const DEFAULT_FALLBACK_HUBS: [string, string] = ['Астана', 'Алматы'];

export const DEFAULT_BOUNDING_BOX: BoundingBox = {
  minLat: 40.5,
  maxLat: 55.5,
  minLon: 50.2,
  maxLon: 87.4
};

export const DEFAULT_DOMESTIC_COUNTRY_NAMES = ['казахстан', 'kazakhstan', 'kz', 'қазақстан'];

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

function parseList(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseNodeEnv(value: unknown): EngineEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): EngineLogLevel {
  if (value === 'debug' || value === 'warn' || value === 'error') {
    return value;
  }

  return 'log';
}

function parseHubs(value: unknown): [string, string] {
  const hubs = parseList(value);
  if (hubs.length === 0) {
    return DEFAULT_FALLBACK_HUBS;
  }
  if (hubs.length !== 2 || hubs[0] === hubs[1]) {
    throw new Error('ROUTING_FALLBACK_HUBS must name exactly two distinct facilities');
  }

  return [hubs[0], hubs[1]];
}

/**
 * Parses "minLat,maxLat,minLon,maxLon".
 */
export function parseBoundingBox(value: unknown): BoundingBox {
  const parts = parseList(value);
  if (parts.length === 0) {
    return DEFAULT_BOUNDING_BOX;
  }
  if (parts.length !== 4) {
    throw new Error(`GEO_BOUNDING_BOX expects 4 comma-separated numbers, got "${String(value)}"`);
  }

  const [minLat, maxLat, minLon, maxLon] = parts.map((part) => parseNumber(part, Number.NaN));
  if (minLat > maxLat || minLon > maxLon) {
    throw new Error('GEO_BOUNDING_BOX minimums must not exceed maximums');
  }

  return { minLat, maxLat, minLon, maxLon };
}

export function validateEnv(config: Record<string, unknown>): EngineEnv {
  const domesticNames = parseList(config.GEO_DOMESTIC_COUNTRY_NAMES).map((name) =>
    name.toLowerCase()
  );
  const referenceDir = String(config.ROUTING_REFERENCE_DIR ?? '').trim();

  return {
    NODE_ENV: parseNodeEnv(config.NODE_ENV),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    ROUTING_TIE_BREAK_RADIUS_KM: Math.max(0, parseNumber(config.ROUTING_TIE_BREAK_RADIUS_KM, 50)),
    ROUTING_FALLBACK_HUBS: parseHubs(config.ROUTING_FALLBACK_HUBS),
    ROUTING_WORKER_CONCURRENCY: Math.max(1, parseNumber(config.ROUTING_WORKER_CONCURRENCY, 1)),
    ROUTING_REFERENCE_DIR: referenceDir.length > 0 ? referenceDir : undefined,
    GEO_PROVIDER_MIN_INTERVAL_MS: Math.max(0, parseNumber(config.GEO_PROVIDER_MIN_INTERVAL_MS, 250)),
    GEO_FUZZY_THRESHOLD: Math.min(1, Math.max(0, parseNumber(config.GEO_FUZZY_THRESHOLD, 0.75))),
    GEO_BOUNDING_BOX: parseBoundingBox(config.GEO_BOUNDING_BOX),
    GEO_COUNTRY_QUALIFIER: String(config.GEO_COUNTRY_QUALIFIER ?? '').trim() || 'Казахстан',
    GEO_DOMESTIC_COUNTRY_NAMES:
      domesticNames.length > 0 ? domesticNames : DEFAULT_DOMESTIC_COUNTRY_NAMES
  };
}
