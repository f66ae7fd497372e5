import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { formatInTimeZone } from 'date-fns-tz';

export const NOMINATIM_REVERSE_URL = 'https://nominatim.openstreetmap.org/reverse';

export interface AppConfig {
  port: number;
  databasePath: string;
  maxRows: number;
  userTimezone: string;
  corsOrigins: string[];
  geocodingEnabled: boolean;
  geocoderUrl: string;
  geocoderUserAgent: string;
  staticDir: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Loads `.env` files into `process.env`. Tries the working directory first,
 * then the backend package root (beside `dist/` or `src/`), then the repository root.
 * Returns the paths that were actually loaded.
 */
export function loadEnvFiles(): string[] {
  const loaded: string[] = [];
  const candidates = [
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '../.env'),
    path.resolve(__dirname, '../../.env'),
  ];

  for (const envPath of new Set(candidates)) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      loaded.push(envPath);
    }
  }
  return loaded;
}

const parsePositiveInt = (name: string, raw: string | undefined, fallback: number): number => {
  const value = (raw || '').trim();
  if (value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  const value = (raw || '').trim().toLowerCase();
  if (value === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value);
};

const assertTimezone = (timezone: string): string => {
  try {
    formatInTimeZone(new Date(0), timezone, 'XXX');
  } catch (error) {
    throw new ConfigError(`USER_TIMEZONE '${timezone}' is not a known time zone`);
  }
  return timezone;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawDbPath = (env.DATABASE_PATH || '').trim();
  const rawStaticDir = (env.STATIC_DIR || '').trim();

  return {
    port: parsePositiveInt('PORT', env.PORT, 2025),
    databasePath: rawDbPath.length > 0 ? rawDbPath : path.resolve(__dirname, '../data/geolog.db'),
    maxRows: parsePositiveInt('MAX_ROWS', env.MAX_ROWS, 1000),
    userTimezone: assertTimezone((env.USER_TIMEZONE || '').trim() || 'UTC'),
    corsOrigins: (env.CORS_ORIGIN || '').split(',').map(o => o.trim()).filter(Boolean),
    geocodingEnabled: parseBoolean(env.GEOCODING_ENABLED, true),
    geocoderUrl: (env.GEOCODER_URL || '').trim() || NOMINATIM_REVERSE_URL,
    geocoderUserAgent: (env.GEOCODER_USER_AGENT || '').trim() || 'geolog/1.0',
    staticDir: rawStaticDir.length > 0 ? rawStaticDir : path.resolve(__dirname, '../../frontend/dist'),
  };
}
