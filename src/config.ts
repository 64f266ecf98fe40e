/**
 * Configuration for the resource range service
 */

import path from 'path';
import { type LogLevel, isLogLevel } from './domain/interfaces/ILogger';

export interface Config {
  PORT: number;
  // Runtime directory for logs
  RUNTIME_DIR: string;
  LOG_LEVEL: LogLevel;
  LOG_TO_FILE: boolean;
  // Range unit accepted in Range headers and written to Content-Range
  RANGE_UNITS: string;
  // Maximum number of resources returned by a single request
  MAX_RANGE_LENGTH: number;
  // Number of demo resources created on startup
  SEED_RESOURCE_COUNT: number;
  // '*' allows every origin
  CORS_ALLOWED_ORIGINS: readonly string[];
  CORS_MAX_AGE: number; // seconds
  CORS_ALLOW_CREDENTIALS: boolean;
}

function parseList(value: string | undefined, fallback: readonly string[]): readonly string[] {
  if (!value) {
    return fallback;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parsePositiveInteger(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : fallback;
}

const config: Config = {
  // Server configuration
  PORT: Number(process.env.PORT) || 3000,
  RUNTIME_DIR: process.env.RUNTIME_DIR || path.join(process.cwd(), '.runtime'),

  // Logging
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL, 'info'),
  LOG_TO_FILE: process.env.LOG_TO_FILE === 'true',

  // Ranges
  RANGE_UNITS: process.env.RANGE_UNITS || 'resources',
  MAX_RANGE_LENGTH: parsePositiveInteger(process.env.MAX_RANGE_LENGTH, 100),
  SEED_RESOURCE_COUNT: Number(process.env.SEED_RESOURCE_COUNT) || 0,

  // CORS
  CORS_ALLOWED_ORIGINS: parseList(process.env.CORS_ALLOWED_ORIGINS, ['*']),
  CORS_MAX_AGE: Number(process.env.CORS_MAX_AGE) || 600, // 10 minutes
  CORS_ALLOW_CREDENTIALS: process.env.CORS_ALLOW_CREDENTIALS === 'true'
};

export default config;
