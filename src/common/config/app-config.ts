import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const logger = new Logger('AppConfig');

export const DEFAULT_PORT = 8001;
export const DEFAULT_PUBLIC_API_BASE_URL = `http://localhost:${DEFAULT_PORT}`;

/** Reads an integer setting; unset or unparsable values fall back to `fallback`. */
export function readIntConfig(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed)) {
    logger.warn(`Invalid ${key} value: "${raw}". Defaulting to ${fallback}.`);
    return fallback;
  }
  return parsed;
}

export function readBooleanConfig(config: ConfigService, key: string, fallback: boolean): boolean {
  const raw = config.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
}

export function readListConfig(config: ConfigService, key: string): string[] {
  return (config.get<string>(key) ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function publicApiBaseUrl(config: ConfigService): string {
  const base = config.get<string>('PUBLIC_API_BASE_URL') || DEFAULT_PUBLIC_API_BASE_URL;
  return base.replace(/\/+$/, '');
}

export function exposeErrorDetails(config: ConfigService): boolean {
  return readBooleanConfig(config, 'EXPOSE_ERROR_DETAILS', config.get<string>('NODE_ENV') !== 'production');
}
