import { resolve } from 'path';
import type { AppConfig, LogLevel, PruneRule } from '../types/index.js';
import {
  DEFAULT_MAX_PATH_LENGTH,
  DEFAULT_PATH_TAIL_LENGTH,
  DEFAULT_UNSUPPORTED_RULE,
  DEFAULT_VENDOR_RULE,
  TRUNCATION_MARKER,
} from '../types/index.js';

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num) || num <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number, got: ${value}`);
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string, defaultValue: readonly string[]): string[] {
  const value = process.env[key];
  if (value === undefined) {
    return [...defaultValue];
  }
  return value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function normalizeExtension(extension: string): string {
  return extension.startsWith('.') ? extension : `.${extension}`;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(): AppConfig {
  // Paths
  const sourceRoot = resolve(getEnv('SOURCE_ROOT'));
  const auditLogPath = resolve(getEnv('AUDIT_LOG_PATH'));

  // Path length
  const maxPathLength = getEnvNumber('MAX_PATH_LENGTH', DEFAULT_MAX_PATH_LENGTH);
  const pathTailLength = getEnvNumber('PATH_TAIL_LENGTH', DEFAULT_PATH_TAIL_LENGTH);

  // Room for at least one leading character, the marker and the tail
  if (maxPathLength <= pathTailLength + TRUNCATION_MARKER.length + 1) {
    throw new Error(`MAX_PATH_LENGTH (${maxPathLength}) must exceed PATH_TAIL_LENGTH + ${TRUNCATION_MARKER.length + 1}`);
  }

  // Prune rules
  const unsupported: PruneRule = {
    extensions: getEnvList('DISALLOWED_EXTENSIONS', DEFAULT_UNSUPPORTED_RULE.extensions).map(normalizeExtension),
    names: getEnvList('DISALLOWED_NAMES', DEFAULT_UNSUPPORTED_RULE.names),
    namePrefixes: getEnvList('DISALLOWED_NAME_PREFIXES', DEFAULT_UNSUPPORTED_RULE.namePrefixes),
  };

  const vendor: PruneRule = {
    extensions: getEnvList('VENDOR_EXTENSIONS', DEFAULT_VENDOR_RULE.extensions).map(normalizeExtension),
    names: [],
    namePrefixes: [],
  };

  // Logging Configuration
  const level = getEnv('LOG_LEVEL', 'info');
  if (!isLogLevel(level)) {
    throw new Error(`Invalid LOG_LEVEL: ${level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const logging = {
    level,
    pretty: getEnvBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'production'),
  };

  return {
    cleanup: {
      sourceRoot,
      auditLogPath,
      maxPathLength,
      pathTailLength,
      removeEmptyDirectories: getEnvBoolean('REMOVE_EMPTY_DIRECTORIES', true),
      unsupported,
      vendor,
    },
    logging,
  };
}

// Export singleton config instance
let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// For testing: reset config
export function resetConfig(): void {
  config = null;
}
