/**
 * Environment variable handling
 */

import { join } from 'path';

export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
  signalsConfigPath: string;
  sectorMapPath: string;
  snapshotPath: string | null;
  outputDir: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

function parseNodeEnv(raw: string | undefined): EnvConfig['nodeEnv'] {
  if (raw === 'production' || raw === 'test') return raw;
  return 'development';
}

export function loadEnvConfig(): EnvConfig {
  const projectRoot = process.cwd();
  return {
    logLevel: parseLogLevel(getEnvVar('LOG_LEVEL')),
    nodeEnv: parseNodeEnv(getEnvVar('NODE_ENV')),
    signalsConfigPath:
      getEnvVar('SIGNALS_CONFIG') ?? join(projectRoot, 'config', 'signals.json'),
    sectorMapPath: getEnvVar('SECTOR_MAP') ?? join(projectRoot, 'config', 'sector_map.json'),
    snapshotPath: getEnvVar('MARKET_SNAPSHOT') ?? null,
    outputDir: getEnvVar('OUTPUT_DIR') ?? join(projectRoot, 'output'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
