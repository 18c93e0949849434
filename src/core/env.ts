/**
 * Environment variable handling
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
  valuationConfigPath: string | null;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

function pickOne<T extends string>(raw: string, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const logLevel = pickOne(getEnvVar('LOG_LEVEL') || 'info', LOG_LEVELS, 'info');
  const nodeEnv = pickOne(getEnvVar('NODE_ENV') || 'development', NODE_ENVS, 'development');
  const valuationConfigPath = getEnvVar('VALUATION_CONFIG')?.trim() || null;

  return {
    logLevel,
    nodeEnv,
    valuationConfigPath,
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
