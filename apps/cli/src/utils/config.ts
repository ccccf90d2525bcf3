import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import type { AequiConfig, LogLevel } from '@aequi/types';
import { DEFAULT_EXECUTOR_CONFIG, type ExecutorConfig } from '@aequi/executor';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = LOG_LEVELS;
  return levels.includes(value);
}

function readLimit(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build the configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): AequiConfig {
  const logLevel = env.AEQUI_LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`AEQUI_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  return {
    maxPulls: readLimit(env, 'AEQUI_MAX_PULLS', DEFAULT_EXECUTOR_CONFIG.maxPulls),
    maxApprovals: readLimit(env, 'AEQUI_MAX_APPROVALS', DEFAULT_EXECUTOR_CONFIG.maxApprovals),
    maxCalls: readLimit(env, 'AEQUI_MAX_CALLS', DEFAULT_EXECUTOR_CONFIG.maxCalls),
    maxFlushTokens: readLimit(env, 'AEQUI_MAX_FLUSH_TOKENS', DEFAULT_EXECUTOR_CONFIG.maxFlushTokens),
    logLevel,
  };
}

/**
 * Load Aequi configuration from environment variables and .env file.
 */
export function loadConfig(): AequiConfig {
  loadDotenv({ path: resolve(process.cwd(), '.env') });
  return configFromEnv(process.env);
}

/**
 * Executor settings for a loaded configuration. `debug` turns on executor logging.
 */
export function toExecutorConfig(config: AequiConfig): ExecutorConfig {
  return {
    maxPulls: config.maxPulls,
    maxApprovals: config.maxApprovals,
    maxCalls: config.maxCalls,
    maxFlushTokens: config.maxFlushTokens,
    verbose: config.logLevel === 'debug',
  };
}
