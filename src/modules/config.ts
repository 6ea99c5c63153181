import type { Config, LogLevel } from '../types/index.js';
import { ConfigurationError } from './errors.js';

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

/**
 * Default configuration values
 */
const DEFAULTS = {
  AWS_REGION: 'us-east-1',
  POLL_INTERVAL_SECONDS: 5,
  WAIT_TIMEOUT_SECONDS: 1800,
  FAILURE_LOOKBACK_SECONDS: 2,
  CAPABILITIES: ['CAPABILITY_NAMED_IAM', 'CAPABILITY_AUTO_EXPAND'],
  METRICS_NAMESPACE: 'StackLifecycle',
  LOG_LEVEL: DEFAULT_LOG_LEVEL,
} as const;

/**
 * Validates that a log level is valid
 */
function isValidLogLevel(level: string): level is LogLevel {
  return ['DEBUG', 'INFO', 'WARN', 'ERROR'].includes(level);
}

/**
 * Gets an optional environment variable with a default value.
 * Empty strings count as unset.
 */
function getOptionalEnv(name: string, defaultValue: string): string {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? defaultValue : value.trim();
}

/**
 * Reads a positive number of seconds and returns it in milliseconds
 */
function getSecondsEnv(name: string, defaultSeconds: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultSeconds * 1000;
  }

  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got '${raw}'`);
  }
  return seconds * 1000;
}

function getListEnv(name: string, defaultValue: readonly string[]): string[] {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return [...defaultValue];
  }
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Loads and validates configuration from environment variables
 *
 * All variables are optional:
 * - AWS_REGION, then AWS_DEFAULT_REGION: region for the CloudFormation client (default: us-east-1)
 * - STACK_POLL_INTERVAL_SECONDS: delay between status polls (default: 5)
 * - STACK_WAIT_TIMEOUT_SECONDS: default deadline for a wait (default: 1800)
 * - STACK_FAILURE_LOOKBACK_SECONDS: failure event look-back before the wait started (default: 2)
 * - STACK_CAPABILITIES: comma-separated capabilities (default: CAPABILITY_NAMED_IAM,CAPABILITY_AUTO_EXPAND)
 * - METRICS_NAMESPACE: CloudWatch metrics namespace (default: StackLifecycle)
 * - LOG_LEVEL: logging level (default: INFO)
 *
 * @throws {ConfigurationError} If a duration is not a positive number
 */
export function loadConfig(): Config {
  const logLevelEnv = getOptionalEnv('LOG_LEVEL', DEFAULTS.LOG_LEVEL).toUpperCase();
  const logLevel = isValidLogLevel(logLevelEnv) ? logLevelEnv : DEFAULTS.LOG_LEVEL;

  return {
    awsRegion: getOptionalEnv('AWS_REGION', getOptionalEnv('AWS_DEFAULT_REGION', DEFAULTS.AWS_REGION)),
    pollIntervalMs: getSecondsEnv('STACK_POLL_INTERVAL_SECONDS', DEFAULTS.POLL_INTERVAL_SECONDS),
    waitTimeoutMs: getSecondsEnv('STACK_WAIT_TIMEOUT_SECONDS', DEFAULTS.WAIT_TIMEOUT_SECONDS),
    failureLookbackMs: getSecondsEnv('STACK_FAILURE_LOOKBACK_SECONDS', DEFAULTS.FAILURE_LOOKBACK_SECONDS),
    capabilities: getListEnv('STACK_CAPABILITIES', DEFAULTS.CAPABILITIES),
    metricsNamespace: getOptionalEnv('METRICS_NAMESPACE', DEFAULTS.METRICS_NAMESPACE),
    logLevel,
  };
}

let configInstance: Config | null = null;

/**
 * Gets the configuration singleton, loading it on first access
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the configuration singleton (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export { DEFAULTS };
