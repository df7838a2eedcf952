/**
 * Default Configuration for the Limbic Core
 *
 * Engine defaults reproduce the "breathing" profile: a slow rhythm,
 * moderate noise, and echoes that linger for half a minute.
 */

import path from 'path';
import { EngineConfig, ServiceConfig } from './types';
import { ConfigurationError } from './errors';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baseFrequency: 0.15,
  noiseAmplitude: 0.6,
  internalVariability: 0.6,
  spontaneousEventProbability: 0.12,
  rhythmChangeProbability: 0.15,
  echoLifetime: 30,
  awarenessThreshold: 0.4,
  externalSignalLimit: 1.0,
};

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  port: 3000,
  tickIntervalMs: 1000,
  dbPath: path.join(process.cwd(), 'data', 'limbic.db'),
  engine: DEFAULT_ENGINE_CONFIG,
};

// ─── Validation ─────────────────────────────────────────────────────

function requirePositive(config: EngineConfig, field: keyof EngineConfig): void {
  const value = config[field];
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a finite number > 0, got ${value}`, field);
  }
}

function requireNonNegative(config: EngineConfig, field: keyof EngineConfig): void {
  const value = config[field];
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a finite number >= 0, got ${value}`, field);
  }
}

function requireProbability(config: EngineConfig, field: keyof EngineConfig): void {
  const value = config[field];
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${field} must be in [0, 1], got ${value}`, field);
  }
}

/**
 * Fail fast on an unusable engine configuration. Never clamps.
 */
export function validateEngineConfig(config: EngineConfig): EngineConfig {
  requirePositive(config, 'baseFrequency');
  requireNonNegative(config, 'noiseAmplitude');
  requireNonNegative(config, 'internalVariability');
  requireProbability(config, 'spontaneousEventProbability');
  requireProbability(config, 'rhythmChangeProbability');
  requirePositive(config, 'echoLifetime');
  requirePositive(config, 'awarenessThreshold');
  requirePositive(config, 'externalSignalLimit');
  return config;
}

// ─── Environment ────────────────────────────────────────────────────

const ENGINE_ENV_KEYS: Array<[keyof EngineConfig, string]> = [
  ['baseFrequency', 'LIMBIC_BASE_FREQUENCY'],
  ['noiseAmplitude', 'LIMBIC_NOISE_AMPLITUDE'],
  ['internalVariability', 'LIMBIC_INTERNAL_VARIABILITY'],
  ['spontaneousEventProbability', 'LIMBIC_SPONTANEOUS_EVENT_PROBABILITY'],
  ['rhythmChangeProbability', 'LIMBIC_RHYTHM_CHANGE_PROBABILITY'],
  ['echoLifetime', 'LIMBIC_ECHO_LIFETIME'],
  ['awarenessThreshold', 'LIMBIC_AWARENESS_THRESHOLD'],
  ['externalSignalLimit', 'LIMBIC_EXTERNAL_SIGNAL_LIMIT'],
];

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  field: string,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, field);
  }
  return value;
}

/**
 * Build the service configuration from environment variables.
 * Unset variables fall back to the defaults above.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const engine: EngineConfig = { ...DEFAULT_ENGINE_CONFIG };
  for (const [field, key] of ENGINE_ENV_KEYS) {
    engine[field] = readNumber(env, key, DEFAULT_ENGINE_CONFIG[field], field);
  }

  const seed = env.LIMBIC_SEED?.trim();
  const tickIntervalMs = readNumber(
    env,
    'LIMBIC_TICK_INTERVAL_MS',
    DEFAULT_SERVICE_CONFIG.tickIntervalMs,
    'tickIntervalMs',
  );
  if (tickIntervalMs <= 0) {
    throw new ConfigurationError(
      `LIMBIC_TICK_INTERVAL_MS must be > 0, got ${tickIntervalMs}`,
      'tickIntervalMs',
    );
  }

  return {
    port: readNumber(env, 'PORT', DEFAULT_SERVICE_CONFIG.port, 'port'),
    tickIntervalMs,
    dbPath: env.LIMBIC_DB_PATH?.trim() || DEFAULT_SERVICE_CONFIG.dbPath,
    seed: seed ? seed : undefined,
    engine: validateEngineConfig(engine),
  };
}
