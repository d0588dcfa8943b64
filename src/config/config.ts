/**
 * @fileoverview Exploration configuration.
 *
 * A single immutable configuration object is loaded once at process start
 * and handed by reference to every component. All values are validated
 * with zod and the resulting object is frozen.
 *
 * @module explorer/config
 * @version 0.1.0
 */

import { z } from 'zod';
import { Severity } from '../types/core.types.js';
import { ConfigurationError } from '../types/errors.js';

const positiveInt = z.number().int().positive();
const positiveMs = z.number().positive();

/**
 * Runtime schema for the exploration configuration.
 */
export const ExplorationConfigSchema = z.object({
  // Loop
  maxIterations: positiveInt,
  iterationTimeoutMs: positiveMs,
  totalTimeoutMs: positiveMs,
  iterationDelayMs: z.number().nonnegative(),

  // Error handling
  maxErrors: positiveInt,
  maxConsecutiveErrors: positiveInt,
  errorRecoveryEnabled: z.boolean(),

  // Stuck detection
  stuckDetectionEnabled: z.boolean(),
  maxSameActionRepeats: positiveInt,

  // Tools
  toolTimeoutMs: positiveMs,
  maxToolRetries: z.number().int().nonnegative(),
  toolValidationEnabled: z.boolean(),
  retryDelayMs: z.number().nonnegative(),

  // Cache
  cacheEnabled: z.boolean(),
  cacheMaxSize: positiveInt,
  cacheTtlMs: positiveMs,
  cacheDirectory: z.string().min(1).nullable(),

  // Tracing and logging
  tracingEnabled: z.boolean(),
  traceDirectory: z.string().min(1).nullable(),
  logLevel: z.nativeEnum(Severity),
});

export type ExplorationConfig = Readonly<z.infer<typeof ExplorationConfigSchema>>;

/**
 * Named presets trading depth for speed.
 */
export type PerformanceProfile = 'fast' | 'balanced' | 'thorough';

/**
 * Default configuration.
 */
export const DEFAULT_EXPLORATION_CONFIG: ExplorationConfig = Object.freeze({
  maxIterations: 20,
  iterationTimeoutMs: 30_000,
  totalTimeoutMs: 600_000,
  iterationDelayMs: 100,
  maxErrors: 10,
  maxConsecutiveErrors: 3,
  errorRecoveryEnabled: true,
  stuckDetectionEnabled: true,
  maxSameActionRepeats: 3,
  toolTimeoutMs: 15_000,
  maxToolRetries: 2,
  toolValidationEnabled: true,
  retryDelayMs: 500,
  cacheEnabled: true,
  cacheMaxSize: 1000,
  cacheTtlMs: 3_600_000,
  cacheDirectory: null,
  tracingEnabled: true,
  traceDirectory: null,
  logLevel: Severity.INFO,
});

const PROFILES: Readonly<Record<PerformanceProfile, Partial<ExplorationConfig>>> = {
  fast: {
    maxIterations: 10,
    iterationTimeoutMs: 15_000,
    totalTimeoutMs: 300_000,
    toolTimeoutMs: 10_000,
    maxErrors: 5,
    cacheMaxSize: 500,
  },
  balanced: {
    maxIterations: 20,
    iterationTimeoutMs: 30_000,
    totalTimeoutMs: 600_000,
    toolTimeoutMs: 15_000,
    maxErrors: 10,
    cacheMaxSize: 1000,
  },
  thorough: {
    maxIterations: 50,
    iterationTimeoutMs: 60_000,
    totalTimeoutMs: 1_800_000,
    toolTimeoutMs: 30_000,
    maxErrors: 20,
    cacheMaxSize: 2000,
  },
};

/**
 * Validates overrides on top of a base and returns a frozen config.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function createConfig(
  overrides: Partial<ExplorationConfig> = {},
  base: ExplorationConfig = DEFAULT_EXPLORATION_CONFIG,
): ExplorationConfig {
  const parsed = ExplorationConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return Object.freeze(parsed.data);
}

/**
 * Returns a new config with a performance profile applied.
 */
export function applyProfile(
  config: ExplorationConfig,
  profile: PerformanceProfile,
): ExplorationConfig {
  return createConfig(PROFILES[profile], config);
}

/**
 * Classifies a config into the closest performance profile.
 */
export function detectProfile(config: ExplorationConfig): PerformanceProfile {
  if (config.maxIterations <= 10 && config.toolTimeoutMs <= 10_000) {
    return 'fast';
  }
  if (config.maxIterations <= 30 && config.toolTimeoutMs <= 30_000) {
    return 'balanced';
  }
  return 'thorough';
}

// ============ Environment loading ============

type EnvSource = Readonly<Record<string, string | undefined>>;

const ENV_PREFIX = 'EXPLORER_';

const NUMBER_KEYS = {
  MAX_ITERATIONS: 'maxIterations',
  ITERATION_TIMEOUT_MS: 'iterationTimeoutMs',
  TOTAL_TIMEOUT_MS: 'totalTimeoutMs',
  ITERATION_DELAY_MS: 'iterationDelayMs',
  MAX_ERRORS: 'maxErrors',
  MAX_CONSECUTIVE_ERRORS: 'maxConsecutiveErrors',
  MAX_SAME_ACTION_REPEATS: 'maxSameActionRepeats',
  TOOL_TIMEOUT_MS: 'toolTimeoutMs',
  MAX_TOOL_RETRIES: 'maxToolRetries',
  RETRY_DELAY_MS: 'retryDelayMs',
  CACHE_MAX_SIZE: 'cacheMaxSize',
  CACHE_TTL_MS: 'cacheTtlMs',
} as const;

const BOOLEAN_KEYS = {
  ERROR_RECOVERY: 'errorRecoveryEnabled',
  STUCK_DETECTION: 'stuckDetectionEnabled',
  TOOL_VALIDATION: 'toolValidationEnabled',
  CACHE_ENABLED: 'cacheEnabled',
  TRACING_ENABLED: 'tracingEnabled',
} as const;

const STRING_KEYS = {
  CACHE_DIR: 'cacheDirectory',
  TRACE_DIR: 'traceDirectory',
} as const;

type NumberField = (typeof NUMBER_KEYS)[keyof typeof NUMBER_KEYS];
type BooleanField = (typeof BOOLEAN_KEYS)[keyof typeof BOOLEAN_KEYS];
type StringField = (typeof STRING_KEYS)[keyof typeof STRING_KEYS];

type EnvOverrides = Partial<Record<NumberField, number>> &
  Partial<Record<BooleanField, boolean>> &
  Partial<Record<StringField, string>> & {
    logLevel?: Severity;
  };

const SeveritySchema = z.nativeEnum(Severity);

/**
 * Builds a config from `EXPLORER_*` environment variables.
 *
 * Unset variables keep the defaults; malformed numbers surface as
 * configuration errors rather than silently falling back.
 */
export function loadConfigFromEnv(
  env: EnvSource = process.env,
  base: ExplorationConfig = DEFAULT_EXPLORATION_CONFIG,
): ExplorationConfig {
  const overrides: EnvOverrides = {};
  const issues: string[] = [];

  for (const [suffix, field] of Object.entries(NUMBER_KEYS)) {
    const raw = env[ENV_PREFIX + suffix];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push(`${ENV_PREFIX}${suffix}: expected a number, got '${raw}'`);
      continue;
    }
    overrides[field] = value;
  }

  for (const [suffix, field] of Object.entries(BOOLEAN_KEYS)) {
    const raw = env[ENV_PREFIX + suffix];
    if (raw === undefined || raw === '') continue;
    overrides[field] = raw.toLowerCase() === 'true';
  }

  for (const [suffix, field] of Object.entries(STRING_KEYS)) {
    const raw = env[ENV_PREFIX + suffix];
    if (raw === undefined || raw === '') continue;
    overrides[field] = raw;
  }

  const rawLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (rawLevel !== undefined && rawLevel !== '') {
    const level = SeveritySchema.safeParse(rawLevel.toUpperCase());
    if (level.success) {
      overrides.logLevel = level.data;
    } else {
      issues.push(`${ENV_PREFIX}LOG_LEVEL: unknown level '${rawLevel}'`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return createConfig(overrides, base);
}

/**
 * Plain-object view of a config, suitable for logging or trace metadata.
 */
export function configToRecord(config: ExplorationConfig): Record<string, unknown> {
  return { ...config };
}
