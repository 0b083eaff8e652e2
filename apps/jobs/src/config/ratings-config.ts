/**
 * Ratings Configuration Loader
 *
 * Loads and provides type-safe access to regularization and solver settings
 * from ratings.yml
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { AutoTuneOptions, DEFAULT_AUTO_TUNE, LambdaStrategy, isLambdaStrategy } from '../ratings/lambda';
import { DEFAULT_PIVOT_EPSILON } from '../matrix/linear-algebra';

export interface RatingsConfig {
  lambda: {
    strategy: LambdaStrategy;
    /** Fixed λ for every event; null lets the strategy choose */
    override: number | null;
    autoTune: AutoTuneOptions;
  };
  solver: {
    pivotEpsilon: number;
  };
}

export const DEFAULT_RATINGS_CONFIG_PATH = path.join(__dirname, '../../config/ratings.yml');

function section(parent: unknown, key: string): Record<string, unknown> {
  if (typeof parent !== 'object' || parent === null) return {};
  const value: unknown = Object.entries(parent).find(([k]) => k === key)?.[1];
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function positiveNumber(value: unknown, fallback: number, field: string): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`ratings config: ${field} must be a positive number, got ${String(value)}`);
  }
  return value;
}

/**
 * Parse YAML content, filling defaults for missing fields
 */
export function parseRatingsConfig(content: string): RatingsConfig {
  const parsed: unknown = yaml.load(content);
  const lambda = section(parsed, 'lambda');
  const autoTune = section(lambda, 'auto_tune');
  const solver = section(parsed, 'solver');

  const strategy = lambda.strategy ?? 'fixed_band';
  if (!isLambdaStrategy(strategy)) {
    throw new Error(`ratings config: unknown lambda strategy "${String(strategy)}"`);
  }

  const rawOverride = lambda.override ?? null;
  let override: number | null = null;
  if (rawOverride !== null) {
    if (typeof rawOverride !== 'number' || !Number.isFinite(rawOverride) || rawOverride < 0) {
      throw new Error(`ratings config: lambda.override must be null or a non-negative number, got ${String(rawOverride)}`);
    }
    override = rawOverride;
  }

  const maxIterations = positiveNumber(autoTune.max_iterations, DEFAULT_AUTO_TUNE.maxIterations, 'lambda.auto_tune.max_iterations');
  if (!Number.isInteger(maxIterations)) {
    throw new Error(`ratings config: lambda.auto_tune.max_iterations must be an integer, got ${maxIterations}`);
  }

  return {
    lambda: {
      strategy,
      override,
      autoTune: {
        targetCondition: positiveNumber(autoTune.target_condition, DEFAULT_AUTO_TUNE.targetCondition, 'lambda.auto_tune.target_condition'),
        maxLambda: positiveNumber(autoTune.max_lambda, DEFAULT_AUTO_TUNE.maxLambda, 'lambda.auto_tune.max_lambda'),
        maxIterations,
      },
    },
    solver: {
      pivotEpsilon: positiveNumber(solver.pivot_epsilon, DEFAULT_PIVOT_EPSILON, 'solver.pivot_epsilon'),
    },
  };
}

let cachedConfig: RatingsConfig | null = null;

/**
 * Load ratings configuration from RATINGS_CONFIG_PATH or the bundled ratings.yml
 */
export function loadRatingsConfig(): RatingsConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = process.env.RATINGS_CONFIG_PATH || DEFAULT_RATINGS_CONFIG_PATH;
  cachedConfig = parseRatingsConfig(fs.readFileSync(configPath, 'utf-8'));

  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing)
 */
export function clearRatingsConfigCache(): void {
  cachedConfig = null;
}
