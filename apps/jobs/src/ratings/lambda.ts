/**
 * Regularization Strength (λ) Selection
 *
 * Three interchangeable strategies behind one interface:
 * - fixed_band:  coarse bands keyed on match count
 * - continuous:  clamp(0.5 / √n, 0.001, 0.3)
 * - auto_tuned:  start from the continuous value (capped at maxLambda) and
 *                double λ until cond(AᵗA + λI) drops under a target
 */

import { addRegularization, multiply, transpose } from '../matrix/linear-algebra';
import { conditionNumber } from '../matrix/condition';

export type LambdaStrategy = 'fixed_band' | 'continuous' | 'auto_tuned';

export const LAMBDA_STRATEGIES: readonly LambdaStrategy[] = ['fixed_band', 'continuous', 'auto_tuned'];

export interface LambdaSelection {
  lambda: number;
  /** 'override' when a fixed λ was supplied instead of a strategy */
  strategy: LambdaStrategy | 'override';
  /** cond(AᵗA + λI) at the chosen λ, when the strategy looked at the matrix */
  conditionNumber?: number;
  /** Number of times λ was doubled */
  iterations: number;
  /** Target condition number was not reached */
  illConditioned: boolean;
}

export interface RegularizationPolicy {
  readonly strategy: LambdaStrategy;
  chooseLambda(matchCount: number, designMatrix?: number[][]): LambdaSelection;
}

export interface AutoTuneOptions {
  targetCondition: number;
  maxLambda: number;
  maxIterations: number;
}

export const DEFAULT_AUTO_TUNE: AutoTuneOptions = {
  targetCondition: 1e7,
  maxLambda: 10.0,
  maxIterations: 10,
};

export function isLambdaStrategy(value: unknown): value is LambdaStrategy {
  return LAMBDA_STRATEGIES.some(strategy => strategy === value);
}

/**
 * Banded λ by match count
 */
export function baseLambda(matchCount: number): number {
  if (matchCount < 20) return 0.1;
  if (matchCount <= 60) return 0.01;
  return 0.001;
}

/**
 * Continuous λ: 0.5 / √n clamped to [0.001, 0.3]
 */
export function continuousLambda(matchCount: number): number {
  const raw = 0.5 / Math.sqrt(matchCount);
  return Math.min(0.3, Math.max(0.001, raw));
}

/**
 * cond(AᵗA + λI) for a design matrix `A`
 */
export function regularizedCondition(designMatrix: number[][], lambda: number): number {
  const ata = multiply(transpose(designMatrix), designMatrix);
  return conditionNumber(addRegularization(ata, lambda));
}

export class FixedBandPolicy implements RegularizationPolicy {
  readonly strategy = 'fixed_band' as const;

  chooseLambda(matchCount: number): LambdaSelection {
    return { lambda: baseLambda(matchCount), strategy: this.strategy, iterations: 0, illConditioned: false };
  }
}

export class ContinuousHeuristicPolicy implements RegularizationPolicy {
  readonly strategy = 'continuous' as const;

  chooseLambda(matchCount: number): LambdaSelection {
    return { lambda: continuousLambda(matchCount), strategy: this.strategy, iterations: 0, illConditioned: false };
  }
}

export class AutoTunedPolicy implements RegularizationPolicy {
  readonly strategy = 'auto_tuned' as const;
  private options: AutoTuneOptions;

  constructor(options: Partial<AutoTuneOptions> = {}) {
    this.options = { ...DEFAULT_AUTO_TUNE, ...options };
  }

  /**
   * The design matrix should cover every active team of the event, not one
   * metric's slice; without it the continuous λ is returned as-is.
   */
  chooseLambda(matchCount: number, designMatrix?: number[][]): LambdaSelection {
    const { targetCondition, maxLambda, maxIterations } = this.options;
    let lambda = Math.min(continuousLambda(matchCount), maxLambda);

    if (!designMatrix || designMatrix.length === 0 || designMatrix[0].length === 0) {
      return { lambda, strategy: this.strategy, iterations: 0, illConditioned: false };
    }

    const ata = multiply(transpose(designMatrix), designMatrix);
    const conditionAt = (l: number): number => conditionNumber(addRegularization(ata.map(row => [...row]), l));

    let condition = conditionAt(lambda);
    let iterations = 0;

    while (condition > targetCondition && iterations < maxIterations && lambda < maxLambda) {
      lambda = Math.min(lambda * 2, maxLambda);
      condition = conditionAt(lambda);
      iterations++;
    }

    return {
      lambda,
      strategy: this.strategy,
      conditionNumber: condition,
      iterations,
      illConditioned: condition > targetCondition,
    };
  }
}

export function createRegularizationPolicy(
  strategy: LambdaStrategy,
  autoTune: Partial<AutoTuneOptions> = {}
): RegularizationPolicy {
  switch (strategy) {
    case 'fixed_band':
      return new FixedBandPolicy();
    case 'continuous':
      return new ContinuousHeuristicPolicy();
    case 'auto_tuned':
      return new AutoTunedPolicy(autoTune);
  }
}
