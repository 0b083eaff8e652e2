/**
 * Performance Calculator
 *
 * OPR, NpOPR, DPR, NpDPR and CCWM by (optionally ridge-regularized) least
 * squares over alliance participation, plus NpAVG as a plain mean.
 *
 * Every call builds its own matrices; nothing is kept between calls.
 */

import {
  DEFAULT_PIVOT_EPSILON,
  solveLeastSquares,
  solveLeastSquaresRegularized,
} from '../matrix/linear-algebra';
import { buildMatchMatrices, collectTeams } from './design-matrix';
import { METRIC_SCORE_FUNCTIONS } from './scoring';
import { Match, MetricName, MetricResult, TeamId } from './types';

export interface CalculatorOptions {
  matches: readonly Match[];
  /** Team universe in preferred column order; derived from the matches if omitted */
  teams?: readonly TeamId[];
  /** 0 means an unregularized solve */
  lambda: number;
  pivotEpsilon?: number;
}

export class PerformanceCalculator {
  readonly matches: readonly Match[];
  readonly teams: readonly TeamId[];
  readonly lambda: number;
  private pivotEpsilon: number;

  constructor(options: CalculatorOptions) {
    if (!Number.isFinite(options.lambda) || options.lambda < 0) {
      throw new Error(`lambda must be a finite non-negative number, got ${options.lambda}`);
    }
    this.matches = options.matches;
    this.teams = options.teams ?? collectTeams(options.matches);
    this.lambda = options.lambda;
    this.pivotEpsilon = options.pivotEpsilon ?? DEFAULT_PIVOT_EPSILON;
  }

  calculateOPR(): MetricResult {
    return this.calculateMetric('opr');
  }

  calculateNpOPR(): MetricResult {
    return this.calculateMetric('npOpr');
  }

  calculateDPR(): MetricResult {
    return this.calculateMetric('dpr');
  }

  calculateNpDPR(): MetricResult {
    return this.calculateMetric('npDpr');
  }

  calculateCCWM(): MetricResult {
    return this.calculateMetric('ccwm');
  }

  /**
   * All five regression metrics, keyed by metric name
   */
  calculateAll(): Record<MetricName, MetricResult> {
    return {
      opr: this.calculateOPR(),
      npOpr: this.calculateNpOPR(),
      ccwm: this.calculateCCWM(),
      dpr: this.calculateDPR(),
      npDpr: this.calculateNpDPR(),
    };
  }

  calculateMetric(metric: MetricName): MetricResult {
    if (this.matches.length === 0 || this.teams.length === 0) {
      return { metric, status: 'insufficient_data', ratings: new Map() };
    }

    const { a, b, activeTeams } = buildMatchMatrices(this.matches, this.teams, METRIC_SCORE_FUNCTIONS[metric]);
    if (activeTeams.length === 0) {
      return { metric, status: 'insufficient_data', ratings: new Map() };
    }

    const result =
      this.lambda === 0
        ? solveLeastSquares(a, b, this.pivotEpsilon)
        : solveLeastSquaresRegularized(a, b, this.lambda, this.pivotEpsilon);

    if (!result.ok) {
      return { metric, status: result.reason, ratings: new Map() };
    }

    const ratings = new Map<TeamId, number>();
    activeTeams.forEach((t, i) => ratings.set(t, result.solution[i]));
    return { metric, status: 'ok', ratings };
  }

  /**
   * Mean non-penalty alliance score over every appearance of `teamId`.
   * 0 when the team never played.
   */
  calculateNpAVG(matches: readonly Match[], teamId: TeamId): number {
    let total = 0;
    let count = 0;

    for (const m of matches) {
      for (const t of m.redTeams) {
        if (t === teamId) {
          total += m.redScore - m.redPenalties;
          count++;
        }
      }
      for (const t of m.blueTeams) {
        if (t === teamId) {
          total += m.blueScore - m.bluePenalties;
          count++;
        }
      }
    }

    return count === 0 ? 0 : total / count;
  }
}
