/**
 * Ratings Engine Types
 *
 * Shared shapes for match input, solver output and per-metric results.
 */

export type TeamId = number;

/**
 * One match between a red and a blue alliance.
 *
 * Penalties are the foul points included in that alliance's own score,
 * so `redScore - redPenalties` is red's non-penalty score.
 */
export interface Match {
  readonly redTeams: readonly TeamId[];
  readonly blueTeams: readonly TeamId[];
  readonly redScore: number;
  readonly blueScore: number;
  readonly redPenalties: number;
  readonly bluePenalties: number;
}

export type ScoreFunction = (match: Match, isRed: boolean) => number;

export type MetricName = 'opr' | 'npOpr' | 'dpr' | 'npDpr' | 'ccwm';

export type SolveFailure = 'singular' | 'non_finite';

export type SolveResult =
  | { ok: true; solution: number[] }
  | { ok: false; reason: SolveFailure; column?: number };

export type MetricStatus = 'ok' | 'insufficient_data' | SolveFailure;

export interface MetricResult {
  metric: MetricName;
  status: MetricStatus;
  ratings: Map<TeamId, number>;
}
