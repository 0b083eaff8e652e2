/**
 * Team Rankings
 *
 * Per-event metric tables and their match-weighted combination across the
 * events of a season or region.
 */

import { buildMatchMatrices } from './design-matrix';
import { LambdaSelection, RegularizationPolicy } from './lambda';
import { PerformanceCalculator } from './performance-calculator';
import { oprScore } from './scoring';
import { Match, MetricName, MetricStatus, TeamId } from './types';

/** Metric values for one team; null where that metric's solve failed */
export type MetricValues = Record<MetricName, number | null>;

export interface TeamRanking extends MetricValues {
  teamId: TeamId;
  eventCode: string;
  numMatches: number;
  npAvg: number;
}

export interface EventRankings {
  eventCode: string;
  matchCount: number;
  lambda: LambdaSelection;
  statuses: Record<MetricName, MetricStatus>;
  rankings: TeamRanking[];
}

export interface AggregatedRanking extends MetricValues {
  teamId: TeamId;
  events: number;
  numMatches: number;
  npAvg: number;
}

export interface EventRankingOptions {
  /** Fixed λ that bypasses the policy; 0 = unregularized */
  lambdaOverride?: number | null;
  pivotEpsilon?: number;
}

/**
 * Number of matches in which a team played on either alliance
 */
export function countTeamMatches(matches: readonly Match[], teamId: TeamId): number {
  return matches.filter(m => m.redTeams.includes(teamId) || m.blueTeams.includes(teamId)).length;
}

/**
 * Choose λ for an event. The auto-tuned policy sees a design matrix over every
 * active team; which metric's targets are attached does not matter.
 */
export function selectLambda(
  matches: readonly Match[],
  teams: readonly TeamId[],
  policy: RegularizationPolicy,
  lambdaOverride?: number | null
): LambdaSelection {
  if (lambdaOverride !== undefined && lambdaOverride !== null) {
    return { lambda: lambdaOverride, strategy: 'override', iterations: 0, illConditioned: false };
  }
  const { a } = buildMatchMatrices(matches, teams, oprScore);
  return policy.chooseLambda(matches.length, a);
}

export function computeEventRankings(
  eventCode: string,
  matches: readonly Match[],
  teams: readonly TeamId[],
  policy: RegularizationPolicy,
  options: EventRankingOptions = {}
): EventRankings {
  const lambda = selectLambda(matches, teams, policy, options.lambdaOverride);

  const calculator = new PerformanceCalculator({
    matches,
    teams,
    lambda: lambda.lambda,
    pivotEpsilon: options.pivotEpsilon,
  });
  const results = calculator.calculateAll();

  const statuses: Record<MetricName, MetricStatus> = {
    opr: results.opr.status,
    npOpr: results.npOpr.status,
    ccwm: results.ccwm.status,
    dpr: results.dpr.status,
    npDpr: results.npDpr.status,
  };

  const rankings: TeamRanking[] = teams
    .map(teamId => ({ teamId, numMatches: countTeamMatches(matches, teamId) }))
    .filter(({ numMatches }) => numMatches > 0)
    .map(({ teamId, numMatches }) => ({
      teamId,
      eventCode,
      numMatches,
      opr: results.opr.ratings.get(teamId) ?? null,
      npOpr: results.npOpr.ratings.get(teamId) ?? null,
      ccwm: results.ccwm.ratings.get(teamId) ?? null,
      dpr: results.dpr.ratings.get(teamId) ?? null,
      npDpr: results.npDpr.ratings.get(teamId) ?? null,
      npAvg: calculator.calculateNpAVG(matches, teamId),
    }));

  return { eventCode, matchCount: matches.length, lambda, statuses, rankings };
}

function compareByOpr(a: { opr: number | null; teamId: TeamId }, b: { opr: number | null; teamId: TeamId }): number {
  if (a.opr === null && b.opr === null) return a.teamId - b.teamId;
  if (a.opr === null) return 1;
  if (b.opr === null) return -1;
  return b.opr - a.opr || a.teamId - b.teamId;
}

/**
 * Combine per-event rankings into one row per team, weighting each event by
 * the number of matches the team played there. An event whose solve failed
 * for a metric is left out of that metric's average.
 */
export function aggregateRankings(events: readonly EventRankings[]): AggregatedRanking[] {
  const byTeam = new Map<TeamId, TeamRanking[]>();
  for (const event of events) {
    for (const ranking of event.rankings) {
      const list = byTeam.get(ranking.teamId) ?? [];
      list.push(ranking);
      byTeam.set(ranking.teamId, list);
    }
  }

  const weighted = (rows: TeamRanking[], value: (r: TeamRanking) => number | null): number | null => {
    let sum = 0;
    let weight = 0;
    for (const r of rows) {
      const v = value(r);
      if (v === null || r.numMatches === 0) continue;
      sum += v * r.numMatches;
      weight += r.numMatches;
    }
    return weight > 0 ? sum / weight : null;
  };

  const results: AggregatedRanking[] = [];
  for (const [teamId, rows] of byTeam) {
    results.push({
      teamId,
      events: rows.length,
      numMatches: rows.reduce((sum, r) => sum + r.numMatches, 0),
      opr: weighted(rows, r => r.opr),
      npOpr: weighted(rows, r => r.npOpr),
      ccwm: weighted(rows, r => r.ccwm),
      dpr: weighted(rows, r => r.dpr),
      npDpr: weighted(rows, r => r.npDpr),
      npAvg: weighted(rows, r => r.npAvg) ?? 0,
    });
  }

  return results.sort(compareByOpr);
}

/**
 * Event rankings sorted by OPR, best first
 */
export function sortRankings(rankings: readonly TeamRanking[]): TeamRanking[] {
  return [...rankings].sort(compareByOpr);
}

/**
 * One row per team and event, events in the given order, each sorted by OPR
 */
export function flattenEventRankings(events: readonly EventRankings[]): TeamRanking[] {
  return events.flatMap(event => sortRankings(event.rankings));
}
