/**
 * Design Matrix Builder
 *
 * Turns matches into the regression system `A·x ≈ b`: one row per alliance per
 * match, one column per team that actually played.
 */

import { Match, ScoreFunction, TeamId } from './types';

export interface MatchMatrices {
  /** 2·|matches| × |activeTeams| indicator matrix */
  a: number[][];
  /** Target per row */
  b: number[];
  /** Column order of `a` */
  activeTeams: TeamId[];
}

/**
 * Sorted distinct team IDs across every alliance of every match
 */
export function collectTeams(matches: readonly Match[]): TeamId[] {
  const teamSet = new Set<TeamId>();
  for (const m of matches) {
    m.redTeams.forEach(t => teamSet.add(t));
    m.blueTeams.forEach(t => teamSet.add(t));
  }
  return [...teamSet].sort((x, y) => x - y);
}

/**
 * Teams from `teams` that appear in at least one match, in the caller's order.
 */
export function activeTeamsOf(matches: readonly Match[], teams: readonly TeamId[]): TeamId[] {
  const participating = new Set(collectTeams(matches));
  const seen = new Set<TeamId>();
  const active: TeamId[] = [];
  for (const t of teams) {
    if (participating.has(t) && !seen.has(t)) {
      seen.add(t);
      active.push(t);
    }
  }
  return active;
}

/**
 * Build `A`, `b` and the active team list.
 *
 * Row 2i is the red alliance of match i and row 2i+1 the blue alliance.
 * Teams missing from `teams` are dropped from their row rather than rejected.
 */
export function buildMatchMatrices(
  matches: readonly Match[],
  teams: readonly TeamId[],
  scoreFn: ScoreFunction
): MatchMatrices {
  const activeTeams = activeTeamsOf(matches, teams);
  const teamIndex = new Map<TeamId, number>();
  activeTeams.forEach((t, i) => teamIndex.set(t, i));

  const allianceRow = (alliance: readonly TeamId[]): number[] => {
    const row = new Array<number>(activeTeams.length).fill(0);
    for (const t of alliance) {
      const idx = teamIndex.get(t);
      if (idx !== undefined) {
        row[idx] = 1;
      }
    }
    return row;
  };

  const a: number[][] = [];
  const b: number[] = [];

  for (const m of matches) {
    a.push(allianceRow(m.redTeams));
    b.push(scoreFn(m, true));

    a.push(allianceRow(m.blueTeams));
    b.push(scoreFn(m, false));
  }

  return { a, b, activeTeams };
}
