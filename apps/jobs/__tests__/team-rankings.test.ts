/**
 * Team Rankings Tests
 *
 * Per-event tables, λ selection and the match-weighted season aggregate.
 */

import { FixedBandPolicy, LambdaSelection } from '../src/ratings/lambda';
import {
  EventRankings,
  TeamRanking,
  aggregateRankings,
  computeEventRankings,
  countTeamMatches,
  flattenEventRankings,
  selectLambda,
  sortRankings,
} from '../src/ratings/team-rankings';
import { Match } from '../src/ratings/types';

// Strengths 10, 20, 30, 40; see performance-calculator.test.ts
const matches: Match[] = [
  { redTeams: [1, 2], blueTeams: [3, 4], redScore: 30, blueScore: 70, redPenalties: 0, bluePenalties: 0 },
  { redTeams: [1, 3], blueTeams: [2, 4], redScore: 40, blueScore: 60, redPenalties: 0, bluePenalties: 0 },
  { redTeams: [1, 4], blueTeams: [2, 3], redScore: 50, blueScore: 50, redPenalties: 0, bluePenalties: 0 },
];

const FIXED: LambdaSelection = { lambda: 0.1, strategy: 'fixed_band', iterations: 0, illConditioned: false };

function ranking(teamId: number, eventCode: string, numMatches: number, values: Partial<TeamRanking>): TeamRanking {
  return {
    teamId,
    eventCode,
    numMatches,
    opr: null,
    npOpr: null,
    ccwm: null,
    dpr: null,
    npDpr: null,
    npAvg: 0,
    ...values,
  };
}

function event(eventCode: string, rankings: TeamRanking[]): EventRankings {
  return {
    eventCode,
    matchCount: 10,
    lambda: FIXED,
    statuses: { opr: 'ok', npOpr: 'ok', ccwm: 'ok', dpr: 'ok', npDpr: 'ok' },
    rankings,
  };
}

describe('Team Rankings', () => {
  describe('countTeamMatches', () => {
    test('counts matches on either alliance', () => {
      expect(countTeamMatches(matches, 2)).toBe(3);
      expect(countTeamMatches(matches.slice(0, 1), 4)).toBe(1);
      expect(countTeamMatches(matches, 9)).toBe(0);
    });
  });

  describe('selectLambda', () => {
    test('an override bypasses the policy', () => {
      expect(selectLambda(matches, [1, 2, 3, 4], new FixedBandPolicy(), 0)).toEqual({
        lambda: 0,
        strategy: 'override',
        iterations: 0,
        illConditioned: false,
      });
    });

    test('null override defers to the policy', () => {
      expect(selectLambda(matches, [1, 2, 3, 4], new FixedBandPolicy(), null)).toEqual(FIXED);
    });
  });

  describe('computeEventRankings', () => {
    const result = computeEventRankings('E1', matches, [1, 2, 3, 4, 99], new FixedBandPolicy(), { lambdaOverride: 0 });

    test('one row per team that played', () => {
      expect(result.eventCode).toBe('E1');
      expect(result.matchCount).toBe(3);
      expect(result.rankings.map(r => r.teamId)).toEqual([1, 2, 3, 4]);
      expect(result.rankings.every(r => r.numMatches === 3 && r.eventCode === 'E1')).toBe(true);
    });

    test('every metric solved', () => {
      expect(result.statuses).toEqual({ opr: 'ok', npOpr: 'ok', ccwm: 'ok', dpr: 'ok', npDpr: 'ok' });
    });

    test('exact metric values for team 4', () => {
      const team4 = result.rankings[3];
      expect(team4.opr).toBeCloseTo(40, 9);
      expect(team4.npOpr).toBeCloseTo(40, 9);
      expect(team4.dpr).toBeCloseTo(10, 9);
      expect(team4.npDpr).toBeCloseTo(10, 9);
      expect(team4.ccwm).toBeCloseTo(30, 9);
      // (70 + 60 + 50) / 3
      expect(team4.npAvg).toBe(60);
    });

    test('failed solves become null metrics', () => {
      const degenerate: Match[] = [matches[0]];
      const failed = computeEventRankings('E2', degenerate, [1, 2, 3, 4], new FixedBandPolicy(), { lambdaOverride: 0 });

      expect(failed.statuses.opr).toBe('singular');
      expect(failed.rankings).toHaveLength(4);
      expect(failed.rankings[0]).toEqual({
        teamId: 1,
        eventCode: 'E2',
        numMatches: 1,
        opr: null,
        npOpr: null,
        ccwm: null,
        dpr: null,
        npDpr: null,
        npAvg: 30,
      });
    });

    test('uses the policy λ without an override', () => {
      const regularized = computeEventRankings('E3', matches, [1, 2, 3, 4], new FixedBandPolicy());
      expect(regularized.lambda).toEqual(FIXED);
      // Ridge shrinks every rating toward zero
      expect(regularized.rankings[3].opr).toBeLessThan(40);
    });
  });

  describe('aggregateRankings', () => {
    const events = [
      event('E1', [
        ranking(1, 'E1', 2, { opr: 10, dpr: 5, npAvg: 30 }),
        ranking(2, 'E1', 4, { npAvg: 20 }),
      ]),
      event('E2', [
        ranking(1, 'E2', 6, { opr: 40, dpr: null, npAvg: 50 }),
        ranking(3, 'E2', 3, { opr: 50, npAvg: 25 }),
      ]),
    ];
    const aggregated = aggregateRankings(events);

    test('weights each event by matches played', () => {
      const team1 = aggregated.find(r => r.teamId === 1);
      // (10·2 + 40·6) / 8
      expect(team1?.opr).toBe(32.5);
      // (30·2 + 50·6) / 8
      expect(team1?.npAvg).toBe(45);
      expect(team1?.events).toBe(2);
      expect(team1?.numMatches).toBe(8);
    });

    test('a null metric is left out of that average', () => {
      expect(aggregated.find(r => r.teamId === 1)?.dpr).toBe(5);
    });

    test('a metric with no values stays null', () => {
      const team2 = aggregated.find(r => r.teamId === 2);
      expect(team2?.opr).toBeNull();
      expect(team2?.npAvg).toBe(20);
    });

    test('sorted by OPR, nulls last', () => {
      expect(aggregated.map(r => r.teamId)).toEqual([3, 1, 2]);
    });

    test('no events gives no rows', () => {
      expect(aggregateRankings([])).toEqual([]);
    });
  });

  describe('flattenEventRankings', () => {
    test('keeps one row per team and event, sorted within each event', () => {
      const rows = flattenEventRankings([
        event('E1', [ranking(1, 'E1', 3, { opr: 10 }), ranking(2, 'E1', 3, { opr: 20 })]),
        event('E2', [ranking(1, 'E2', 4, { opr: 5 })]),
      ]);

      expect(rows.map(r => [r.eventCode, r.teamId, r.opr])).toEqual([
        ['E1', 2, 20],
        ['E1', 1, 10],
        ['E2', 1, 5],
      ]);
    });
  });

  describe('sortRankings', () => {
    test('ties on OPR fall back to team number', () => {
      const rows = [
        ranking(9, 'E', 1, { opr: 5 }),
        ranking(3, 'E', 1, { opr: null }),
        ranking(4, 'E', 1, { opr: 5 }),
        ranking(7, 'E', 1, { opr: 12 }),
      ];
      expect(sortRankings(rows).map(r => r.teamId)).toEqual([7, 4, 9, 3]);
      expect(rows.map(r => r.teamId)).toEqual([9, 3, 4, 7]);
    });
  });
});
