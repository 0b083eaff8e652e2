/**
 * Match Converter
 *
 * Turns raw match records from a data source into regression-ready matches.
 */

import { MatchRecord } from '../../adapters/DataSourceAdapter';
import { Match, TeamId } from './types';

export interface ConvertedMatches {
  matches: Match[];
  /** Sorted IDs of every team that played in a kept match */
  teams: TeamId[];
  skipped: number;
}

/**
 * Convert match records, skipping:
 * - records without both alliance scores
 * - participants who were not on the field or were disqualified
 * - matches left without a team on either alliance
 *
 * Throws if one team is listed on both alliances of the same match.
 */
export function convertMatchRecords(records: readonly MatchRecord[]): ConvertedMatches {
  const matches: Match[] = [];
  const teamSet = new Set<TeamId>();
  let skipped = 0;

  for (const record of records) {
    const { red, blue } = record;
    if (!red || !blue) {
      skipped++;
      continue;
    }

    const redTeams: TeamId[] = [];
    const blueTeams: TeamId[] = [];

    for (const p of record.participants) {
      if (!p.onField || p.dq) continue;

      if (p.alliance === 'red') {
        redTeams.push(p.teamId);
      } else {
        blueTeams.push(p.teamId);
      }
    }

    const conflict = redTeams.find(t => blueTeams.includes(t));
    if (conflict !== undefined) {
      throw new Error(`Match ${record.matchId} at ${record.eventCode} lists team ${conflict} on both alliances`);
    }

    if (redTeams.length === 0 || blueTeams.length === 0) {
      skipped++;
      continue;
    }

    redTeams.forEach(t => teamSet.add(t));
    blueTeams.forEach(t => teamSet.add(t));

    matches.push({
      redTeams,
      blueTeams,
      redScore: red.totalPoints,
      blueScore: blue.totalPoints,
      redPenalties: red.foulPointsCommitted,
      bluePenalties: blue.foulPointsCommitted,
    });
  }

  return {
    matches,
    teams: [...teamSet].sort((a, b) => a - b),
    skipped,
  };
}
