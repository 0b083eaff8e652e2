/**
 * Team Rankings Computation Job
 *
 * Computes OPR / NpOPR / CCWM / DPR / NpDPR / NpAVG for one event, or for every
 * event of a season (optionally one region) combined by match-weighted averaging.
 *
 * Usage:
 *   npm run rankings -- --event USCAFFL
 *   npm run rankings -- --season 2024 --region USCA --out out/usca.csv
 *   npm run rankings -- --season 2024 --per-event --out out/2024-events.csv
 *
 * Season runs only count qualifiers and championships.
 */

import * as dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { AdapterFactory } from '../../adapters/AdapterFactory';
import { DataSourceAdapter, isCompetitiveEvent } from '../../adapters/DataSourceAdapter';
import { writeCsv } from '../../lib/csv-export';
import { loadRatingsConfig } from '../config/ratings-config';
import { RegularizationPolicy, createRegularizationPolicy, isLambdaStrategy } from './lambda';
import { convertMatchRecords } from './match-converter';
import { METRIC_NAMES } from './scoring';
import {
  AggregatedRanking,
  EventRankings,
  TeamRanking,
  aggregateRankings,
  computeEventRankings,
  flattenEventRankings,
  sortRankings,
} from './team-rankings';
import { MetricName } from './types';

export interface RankingJobOptions {
  eventCode?: string;
  season?: number;
  region?: string;
  policy: RegularizationPolicy;
  lambdaOverride?: number | null;
  pivotEpsilon?: number;
}

export interface RankingJobResult {
  events: EventRankings[];
  aggregated: AggregatedRanking[];
}

const METRIC_LABELS: Record<MetricName, string> = {
  opr: 'OPR',
  npOpr: 'NpOPR',
  ccwm: 'CCWM',
  dpr: 'DPR',
  npDpr: 'NpDPR',
};

async function resolveEventCodes(adapter: DataSourceAdapter, options: RankingJobOptions): Promise<string[]> {
  if (options.eventCode) {
    return [options.eventCode];
  }
  if (options.season === undefined) {
    throw new Error('Either an event code or a season is required');
  }

  const events = await adapter.getEvents(options.season, options.region);
  const scope = options.region ? `region ${options.region}, season ${options.season}` : `season ${options.season}`;
  console.log(`   Found ${events.length} events for ${scope}`);

  for (const event of events) {
    if (!isCompetitiveEvent(event)) {
      console.log(`   ⏭️  ${event.code}: ${event.type}, not counted in season totals`);
    }
  }
  return events.filter(isCompetitiveEvent).map(e => e.code);
}

/**
 * Load, convert and rank every requested event
 */
export async function computeTeamRankings(
  adapter: DataSourceAdapter,
  options: RankingJobOptions
): Promise<RankingJobResult> {
  const eventCodes = await resolveEventCodes(adapter, options);
  const events: EventRankings[] = [];

  for (const eventCode of eventCodes) {
    const records = await adapter.getMatches(eventCode);
    const { matches, teams, skipped } = convertMatchRecords(records);

    if (matches.length === 0) {
      console.log(`   ⏭️  ${eventCode}: no valid matches, skipping`);
      continue;
    }

    const result = computeEventRankings(eventCode, matches, teams, options.policy, {
      lambdaOverride: options.lambdaOverride,
      pivotEpsilon: options.pivotEpsilon,
    });

    console.log(
      `   ${eventCode}: ${matches.length} matches (${skipped} skipped), ${teams.length} teams, ` +
        `λ=${result.lambda.lambda} (${result.lambda.strategy})`
    );

    if (result.lambda.illConditioned) {
      const condition = result.lambda.conditionNumber ?? Infinity;
      console.warn(
        `   ⚠️  ${eventCode}: condition number ${condition.toExponential(2)} still above target ` +
          `after ${result.lambda.iterations} doublings (λ=${result.lambda.lambda})`
      );
    }

    for (const [metric, status] of Object.entries(result.statuses)) {
      if (status !== 'ok') {
        console.warn(`   ⚠️  ${eventCode}: ${metric} could not be solved (${status})`);
      }
    }

    events.push(result);
  }

  return { events, aggregated: aggregateRankings(events) };
}

function formatValue(value: number | null): string {
  return value === null ? '   n/a' : value.toFixed(1).padStart(6);
}

function printTopTen(rows: ReadonlyArray<TeamRanking | AggregatedRanking>): void {
  console.log(`\n🏆 Top 10 by OPR:`);
  rows.slice(0, 10).forEach((r, i) => {
    const metrics = METRIC_NAMES.map(m => `${METRIC_LABELS[m].toLowerCase()}=${formatValue(r[m])}`).join('  ');
    console.log(`   ${String(i + 1).padStart(2)}) ${String(r.teamId).padEnd(6)} ${metrics}  npavg=${formatValue(r.npAvg)}`);
  });
}

const csvNumber = (value: unknown): unknown =>
  typeof value === 'number' && !Number.isInteger(value) ? value.toFixed(3) : value;

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

interface CliOptions {
  event?: string;
  season?: number;
  region?: string;
  lambda?: number;
  strategy?: string;
  adapter?: string;
  out?: string;
  perEvent?: boolean;
}

/**
 * Main entry point
 */
async function main() {
  dotenv.config();
  const program = new Command();

  program
    .option('--event <code>', 'Single event to rank')
    .option('--season <year>', 'Season to rank across all events', parseNumberOption)
    .option('--region <code>', 'Limit a season run to one region')
    .option('--lambda <value>', 'Fixed regularization strength (0 = unregularized)', parseNumberOption)
    .option('--strategy <name>', 'Lambda strategy: fixed_band | continuous | auto_tuned')
    .option('--adapter <name>', 'Data source adapter from datasources.yml')
    .option('--out <file>', 'Write rankings to a CSV file')
    .option('--per-event', 'With --season, write one row per team and event instead of merged rows');

  program.parse(process.argv);
  const options = program.opts<CliOptions>();

  try {
    const config = loadRatingsConfig();
    const strategy = options.strategy ?? config.lambda.strategy;
    if (!isLambdaStrategy(strategy)) {
      throw new Error(`Unknown lambda strategy "${strategy}"`);
    }
    if (options.lambda !== undefined && options.lambda < 0) {
      throw new Error(`--lambda must be non-negative, got ${options.lambda}`);
    }

    const adapter = await new AdapterFactory().createAdapter(options.adapter);
    if (!(await adapter.isAvailable())) {
      throw new Error(`Data source "${adapter.getName()}" is not available`);
    }

    console.log(`\n📊 Computing team rankings (${adapter.getName()}, strategy ${strategy})...`);

    const { events, aggregated } = await computeTeamRankings(adapter, {
      eventCode: options.event,
      season: options.season,
      region: options.region,
      policy: createRegularizationPolicy(strategy, config.lambda.autoTune),
      lambdaOverride: options.lambda ?? config.lambda.override,
      pivotEpsilon: config.solver.pivotEpsilon,
    });

    if (events.length === 0) {
      throw new Error('No matches found for the requested events');
    }

    const single = options.event !== undefined;
    const rows = single ? sortRankings(events[0].rankings) : aggregated;
    printTopTen(rows);

    if (options.out) {
      const eventRows = single || options.perEvent === true ? flattenEventRankings(events) : null;
      const written = eventRows
        ? writeCsv(
            options.out,
            eventRows,
            ['teamId', 'eventCode', 'numMatches', 'opr', 'npOpr', 'ccwm', 'dpr', 'npDpr', 'npAvg'],
            csvNumber
          )
        : writeCsv(
            options.out,
            aggregated,
            ['teamId', 'events', 'numMatches', 'opr', 'npOpr', 'ccwm', 'dpr', 'npDpr', 'npAvg'],
            csvNumber
          );
      if (written) {
        console.log(`\n💾 Wrote ${(eventRows ?? aggregated).length} rows to ${options.out}`);
      }
    }

    console.log(`\n✅ Rankings complete: ${events.length} events, ${aggregated.length} teams`);
  } catch (error) {
    console.error('❌ Error computing team rankings:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
