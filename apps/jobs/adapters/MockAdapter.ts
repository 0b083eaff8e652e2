/**
 * Mock Data Source Adapter
 *
 * Reads events and match results from local JSON/CSV files in a data directory.
 * Used for development and testing without external API dependencies.
 *
 * Match files may be JSON (an array of match records, or `{ matches: [...] }`)
 * or CSV with the header
 *   red1,red2,blue1,blue2,redScore,blueScore,redPenalties,bluePenalties
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import {
  AllianceScore,
  CompetitionEvent,
  DataSourceAdapter,
  isEventType,
  MatchParticipant,
  MatchRecord,
  MockAdapterConfig,
} from './DataSourceAdapter';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unwrapList(data: unknown, key: string): unknown[] {
  if (Array.isArray(data)) return data;
  if (isObject(data)) {
    const inner = data[key];
    if (Array.isArray(inner)) return inner;
  }
  throw new Error(`Expected an array or an object with a "${key}" array`);
}

function requireNumber(obj: JsonObject, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${where}: "${key}" must be a number`);
  }
  return value;
}

function requireString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

function parseEvent(raw: unknown, index: number): CompetitionEvent {
  const where = `Event #${index + 1}`;
  if (!isObject(raw)) throw new Error(`${where}: expected an object`);

  const type = raw.type;
  if (!isEventType(type)) {
    throw new Error(`${where}: unknown event type "${String(type)}"`);
  }

  const event: CompetitionEvent = {
    code: requireString(raw, 'code', where),
    name: typeof raw.name === 'string' ? raw.name : requireString(raw, 'code', where),
    type,
    season: requireNumber(raw, 'season', where),
  };
  if (typeof raw.region === 'string') event.region = raw.region;
  if (typeof raw.startDate === 'string') event.startDate = new Date(raw.startDate);
  return event;
}

function parseAllianceScore(raw: unknown, where: string): AllianceScore | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isObject(raw)) throw new Error(`${where}: alliance score must be an object`);
  return {
    totalPoints: requireNumber(raw, 'totalPoints', where),
    foulPointsCommitted: typeof raw.foulPointsCommitted === 'number' ? raw.foulPointsCommitted : 0,
  };
}

function parseParticipant(raw: unknown, where: string): MatchParticipant {
  if (!isObject(raw)) throw new Error(`${where}: participant must be an object`);
  const alliance = raw.alliance;
  if (alliance !== 'red' && alliance !== 'blue') {
    throw new Error(`${where}: alliance must be "red" or "blue"`);
  }
  return {
    teamId: requireNumber(raw, 'teamId', where),
    alliance,
    onField: raw.onField !== false,
    dq: raw.dq === true,
  };
}

export function parseMatchRecords(data: unknown, eventCode: string): MatchRecord[] {
  return unwrapList(data, 'matches').map((raw, index) => {
    const where = `Match #${index + 1} of ${eventCode}`;
    if (!isObject(raw)) throw new Error(`${where}: expected an object`);

    const participants = raw.participants;
    if (!Array.isArray(participants)) {
      throw new Error(`${where}: "participants" must be an array`);
    }

    return {
      matchId: typeof raw.matchId === 'string' ? raw.matchId : `${eventCode}-${index + 1}`,
      eventCode,
      participants: participants.map(p => parseParticipant(p, where)),
      red: parseAllianceScore(raw.red, `${where} (red)`),
      blue: parseAllianceScore(raw.blue, `${where} (blue)`),
    };
  });
}

const CSV_COLUMNS = ['red1', 'red2', 'blue1', 'blue2', 'redScore', 'blueScore', 'redPenalties', 'bluePenalties'];

export function parseMatchesCsv(content: string, eventCode: string): MatchRecord[] {
  if (content.trim().length === 0) return [];

  const parsed = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h: string) => h.trim(),
  });

  const header = parsed.meta.fields ?? [];
  const missing = CSV_COLUMNS.filter(c => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Match CSV for ${eventCode} is missing columns: ${missing.join(', ')}`);
  }

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`Match CSV for ${eventCode}, row ${(first.row ?? 0) + 2}: ${first.message}`);
  }

  return parsed.data.map((row, index) => {
    const value = (column: string): number => {
      const cell = row[column];
      const num = typeof cell === 'string' && cell.trim().length > 0 ? Number(cell) : NaN;
      if (!Number.isFinite(num)) {
        throw new Error(`Match CSV for ${eventCode}, row ${index + 2}: "${column}" is not a number`);
      }
      return num;
    };

    const participant = (column: string, alliance: 'red' | 'blue'): MatchParticipant => ({
      teamId: value(column),
      alliance,
      onField: true,
      dq: false,
    });

    return {
      matchId: `${eventCode}-${index + 1}`,
      eventCode,
      participants: [
        participant('red1', 'red'),
        participant('red2', 'red'),
        participant('blue1', 'blue'),
        participant('blue2', 'blue'),
      ],
      red: { totalPoints: value('redScore'), foulPointsCommitted: value('redPenalties') },
      blue: { totalPoints: value('blueScore'), foulPointsCommitted: value('bluePenalties') },
    };
  });
}

export class MockAdapter implements DataSourceAdapter {
  private dataPath: string;
  private fileFormats: MockAdapterConfig['fileFormats'];

  constructor(config: MockAdapterConfig) {
    this.dataPath = config.dataPath;
    this.fileFormats = config.fileFormats;
  }

  getName(): string {
    return 'Mock Data Source';
  }

  async isAvailable(): Promise<boolean> {
    return existsSync(this.dataPath);
  }

  async getEvents(season: number, region?: string): Promise<CompetitionEvent[]> {
    const filePath = path.join(this.dataPath, this.fileFormats.events);

    if (!existsSync(filePath)) {
      throw new Error(`Events file not found: ${filePath}`);
    }

    const data: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    return unwrapList(data, 'events')
      .map(parseEvent)
      .filter(e => e.season === season && (region === undefined || e.region === region));
  }

  async getMatches(eventCode: string): Promise<MatchRecord[]> {
    const filePath = path.join(this.dataPath, this.fileFormats.matches.replace('{eventCode}', eventCode));

    if (!existsSync(filePath)) {
      console.warn(`Match file not found for event ${eventCode}: ${filePath}`);
      return [];
    }

    const content = readFileSync(filePath, 'utf8');
    if (filePath.endsWith('.csv')) {
      return parseMatchesCsv(content, eventCode);
    }
    return parseMatchRecords(JSON.parse(content), eventCode);
  }
}
