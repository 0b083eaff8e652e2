/**
 * DataSourceAdapter Interface
 *
 * Defines the contract for data source adapters to fetch events and raw
 * match results from various providers.
 */

export type Alliance = 'red' | 'blue';

export type EventType = 'scrimmage' | 'league_meet' | 'qualifier' | 'league_tournament' | 'championship' | 'other';

export const EVENT_TYPES: readonly EventType[] = [
  'scrimmage',
  'league_meet',
  'qualifier',
  'league_tournament',
  'championship',
  'other',
];

/** Event types that count toward season totals */
export const COMPETITIVE_EVENT_TYPES: readonly EventType[] = ['qualifier', 'championship'];

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some(type => type === value);
}

export function isCompetitiveEvent(event: CompetitionEvent): boolean {
  return COMPETITIVE_EVENT_TYPES.includes(event.type);
}

export interface CompetitionEvent {
  code: string;
  name: string;
  type: EventType;
  season: number;
  region?: string;
  startDate?: Date;
}

export interface MatchParticipant {
  teamId: number;
  alliance: Alliance;
  onField: boolean;
  dq: boolean;
}

export interface AllianceScore {
  totalPoints: number;
  /** Foul points awarded to this alliance from the opponent's fouls */
  foulPointsCommitted: number;
}

export interface MatchRecord {
  matchId: string;
  eventCode: string;
  participants: MatchParticipant[];
  red?: AllianceScore;
  blue?: AllianceScore;
}

export interface DataSourceAdapter {
  /**
   * Fetch events for a season, optionally limited to one region
   */
  getEvents(season: number, region?: string): Promise<CompetitionEvent[]>;

  /**
   * Fetch every match played at an event
   */
  getMatches(eventCode: string): Promise<MatchRecord[]>;

  getName(): string;

  /**
   * Check if this adapter is available/configured
   */
  isAvailable(): Promise<boolean>;
}

export interface MockAdapterConfig {
  dataPath: string;
  fileFormats: {
    events: string;
    matches: string;
  };
}

export interface AdapterConfig {
  provider: string;
  enabled: boolean;
  config: MockAdapterConfig;
}

export interface DataSourcesConfig {
  adapters: Record<string, AdapterConfig>;
  defaultAdapter: string;
}
