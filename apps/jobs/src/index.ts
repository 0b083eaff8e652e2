export * from './ratings/types';
export * from './ratings/design-matrix';
export * from './ratings/scoring';
export * from './ratings/lambda';
export * from './ratings/performance-calculator';
export * from './ratings/match-converter';
export * from './ratings/team-rankings';
export * from './matrix/linear-algebra';
export * from './matrix/condition';
export { loadRatingsConfig, parseRatingsConfig, clearRatingsConfigCache } from './config/ratings-config';
export type { RatingsConfig } from './config/ratings-config';
