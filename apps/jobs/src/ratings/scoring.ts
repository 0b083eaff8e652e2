/**
 * Metric Scoring Functions
 *
 * Each metric regresses a different per-alliance quantity. The blue side is
 * always the mirror of the red side.
 */

import { MetricName, ScoreFunction } from './types';

/** Alliance's own score */
export const oprScore: ScoreFunction = (m, isRed) => (isRed ? m.redScore : m.blueScore);

/** Alliance's own score without penalty points */
export const npOprScore: ScoreFunction = (m, isRed) =>
  isRed ? m.redScore - m.redPenalties : m.blueScore - m.bluePenalties;

/** What the opposing alliance scored */
export const dprScore: ScoreFunction = (m, isRed) => (isRed ? m.blueScore : m.redScore);

export const npDprScore: ScoreFunction = (m, isRed) =>
  isRed ? m.blueScore - m.bluePenalties : m.redScore - m.redPenalties;

/** Winning margin from this alliance's point of view */
export const ccwmScore: ScoreFunction = (m, isRed) =>
  isRed ? m.redScore - m.blueScore : m.blueScore - m.redScore;

export const METRIC_SCORE_FUNCTIONS: Record<MetricName, ScoreFunction> = {
  opr: oprScore,
  npOpr: npOprScore,
  dpr: dprScore,
  npDpr: npDprScore,
  ccwm: ccwmScore,
};

export const METRIC_NAMES: readonly MetricName[] = ['opr', 'npOpr', 'ccwm', 'dpr', 'npDpr'];

