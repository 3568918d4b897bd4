import { CONFIG } from '../utils/config';
import { EmotionLabel, ProficiencyLevel } from '../types';
import { isPositiveEmotion } from '../emotion/trend';
import { advanceLevel, isMaxLevel } from './proficiency';

/**
 * Replay-time level review. Advances exactly one level when enough of the
 * most recent emotions are positive. Independent of the ordinal trend and
 * of the message-statistics estimator.
 */
export function reviewLevel(history: readonly EmotionLabel[], current: ProficiencyLevel): ProficiencyLevel {
  const { window, minPositive } = CONFIG.levelReview;

  if (history.length < window || isMaxLevel(current)) {
    return current;
  }

  const positives = history.slice(-window).filter(isPositiveEmotion).length;
  return positives >= minPositive ? advanceLevel(current) : current;
}

/**
 * True on every Nth processed turn (1-indexed)
 */
export function isReviewTurn(processedTurns: number): boolean {
  return processedTurns > 0 && processedTurns % CONFIG.levelReview.interval === 0;
}
