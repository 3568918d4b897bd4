/**
 * Emotion Trend Calculator
 *
 * Windowed ordinal trend over an emotion sequence, plus the
 * intervention predicate recomputed after every append.
 */

import { CONFIG } from '../utils/config';
import { EmotionLabel, EmotionSignal, TrendDirection } from '../types';

/**
 * Ordinal used only for trend arithmetic
 */
export const EMOTION_ORDINAL: Readonly<Record<EmotionLabel, number>> = {
  sad: 0,
  tired: 1,
  frustrated: 2,
  neutral: 3,
  happy: 4,
  excited: 5,
};

export const INTERVENTION_EMOTIONS: readonly EmotionLabel[] = ['frustrated', 'sad', 'tired'];

export const POSITIVE_EMOTIONS: readonly EmotionLabel[] = ['excited', 'happy'];

export function isPositiveEmotion(emotion: EmotionLabel): boolean {
  return POSITIVE_EMOTIONS.includes(emotion);
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Trend over the last few entries: the recent slice's average against the
 * older slice's. With exactly three entries the older slice is the first entry.
 */
export function calculateTrend(history: readonly EmotionLabel[]): TrendDirection {
  const { window, recentSize, threshold, minHistory } = CONFIG.trend;

  if (history.length < minHistory) {
    return 'stable';
  }

  const values = history.slice(-window).map((emotion) => EMOTION_ORDINAL[emotion]);
  const recentAvg = mean(values.slice(-recentSize));
  const olderAvg = values.length > recentSize
    ? mean(values.slice(0, values.length - recentSize))
    : values[0];

  if (recentAvg > olderAvg + threshold) {
    return 'improving';
  }
  if (recentAvg < olderAvg - threshold) {
    return 'declining';
  }
  return 'stable';
}

export function needsIntervention(current: EmotionLabel | undefined, trend: TrendDirection): boolean {
  return (current !== undefined && INTERVENTION_EMOTIONS.includes(current)) || trend === 'declining';
}

/**
 * Trend and intervention flag for a history, as of its last entry
 */
export function evaluateEmotionSignal(history: readonly EmotionLabel[]): EmotionSignal {
  const trend = calculateTrend(history);
  return {
    trend,
    needsIntervention: needsIntervention(history[history.length - 1], trend),
  };
}
