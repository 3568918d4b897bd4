/**
 * Deterministic coaching text used whenever the policy oracle is absent or fails
 */

import { EmotionLabel, ProficiencyLevel, TrendDirection } from '../types';

export const EMOTION_ACTIONS: Readonly<Record<EmotionLabel, string>> = {
  excited: 'Match their excitement with engaging activities!',
  happy: 'Keep the positive momentum with fun challenges.',
  neutral: 'Spark interest with interactive content.',
  frustrated: 'Provide support and easier content.',
  tired: 'Use gentle, low-energy activities.',
  sad: 'Offer comfort and emotional support.',
};

const INTERVENTIONS: Partial<Record<EmotionLabel, string>> = {
  frustrated: "Take a break with a fun game. Offer specific praise for effort. Switch to easier content they've mastered.",
  sad: 'Acknowledge their feelings warmly. Share a comforting story. Introduce mood-lifting activities.',
  tired: 'Suggest a calm activity. Use gentle, soothing tone. Keep interactions brief and light.',
};

const GENERIC_INTERVENTION = 'Provide emotional support and adjust approach to student needs.';

export function fallbackAction(
  emotion: EmotionLabel,
  level: ProficiencyLevel,
  trend: TrendDirection
): string {
  return `${EMOTION_ACTIONS[emotion]} Focus on ${level} level content. Emotion trend: ${trend}.`;
}

/**
 * Emotional-support strategy for a turn flagged for intervention
 */
export function interventionPolicy(emotion: EmotionLabel): string {
  return INTERVENTIONS[emotion] ?? GENERIC_INTERVENTION;
}
