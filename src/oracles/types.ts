/**
 * Oracle Interfaces
 *
 * External components consulted through narrow interfaces. Every caller
 * holds a deterministic local fallback; a rejected promise means
 * "unavailable for this call".
 */

import { ChatMessage, EmotionLabel, ProficiencyLevel, TrendDirection } from '../types';

/**
 * Text classification oracle
 */
export interface EmotionOracle {
  classify(text: string): Promise<EmotionLabel>;

  /** Optional confidence per label */
  confidences?(text: string): Promise<Record<EmotionLabel, number>>;
}

/**
 * Coaching instruction oracle
 */
export interface PolicyOracle {
  generate(
    emotion: EmotionLabel,
    level: ProficiencyLevel,
    trend: TrendDirection,
    context: Record<string, string>
  ): Promise<string>;
}

/**
 * Proficiency evaluation oracle. Returns raw text with LEVEL / CONFIDENCE lines.
 */
export interface LevelOracle {
  evaluate(messages: readonly ChatMessage[], levelDescriptions: string): Promise<string>;
}
