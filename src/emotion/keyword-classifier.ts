/**
 * KeywordEmotionClassifier - rule-based emotion detection
 *
 * Local fallback for the emotion oracle. Scores each label by the number of
 * its keywords found in the lowercased text; the highest score wins, ties go
 * to the label listed first, and no hit at all means neutral.
 */

import { EMOTION_LABELS, EmotionLabel } from '../types';
import type { EmotionOracle } from '../oracles/types';

export const EMOTION_KEYWORDS: ReadonlyArray<[EmotionLabel, readonly string[]]> = [
  ['excited', ['wow', 'awesome', 'cool', 'amazing', 'yay', 'fun', 'great', 'love', '!']],
  ['happy', ['happy', 'good', 'nice', 'like', 'yes', 'okay', 'thanks']],
  ['frustrated', ['hard', 'difficult', "can't", "don't know", 'confused', 'no', 'wrong']],
  ['tired', ['tired', 'sleepy', 'boring', 'enough', 'stop', 'later']],
  ['sad', ['sad', 'miss', 'lonely', 'cry', 'hurt']],
];

/**
 * Model label -> closed emotion set
 */
const MODEL_LABEL_MAPPING: ReadonlyArray<[string, EmotionLabel]> = [
  ['joy', 'happy'],
  ['happiness', 'happy'],
  ['positive', 'happy'],
  ['excitement', 'excited'],
  ['surprise', 'excited'],
  ['sadness', 'sad'],
  ['negative', 'sad'],
  ['fear', 'frustrated'],
  ['anger', 'frustrated'],
  ['disgust', 'frustrated'],
  ['neutral', 'neutral'],
  ['love', 'happy'],
];

/**
 * Map a free-form model label onto the closed set, or undefined when nothing matches.
 * A first word that is already a label of the closed set maps to itself.
 */
export function mapModelLabel(label: string): EmotionLabel | undefined {
  const normalized = label.trim().toLowerCase();
  const firstWord = normalized.match(/[a-z]+/)?.[0];

  const exact = EMOTION_LABELS.find((emotion) => emotion === firstWord);
  if (exact) {
    return exact;
  }

  const mapped = MODEL_LABEL_MAPPING.find(([key]) => normalized.includes(key));
  return mapped ? mapped[1] : undefined;
}

export class KeywordEmotionClassifier implements EmotionOracle {
  /**
   * Synchronous detection, used directly as the fallback
   */
  detect(text: string): EmotionLabel {
    const lowerText = text.toLowerCase();

    let best: EmotionLabel = 'neutral';
    let bestScore = 0;

    for (const [emotion, keywords] of EMOTION_KEYWORDS) {
      const score = keywords.filter((keyword) => lowerText.includes(keyword)).length;
      if (score > bestScore) {
        best = emotion;
        bestScore = score;
      }
    }

    return best;
  }

  async classify(text: string): Promise<EmotionLabel> {
    return this.detect(text);
  }

  async confidences(text: string): Promise<Record<EmotionLabel, number>> {
    const detected = this.detect(text);
    return {
      excited: detected === 'excited' ? 1 : 0,
      happy: detected === 'happy' ? 1 : 0,
      neutral: detected === 'neutral' ? 1 : 0,
      frustrated: detected === 'frustrated' ? 1 : 0,
      tired: detected === 'tired' ? 1 : 0,
      sad: detected === 'sad' ? 1 : 0,
    };
  }
}
