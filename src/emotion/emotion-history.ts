/**
 * Emotion History
 *
 * Append-only emotion sequence that keeps its trend and intervention
 * signal current.
 */

import { CONFIG } from '../utils/config';
import { EmotionLabel, EmotionSignal } from '../types';
import { evaluateEmotionSignal } from './trend';

export class EmotionHistory {
  private signal: EmotionSignal;

  /**
   * @param entries - backing sequence, appended in place (e.g. a profile's emotionHistory)
   */
  constructor(private readonly entries: EmotionLabel[] = []) {
    this.signal = evaluateEmotionSignal(entries);
  }

  append(emotion: EmotionLabel): EmotionSignal {
    this.entries.push(emotion);
    this.signal = evaluateEmotionSignal(this.entries);
    return this.signal;
  }

  current(): EmotionSignal {
    return this.signal;
  }

  latest(): EmotionLabel | undefined {
    return this.entries[this.entries.length - 1];
  }

  recent(count: number): EmotionLabel[] {
    return count > 0 ? this.entries.slice(-count) : [];
  }

  /**
   * Entries kept when the owning profile is persisted
   */
  retained(limit: number = CONFIG.profile.emotionRetention): EmotionLabel[] {
    return this.recent(limit);
  }

  size(): number {
    return this.entries.length;
  }

  toArray(): EmotionLabel[] {
    return [...this.entries];
  }
}
