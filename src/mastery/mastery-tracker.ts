/**
 * Mastery Tracker
 *
 * Per-word bounded progress counter. Values live in [0, 100], only grow
 * through recordUsage, and drop only through an explicit reset.
 */

import { CONFIG } from '../utils/config';
import { InvalidArgumentError } from '../utils/errors';

const HAN_RUN = /[\u4e00-\u9fff]+/g;

/**
 * Maximal runs of Han characters, in order of appearance
 */
export function extractHanWords(text: string): string[] {
  return text.match(HAN_RUN) ?? [];
}

export class MasteryTracker {
  /**
   * @param words - backing map, mutated in place (e.g. a profile's learnedWords)
   */
  constructor(private readonly words: Record<string, number> = {}) {}

  /**
   * Increase mastery for a word, saturating at 100. Unseen words start at the increment.
   */
  recordUsage(word: string, increment: number = CONFIG.mastery.defaultIncrement): number {
    if (!word || word === '__proto__') {
      throw new InvalidArgumentError(`'${word}' cannot be tracked as a word`, { word });
    }
    if (!Number.isInteger(increment) || increment < 0) {
      throw new InvalidArgumentError('Mastery increment must be a non-negative integer', {
        word,
        increment,
      });
    }

    const next = Math.min(CONFIG.mastery.max, this.masteryOf(word) + increment);
    this.words[word] = next;
    return next;
  }

  masteryOf(word: string): number {
    return Object.prototype.hasOwnProperty.call(this.words, word) ? this.words[word] : 0;
  }

  /**
   * One-line summary of how well a word is known
   */
  masteryDescription(word: string): string {
    const mastery = this.masteryOf(word);
    if (mastery >= 80) {
      return `Great mastery of '${word}'! (Level: ${mastery}/100)`;
    }
    if (mastery >= 50) {
      return `Good progress with '${word}'! (Level: ${mastery}/100)`;
    }
    if (mastery > 0) {
      return `Still learning '${word}' (Level: ${mastery}/100)`;
    }
    return `'${word}' is new!`;
  }

  /**
   * Reset one word, or every word when none is given
   */
  reset(word?: string): void {
    if (word === undefined) {
      for (const key of Object.keys(this.words)) {
        delete this.words[key];
      }
      return;
    }
    delete this.words[word];
  }

  /**
   * Words with mastery above zero
   */
  learnedWords(): string[] {
    return Object.keys(this.words).filter((word) => this.words[word] > 0);
  }

  snapshot(): Record<string, number> {
    return { ...this.words };
  }
}
