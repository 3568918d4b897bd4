/**
 * Word Bank
 *
 * Vocabulary the tutor can introduce, grouped by category and gated by level.
 * The default list ships as data/default-words.json; a custom list can be
 * loaded from any JSON file of the same shape.
 */

import { z } from 'zod';
import { PROFICIENCY_LEVELS, ProficiencyLevel, WordKnowledge } from '../types';
import { CorruptDataError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { readJsonFile } from '../persistence/file-store';
import { levelIndex } from '../level/proficiency';
import defaultWordData from '../data/default-words.json';

const logger = createLogger('WordBank');

const wordSchema = z.object({
  chinese: z.string().min(1),
  pinyin: z.string(),
  english: z.string(),
  category: z.string().min(1),
  level: z.enum(PROFICIENCY_LEVELS),
  examples: z.array(z.string()).default([]),
  emoji: z.string().optional(),
});

const wordListSchema = z.array(wordSchema);

export function parseWordList(data: unknown, source = 'word list'): WordKnowledge[] {
  const result = wordListSchema.safeParse(data);
  if (!result.success) {
    throw new CorruptDataError(`Malformed ${source}`, { issues: result.error.issues });
  }
  return result.data;
}

export class WordBank {
  private readonly words: readonly WordKnowledge[];

  constructor(
    words: readonly WordKnowledge[] = parseWordList(defaultWordData, 'default word list'),
    private readonly random: () => number = Math.random
  ) {
    this.words = words.map((word) => ({ ...word, examples: [...word.examples] }));
  }

  /**
   * Missing file gives the default list; anything unreadable is CorruptDataError
   */
  static fromFile(filePath: string, random?: () => number): WordBank {
    const data = readJsonFile(filePath);
    if (data === null) {
      logger.warn(`Word list not found at ${filePath}, using defaults`);
      return new WordBank(undefined, random);
    }
    return new WordBank(parseWordList(data, filePath), random);
  }

  get size(): number {
    return this.words.length;
  }

  /** Categories in first-seen order */
  categories(): string[] {
    return [...new Set(this.words.map((word) => word.category))];
  }

  randomCategory(): string | undefined {
    return this.pick(this.categories());
  }

  lookup(chinese: string): WordKnowledge | undefined {
    return this.words.find((word) => word.chinese === chinese);
  }

  /**
   * A random word at or below the level. An unknown category is ignored.
   */
  wordForLevel(level: ProficiencyLevel, category?: string): WordKnowledge | undefined {
    const ceiling = levelIndex(level);
    const known = category !== undefined && this.words.some((word) => word.category === category);

    const candidates = this.words.filter(
      (word) => levelIndex(word.level) <= ceiling && (!known || word.category === category)
    );
    return this.pick(candidates);
  }

  describe(word: WordKnowledge): string {
    const emoji = word.emoji ? ` ${word.emoji}` : '';
    return `Word: ${word.chinese} (${word.pinyin}) - ${word.english}${emoji}`;
  }

  private pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) {
      return undefined;
    }
    const index = Math.min(items.length - 1, Math.floor(this.random() * items.length));
    return items[index];
  }
}
