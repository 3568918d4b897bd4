/**
 * Level Estimator
 *
 * Estimates proficiency from recent user messages, through the level oracle
 * when one is available and a message-statistics heuristic otherwise.
 * Always returns its best estimate; whether to adopt it is the caller's call.
 */

import { ChatMessage, LevelEstimate, ProficiencyLevel, isProficiencyLevel } from '../types';
import { CONFIG } from '../utils/config';
import { errorMessage } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import { LEVEL_DESCRIPTIONS } from '../oracles/prompts';
import type { LevelOracle } from '../oracles/types';

const HAN_CHARACTER = /[\u4e00-\u9fff]/g;

/**
 * Evaluated top-down, first match wins
 */
export const LEVEL_THRESHOLDS: ReadonlyArray<{ minChars: number; minWords: number; level: ProficiencyLevel }> = [
  { minChars: 8, minWords: 15, level: 'L5' },
  { minChars: 5, minWords: 12, level: 'L4' },
  { minChars: 3, minWords: 10, level: 'L3' },
  { minChars: 1, minWords: 7, level: 'L2' },
];

export interface MessageStatistics {
  messageCount: number;
  hanCharacters: number;
  words: number;
  avgCharsPerMessage: number;
  avgWordsPerMessage: number;
}

export function countHanCharacters(text: string): number {
  return text.match(HAN_CHARACTER)?.length ?? 0;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function messageStatistics(messages: readonly ChatMessage[]): MessageStatistics {
  const hanCharacters = messages.reduce((sum, m) => sum + countHanCharacters(m.content), 0);
  const words = messages.reduce((sum, m) => sum + countWords(m.content), 0);
  const count = messages.length;

  return {
    messageCount: count,
    hanCharacters,
    words,
    avgCharsPerMessage: count > 0 ? hanCharacters / count : 0,
    avgWordsPerMessage: count > 0 ? words / count : 0,
  };
}

export function classifyByStatistics(avgChars: number, avgWords: number): ProficiencyLevel {
  const match = LEVEL_THRESHOLDS.find((row) => avgChars >= row.minChars && avgWords >= row.minWords);
  return match ? match.level : 'L1';
}

/**
 * Reads LEVEL and CONFIDENCE lines from oracle text.
 * Null unless both are present and valid (confidence within [0, 1]).
 */
export function parseLevelResponse(text: string): { level: ProficiencyLevel; confidence: number } | null {
  let level: ProficiencyLevel | undefined;
  let confidence: number | undefined;

  for (const raw of text.split('\n')) {
    const line = raw.trim();

    const levelMatch = line.match(/^LEVEL:\s*\[?\s*([^\]\s]+)\s*\]?/);
    if (levelMatch) {
      const value = levelMatch[1].toUpperCase();
      level = isProficiencyLevel(value) ? value : undefined;
      continue;
    }

    const confidenceMatch = line.match(/^CONFIDENCE:\s*\[?\s*([^\]\s]+)\s*\]?/);
    if (confidenceMatch) {
      const value = Number(confidenceMatch[1]);
      confidence = Number.isFinite(value) && value >= 0 && value <= 1 ? value : undefined;
    }
  }

  if (level === undefined || confidence === undefined) {
    return null;
  }
  return { level, confidence };
}

export class LevelEstimator {
  private readonly logger: Logger;

  constructor(private readonly oracle: LevelOracle | null = null, logger?: Logger) {
    this.logger = logger ?? createLogger('LevelEstimator');
  }

  async estimate(messages: readonly ChatMessage[]): Promise<LevelEstimate> {
    const { minMessages, shortContextConfidence, messageWindow } = CONFIG.levelEstimation;

    if (messages.length < minMessages) {
      return { level: 'L1', confidence: shortContextConfidence, source: 'short-context' };
    }

    const userMessages = messages.slice(-messageWindow).filter((m) => m.role === 'user');
    if (userMessages.length === 0) {
      return { level: 'L1', confidence: shortContextConfidence, source: 'short-context' };
    }

    if (this.oracle) {
      try {
        const response = await this.oracle.evaluate(userMessages, LEVEL_DESCRIPTIONS);
        const parsed = parseLevelResponse(response);
        if (parsed) {
          return { ...parsed, source: 'oracle' };
        }
        this.logger.warn('Level oracle response unparseable, using heuristic', { response });
      } catch (error) {
        this.logger.warn('Level oracle unavailable, using heuristic', { error: errorMessage(error) });
      }
    }

    return this.estimateHeuristically(userMessages);
  }

  /**
   * Threshold-table classification over user messages only
   */
  estimateHeuristically(messages: readonly ChatMessage[]): LevelEstimate {
    const stats = messageStatistics(messages.filter((m) => m.role === 'user'));
    return {
      level: classifyByStatistics(stats.avgCharsPerMessage, stats.avgWordsPerMessage),
      confidence: CONFIG.levelEstimation.heuristicConfidence,
      source: 'heuristic',
    };
  }
}

/**
 * The caller's adoption rule: a strictly confident, different estimate
 */
export function shouldAdoptLevel(current: ProficiencyLevel, estimate: LevelEstimate): boolean {
  return estimate.confidence > CONFIG.levelEstimation.adoptionConfidence && estimate.level !== current;
}

const LEVEL_FEEDBACK: Readonly<Record<ProficiencyLevel, string>> = {
  L1: 'Just starting the Chinese journey! Focus on single words and sounds.',
  L2: 'Making progress! Starting to use simple phrases.',
  L3: 'Great improvement! Building complete sentences.',
  L4: 'Excellent progress! Engaging in real conversations.',
  L5: 'Advanced level! Complex communication skills demonstrated.',
};

export function levelFeedback(level: ProficiencyLevel): string {
  return LEVEL_FEEDBACK[level];
}
