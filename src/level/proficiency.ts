import { PROFICIENCY_LEVELS, ProficiencyLevel } from '../types';

/**
 * Position of a level in L1..L5 (0-based)
 */
export function levelIndex(level: ProficiencyLevel): number {
  return PROFICIENCY_LEVELS.indexOf(level);
}

/**
 * Negative when a < b, zero when equal, positive when a > b
 */
export function compareLevels(a: ProficiencyLevel, b: ProficiencyLevel): number {
  return levelIndex(a) - levelIndex(b);
}

/**
 * Level at the given index, clamped to L1..L5
 */
export function clampLevel(index: number): ProficiencyLevel {
  const clamped = Math.max(0, Math.min(PROFICIENCY_LEVELS.length - 1, Math.trunc(index)));
  return PROFICIENCY_LEVELS[clamped];
}

export function advanceLevel(level: ProficiencyLevel): ProficiencyLevel {
  return clampLevel(levelIndex(level) + 1);
}

export function isMaxLevel(level: ProficiencyLevel): boolean {
  return levelIndex(level) === PROFICIENCY_LEVELS.length - 1;
}
