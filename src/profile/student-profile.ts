/**
 * Student Profile Persistence
 *
 * JSON snapshot format:
 *   { session_id, language_level, emotion_history, learned_words,
 *     session_count, total_interaction_time, preferred_topics }
 */

import { z } from 'zod';
import { EMOTION_LABELS, PROFICIENCY_LEVELS, StudentProfile } from '../types';
import { CONFIG, getConfig } from '../utils/config';
import { CorruptDataError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { FileStore } from '../persistence/file-store';

const logger = createLogger('ProfileStore');

const profileSchema = z.object({
  session_id: z.string().min(1),
  language_level: z.enum(PROFICIENCY_LEVELS).default('L1'),
  emotion_history: z.array(z.enum(EMOTION_LABELS)).default([]),
  learned_words: z.record(z.number().int().min(0).max(CONFIG.mastery.max)).default({}),
  session_count: z.number().int().min(0).default(0),
  total_interaction_time: z.number().min(0).default(0),
  preferred_topics: z.array(z.string()).default([]),
});

export type SerializedProfile = z.input<typeof profileSchema>;

export function createProfile(sessionId: string): StudentProfile {
  return {
    sessionId,
    languageLevel: 'L1',
    emotionHistory: [],
    learnedWords: {},
    sessionCount: 0,
    totalInteractionTime: 0,
    preferredTopics: [],
  };
}

/**
 * Snapshot for persistence; keeps only the most recent emotions
 */
export function serializeProfile(
  profile: StudentProfile,
  emotionRetention: number = CONFIG.profile.emotionRetention
): SerializedProfile {
  return {
    session_id: profile.sessionId,
    language_level: profile.languageLevel,
    emotion_history: emotionRetention > 0 ? profile.emotionHistory.slice(-emotionRetention) : [],
    learned_words: { ...profile.learnedWords },
    session_count: profile.sessionCount,
    total_interaction_time: profile.totalInteractionTime,
    preferred_topics: [...profile.preferredTopics],
  };
}

export function deserializeProfile(data: unknown): StudentProfile {
  const result = profileSchema.safeParse(data);
  if (!result.success) {
    throw new CorruptDataError('Malformed profile data', { issues: result.error.issues });
  }

  const parsed = result.data;
  return {
    sessionId: parsed.session_id,
    languageLevel: parsed.language_level,
    emotionHistory: parsed.emotion_history,
    learnedWords: parsed.learned_words,
    sessionCount: parsed.session_count,
    totalInteractionTime: parsed.total_interaction_time,
    preferredTopics: parsed.preferred_topics,
  };
}

/**
 * Storage backend for profiles
 */
export interface ProfileStore {
  load(sessionId: string): StudentProfile | null;
  save(profile: StudentProfile): void;
}

/**
 * One <sessionId>_profile.json per profile, replaced atomically on save
 */
export class FileProfileStore implements ProfileStore {
  private readonly files: FileStore;

  constructor(dir: string = getConfig().storage.dataDir) {
    this.files = new FileStore(dir, '_profile.json');
  }

  load(sessionId: string): StudentProfile | null {
    const data = this.files.read(sessionId);
    if (data === null) {
      return null;
    }

    const profile = deserializeProfile(data);
    if (profile.sessionId !== sessionId) {
      throw new CorruptDataError(`Profile file for '${sessionId}' belongs to '${profile.sessionId}'`);
    }
    return profile;
  }

  save(profile: StudentProfile): void {
    this.files.write(profile.sessionId, serializeProfile(profile));
    logger.info(`Profile saved for ${profile.sessionId}`);
  }

  sessionIds(): string[] {
    return this.files.keys();
  }
}

/**
 * In-memory fallback; stores serialized snapshots so retention applies as on disk
 */
export class InMemoryProfileStore implements ProfileStore {
  private profiles: Map<string, SerializedProfile> = new Map();

  load(sessionId: string): StudentProfile | null {
    const data = this.profiles.get(sessionId);
    return data ? deserializeProfile(data) : null;
  }

  save(profile: StudentProfile): void {
    this.profiles.set(profile.sessionId, serializeProfile(profile));
  }

  clearAll(): void {
    this.profiles.clear();
  }
}
