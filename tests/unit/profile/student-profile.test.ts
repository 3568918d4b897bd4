/**
 * Student profile persistence tests
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  FileProfileStore,
  InMemoryProfileStore,
  createProfile,
  deserializeProfile,
  serializeProfile,
} from '../../../src/profile/student-profile';
import { EmotionLabel, StudentProfile } from '../../../src/types';
import { CorruptDataError, InvalidArgumentError } from '../../../src/utils/errors';
import { makeTempDir, removeDir } from '../../helpers/fixtures';

const sampleProfile = (): StudentProfile => ({
  sessionId: 'kid-1',
  languageLevel: 'L2',
  emotionHistory: ['happy', 'tired'],
  learnedWords: { 猫: 20, 你好: 100 },
  sessionCount: 3,
  totalInteractionTime: 42.5,
  preferredTopics: ['animals'],
});

describe('profile serialization', () => {
  it('creates an empty L1 profile', () => {
    expect(createProfile('new-kid')).toEqual({
      sessionId: 'new-kid',
      languageLevel: 'L1',
      emotionHistory: [],
      learnedWords: {},
      sessionCount: 0,
      totalInteractionTime: 0,
      preferredTopics: [],
    });
  });

  it('uses snake_case keys on disk', () => {
    expect(serializeProfile(sampleProfile())).toEqual({
      session_id: 'kid-1',
      language_level: 'L2',
      emotion_history: ['happy', 'tired'],
      learned_words: { 猫: 20, 你好: 100 },
      session_count: 3,
      total_interaction_time: 42.5,
      preferred_topics: ['animals'],
    });
  });

  it('keeps only the last fifty emotions', () => {
    const history: EmotionLabel[] = Array.from({ length: 60 }, (_, i) => (i < 10 ? 'sad' : 'excited'));
    const serialized = serializeProfile({ ...sampleProfile(), emotionHistory: history });

    expect(serialized.emotion_history).toHaveLength(50);
    expect(serialized.emotion_history).toEqual(history.slice(10));
  });

  it('reads back what it writes', () => {
    expect(deserializeProfile(serializeProfile(sampleProfile()))).toEqual(sampleProfile());
  });

  it('fills defaults for missing fields', () => {
    expect(deserializeProfile({ session_id: 'kid-2' })).toEqual(createProfile('kid-2'));
  });

  it.each([
    ['an unknown level', { session_id: 'k', language_level: 'L9' }],
    ['an unknown emotion', { session_id: 'k', emotion_history: ['angry'] }],
    ['mastery above 100', { session_id: 'k', learned_words: { 猫: 150 } }],
    ['negative mastery', { session_id: 'k', learned_words: { 猫: -5 } }],
    ['a missing session id', { language_level: 'L1' }],
  ])('rejects %s', (_, data) => {
    expect(() => deserializeProfile(data)).toThrow(CorruptDataError);
  });
});

describe('FileProfileStore', () => {
  let dir: string;
  let store: FileProfileStore;

  beforeEach(() => {
    dir = makeTempDir('profiles-');
    store = new FileProfileStore(dir);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('returns null for an unknown session', () => {
    expect(store.load('nobody')).toBeNull();
  });

  it('saves one file per session and loads it back', () => {
    store.save(sampleProfile());

    expect(fs.readdirSync(dir)).toEqual(['kid-1_profile.json']);
    expect(store.load('kid-1')).toEqual(sampleProfile());
  });

  it('writes the snake_case snapshot', () => {
    store.save(sampleProfile());

    const raw = JSON.parse(fs.readFileSync(path.join(dir, 'kid-1_profile.json'), 'utf-8'));
    expect(raw.language_level).toBe('L2');
    expect(raw.total_interaction_time).toBe(42.5);
  });

  it('lists stored session ids', () => {
    store.save(sampleProfile());
    store.save(createProfile('kid-2'));

    expect(store.sessionIds().sort()).toEqual(['kid-1', 'kid-2']);
  });

  it('rejects a corrupt file', () => {
    fs.writeFileSync(path.join(dir, 'kid-1_profile.json'), '{ not json');

    expect(() => store.load('kid-1')).toThrow(CorruptDataError);
  });

  it('refuses session ids that would leave the profile directory', () => {
    const nested = new FileProfileStore(path.join(dir, 'profiles'));

    expect(() => nested.save(createProfile('../escaped'))).toThrow(InvalidArgumentError);
    expect(() => nested.load('../escaped')).toThrow(InvalidArgumentError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('rejects a file that belongs to another session', () => {
    fs.writeFileSync(path.join(dir, 'kid-1_profile.json'), JSON.stringify({ session_id: 'kid-9' }));

    expect(() => store.load('kid-1')).toThrow("Profile file for 'kid-1' belongs to 'kid-9'");
  });
});

describe('InMemoryProfileStore', () => {
  it('stores detached snapshots', () => {
    const store = new InMemoryProfileStore();
    const profile = sampleProfile();

    store.save(profile);
    profile.learnedWords['狗'] = 10;

    expect(store.load('kid-1')?.learnedWords).toEqual({ 猫: 20, 你好: 100 });
  });

  it('forgets everything on clearAll', () => {
    const store = new InMemoryProfileStore();
    store.save(sampleProfile());

    store.clearAll();

    expect(store.load('kid-1')).toBeNull();
  });
});
