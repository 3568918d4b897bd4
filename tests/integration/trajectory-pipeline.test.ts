/**
 * Trajectory Pipeline Integration Test
 *
 * A twelve-turn session replayed end to end: log text -> session -> steps ->
 * statistics -> trajectory file.
 */

import * as path from 'path';
import { TrajectoryBuilder } from '../../src/trajectory/trajectory-builder';
import { TrajectoryStore } from '../../src/trajectory/trajectory-store';
import { getTrajectoryStatistics } from '../../src/trajectory/statistics';
import { formatSessionLog, parseSessionLog } from '../../src/session/session-log';
import { EmotionLabel, TrajectoryStep } from '../../src/types';
import { makeTempDir, minutes, removeDir, sessionWithEmotions } from '../helpers/fixtures';

// positive start, decline, a frustrated ninth turn, then recovery
const EMOTIONS: EmotionLabel[] = [
  'excited',
  'happy',
  'excited',
  'happy',
  'neutral',
  'neutral',
  'tired',
  'sad',
  'frustrated',
  'happy',
  'happy',
  'excited',
];

describe('Trajectory pipeline', () => {
  const session = sessionWithEmotions(EMOTIONS, 'L1', 'kid-42');
  let steps: TrajectoryStep[];

  beforeAll(async () => {
    steps = await new TrajectoryBuilder().build(session);
  });

  it('emits one step per user turn in order', () => {
    expect(steps).toHaveLength(12);
    expect(steps.map((step) => step.reward)).toEqual(EMOTIONS);
    expect(steps.map((step) => step.metadata.message_index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    expect(steps.every((step) => step.metadata.session_id === 'kid-42')).toBe(true);
  });

  it('advances the level once after the fifth turn', () => {
    expect(steps.map((step) => step.metadata.language_level)).toEqual([
      'L1', 'L1', 'L1', 'L1', 'L1',
      'L2', 'L2', 'L2', 'L2', 'L2', 'L2', 'L2',
    ]);
  });

  it('flags the frustrated ninth turn on a declining trend', () => {
    const ninth = steps[8];

    expect(ninth.metadata.emotion_trend).toBe('declining');
    expect(ninth.metadata.needs_intervention).toBe(true);
    expect(ninth.action).toBe('Provide support and easier content. Focus on L2 level content. Emotion trend: declining.');
  });

  it('tracks the recovery', () => {
    expect(steps[9].metadata).toMatchObject({ emotion_trend: 'stable', needs_intervention: false });
    expect(steps[11].metadata).toMatchObject({ emotion_trend: 'improving', needs_intervention: false });
  });

  it('summarises the session', () => {
    expect(getTrajectoryStatistics(steps)).toEqual({
      totalSteps: 12,
      emotionCounts: { excited: 3, happy: 4, neutral: 2, frustrated: 1, tired: 1, sad: 1 },
      emotionDistribution: {
        excited: 3 / 12,
        happy: 4 / 12,
        neutral: 2 / 12,
        frustrated: 1 / 12,
        tired: 1 / 12,
        sad: 1 / 12,
      },
      positiveEmotionRatio: 7 / 12,
      sessionDurationMinutes: 22,
      startTime: minutes(0).toISOString(),
      endTime: minutes(22).toISOString(),
    });
  });

  it('builds the same steps from the session log text', async () => {
    const { session: parsed, warnings } = parseSessionLog(formatSessionLog(session.messages), {
      sessionId: 'kid-42',
      referenceDate: minutes(0),
    });

    expect(warnings).toEqual([]);
    await expect(new TrajectoryBuilder().build(parsed)).resolves.toEqual(steps);
  });

  it('persists and reloads the trajectory', () => {
    const dir = makeTempDir('pipeline-');
    try {
      const file = path.join(dir, 'kid-42_trajectory.json');
      const store = new TrajectoryStore();

      store.save(steps, file);

      expect(store.load(file)).toEqual(steps);
    } finally {
      removeDir(dir);
    }
  });
});
