/**
 * Trajectory Store Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  TrajectoryStore,
  deserializeTrajectory,
  serializeTrajectory,
} from '../../../src/trajectory/trajectory-store';
import { TrajectoryStep } from '../../../src/types';
import { CorruptDataError } from '../../../src/utils/errors';
import { makeTempDir, removeDir } from '../../helpers/fixtures';

const steps: TrajectoryStep[] = [
  {
    state: 'Hi! 你好',
    action: 'Spark interest with interactive content. Focus on L1 level content. Emotion trend: stable.',
    reward: 'neutral',
    timestamp: new Date('2025-08-29T10:00:00.000Z'),
    metadata: {
      message_index: 0,
      language_level: 'L1',
      emotion_trend: 'stable',
      needs_intervention: false,
      session_id: 'kid-1',
    },
  },
  {
    state: 'This is hard',
    action: 'Provide support and easier content. Focus on L1 level content. Emotion trend: declining.',
    reward: 'frustrated',
    timestamp: new Date('2025-08-29T10:02:00.000Z'),
    metadata: {
      message_index: 1,
      language_level: 'L1',
      emotion_trend: 'declining',
      needs_intervention: true,
      session_id: 'kid-1',
    },
  },
];

const validRecord = {
  state: 's',
  action: 'a',
  reward: 'happy',
  timestamp: '2025-08-29T10:00:00.000Z',
  metadata: { message_index: 0 },
};

describe('trajectory serialization', () => {
  it('writes rewards as labels and timestamps as ISO strings', () => {
    const [first] = serializeTrajectory(steps);

    expect(first.reward).toBe('neutral');
    expect(first.timestamp).toBe('2025-08-29T10:00:00.000Z');
    expect(first.metadata).toEqual(steps[0].metadata);
  });

  it('reads back what it writes', () => {
    expect(deserializeTrajectory(serializeTrajectory(steps))).toEqual(steps);
  });

  it('defaults missing or null metadata to an empty object', () => {
    const withoutMetadata = { state: 's', action: 'a', reward: 'happy', timestamp: '2025-08-29T10:00:00.000Z' };

    expect(deserializeTrajectory([withoutMetadata])[0].metadata).toEqual({});
    expect(deserializeTrajectory([{ ...validRecord, metadata: null }])[0].metadata).toEqual({});
  });

  it.each([
    ['an unknown reward label', [{ ...validRecord, reward: 'angry' }]],
    ['an invalid timestamp', [{ ...validRecord, timestamp: 'yesterday' }]],
    ['a bare number as timestamp', [{ ...validRecord, timestamp: '0' }]],
    ['a date without a time', [{ ...validRecord, timestamp: '2025-08-29' }]],
    ['a locale date string', [{ ...validRecord, timestamp: 'Fri Aug 29 2025 10:00:00 GMT+0000' }]],
    ['a missing state', [{ ...validRecord, state: undefined }]],
    ['a nested metadata value', [{ ...validRecord, metadata: { nested: { a: 1 } } }]],
    ['a non-array document', { steps: [validRecord] }],
  ])('rejects %s', (_, data) => {
    expect(() => deserializeTrajectory(data)).toThrow(CorruptDataError);
  });

  it('accepts timestamps with an explicit offset', () => {
    const [step] = deserializeTrajectory([{ ...validRecord, timestamp: '2025-08-29T12:00:00+02:00' }]);

    expect(step.timestamp).toEqual(new Date('2025-08-29T10:00:00.000Z'));
  });

  it('rejects the whole file when any one step is invalid', () => {
    expect(() => deserializeTrajectory([validRecord, { ...validRecord, reward: 'angry' }])).toThrow(
      'Malformed trajectory data'
    );
  });
});

describe('TrajectoryStore', () => {
  let dir: string;
  const store = new TrajectoryStore();

  beforeEach(() => {
    dir = makeTempDir('trajectory-');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('saves and loads a trajectory', () => {
    const file = path.join(dir, 'trajectory.json');

    store.save(steps, file);

    expect(store.load(file)).toEqual(steps);
  });

  it('writes a JSON array and leaves no temp files behind', () => {
    const file = path.join(dir, 'nested', 'trajectory.json');

    store.save(steps, file);

    expect(fs.readdirSync(path.dirname(file))).toEqual(['trajectory.json']);
    const raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(Array.isArray(raw)).toBe(true);
    expect(raw[1]).toEqual({
      state: 'This is hard',
      action: steps[1].action,
      reward: 'frustrated',
      timestamp: '2025-08-29T10:02:00.000Z',
      metadata: steps[1].metadata,
    });
  });

  it('replaces an existing file whole', () => {
    const file = path.join(dir, 'trajectory.json');

    store.save(steps, file);
    store.save([steps[0]], file);

    expect(store.load(file)).toEqual([steps[0]]);
  });

  it('saves an empty trajectory', () => {
    const file = path.join(dir, 'empty.json');

    store.save([], file);

    expect(store.load(file)).toEqual([]);
  });

  it('reports a missing file as corrupt data', () => {
    expect(() => store.load(path.join(dir, 'missing.json'))).toThrow(CorruptDataError);
  });

  it('reports invalid JSON as corrupt data', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '[{"state": ');

    expect(() => store.load(file)).toThrow(CorruptDataError);
  });
});
