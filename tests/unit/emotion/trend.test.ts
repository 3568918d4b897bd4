/**
 * Emotion trend and intervention tests
 */

import {
  EMOTION_ORDINAL,
  calculateTrend,
  evaluateEmotionSignal,
  isPositiveEmotion,
  needsIntervention,
} from '../../../src/emotion/trend';
import { EmotionLabel } from '../../../src/types';

describe('calculateTrend', () => {
  it('is stable with fewer than three entries', () => {
    expect(calculateTrend([])).toBe('stable');
    expect(calculateTrend(['sad'])).toBe('stable');
    expect(calculateTrend(['excited', 'sad'])).toBe('stable');
  });

  it('detects an improving run', () => {
    // recent [sad, excited, excited] averages 3.33 against older [sad, sad] at 0
    expect(calculateTrend(['sad', 'sad', 'sad', 'excited', 'excited'])).toBe('improving');
  });

  it('detects a declining run', () => {
    // recent [happy, neutral, tired] averages 2.67 against older [excited, excited] at 5
    expect(calculateTrend(['excited', 'excited', 'happy', 'neutral', 'tired'])).toBe('declining');
  });

  it('compares against the first entry when there are exactly three', () => {
    expect(calculateTrend(['sad', 'happy', 'happy'])).toBe('improving');
    expect(calculateTrend(['happy', 'happy', 'sad'])).toBe('declining');
  });

  it('uses a single older entry with four entries', () => {
    // recent [neutral x3] = 3 against older [excited] = 5
    expect(calculateTrend(['excited', 'neutral', 'neutral', 'neutral'])).toBe('declining');
  });

  it('only looks at the last five entries', () => {
    const history: EmotionLabel[] = ['sad', 'sad', 'sad', 'neutral', 'neutral', 'neutral', 'neutral', 'neutral'];
    expect(calculateTrend(history)).toBe('stable');
  });

  it('treats a difference of exactly the threshold as stable', () => {
    // recent [excited, happy, neutral] = 4, older [excited, happy] = 4.5
    expect(calculateTrend(['excited', 'happy', 'excited', 'happy', 'neutral'])).toBe('stable');
  });

  it('orders emotions from sad to excited', () => {
    expect(EMOTION_ORDINAL.sad).toBeLessThan(EMOTION_ORDINAL.tired);
    expect(EMOTION_ORDINAL.tired).toBeLessThan(EMOTION_ORDINAL.frustrated);
    expect(EMOTION_ORDINAL.frustrated).toBeLessThan(EMOTION_ORDINAL.neutral);
    expect(EMOTION_ORDINAL.neutral).toBeLessThan(EMOTION_ORDINAL.happy);
    expect(EMOTION_ORDINAL.happy).toBeLessThan(EMOTION_ORDINAL.excited);
  });
});

describe('needsIntervention', () => {
  it.each<EmotionLabel>(['frustrated', 'sad', 'tired'])('flags a current %s emotion', (emotion) => {
    expect(needsIntervention(emotion, 'stable')).toBe(true);
  });

  it.each<EmotionLabel>(['excited', 'happy', 'neutral'])('does not flag a stable %s emotion', (emotion) => {
    expect(needsIntervention(emotion, 'stable')).toBe(false);
    expect(needsIntervention(emotion, 'improving')).toBe(false);
  });

  it('flags any emotion on a declining trend', () => {
    expect(needsIntervention('happy', 'declining')).toBe(true);
  });

  it('does not flag an empty history', () => {
    expect(needsIntervention(undefined, 'stable')).toBe(false);
  });
});

describe('evaluateEmotionSignal', () => {
  it('flags a tired student even when the trend is stable', () => {
    expect(evaluateEmotionSignal(['sad', 'sad', 'sad', 'tired'])).toEqual({
      trend: 'stable',
      needsIntervention: true,
    });
  });

  it('flags a neutral student on a declining trend', () => {
    expect(evaluateEmotionSignal(['excited', 'excited', 'excited', 'happy', 'neutral'])).toEqual({
      trend: 'declining',
      needsIntervention: true,
    });
  });

  it('leaves a steadily happy student alone', () => {
    expect(evaluateEmotionSignal(['happy', 'happy', 'happy'])).toEqual({
      trend: 'stable',
      needsIntervention: false,
    });
  });
});

describe('isPositiveEmotion', () => {
  it('counts only excited and happy', () => {
    expect(isPositiveEmotion('excited')).toBe(true);
    expect(isPositiveEmotion('happy')).toBe(true);
    expect(isPositiveEmotion('neutral')).toBe(false);
    expect(isPositiveEmotion('sad')).toBe(false);
  });
});
