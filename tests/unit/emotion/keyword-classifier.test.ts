import { KeywordEmotionClassifier, mapModelLabel } from '../../../src/emotion/keyword-classifier';
import { EmotionLabel } from '../../../src/types';

describe('KeywordEmotionClassifier', () => {
  const classifier = new KeywordEmotionClassifier();

  it.each<[string, EmotionLabel]>([
    ['Wow this is so cool!', 'excited'],
    ['I am happy, thanks', 'happy'],
    ['This is hard and I am confused', 'frustrated'],
    ['I am so tired and sleepy', 'tired'],
    ['I miss my mom, I feel sad', 'sad'],
    ['The sky is blue', 'neutral'],
  ])('classifies "%s" as %s', (text, expected) => {
    expect(classifier.detect(text)).toBe(expected);
  });

  it('ignores case', () => {
    expect(classifier.detect('AWESOME')).toBe('excited');
  });

  it('breaks ties in favour of the label listed first', () => {
    // one excited keyword (yay) against one frustrated keyword (hard)
    expect(classifier.detect('yay, but it is hard')).toBe('excited');
  });

  it('classifies asynchronously like the oracle it stands in for', async () => {
    await expect(classifier.classify('I feel lonely')).resolves.toBe('sad');
  });

  it('reports full confidence for the detected label only', async () => {
    await expect(classifier.confidences('so sleepy')).resolves.toEqual({
      excited: 0,
      happy: 0,
      neutral: 0,
      frustrated: 0,
      tired: 1,
      sad: 0,
    });
  });
});

describe('mapModelLabel', () => {
  it.each<[string, EmotionLabel]>([
    ['happy', 'happy'],
    ['Happy.', 'happy'],
    [' FRUSTRATED ', 'frustrated'],
    ['joy', 'happy'],
    ['surprise', 'excited'],
    ['Anger detected', 'frustrated'],
    ['Overall: sadness', 'sad'],
  ])('maps "%s" to %s', (label, expected) => {
    expect(mapModelLabel(label)).toBe(expected);
  });

  it('returns undefined for labels outside the set', () => {
    expect(mapModelLabel('banana')).toBeUndefined();
    expect(mapModelLabel('')).toBeUndefined();
  });
});
