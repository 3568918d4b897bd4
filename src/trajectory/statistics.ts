import { EMOTION_LABELS, EmotionLabel, TrajectoryStatistics, TrajectoryStep } from '../types';
import { isPositiveEmotion } from '../emotion/trend';

const MS_PER_MINUTE = 60_000;

function emptyCounts(): Record<EmotionLabel, number> {
  return { excited: 0, happy: 0, neutral: 0, frustrated: 0, tired: 0, sad: 0 };
}

/**
 * Summary of a step list; null when there are no steps
 */
export function getTrajectoryStatistics(steps: readonly TrajectoryStep[]): TrajectoryStatistics | null {
  if (steps.length === 0) {
    return null;
  }

  const emotionCounts = emptyCounts();
  for (const step of steps) {
    emotionCounts[step.reward] += 1;
  }

  const totalSteps = steps.length;
  const emotionDistribution = emptyCounts();
  for (const emotion of EMOTION_LABELS) {
    emotionDistribution[emotion] = emotionCounts[emotion] / totalSteps;
  }

  const positiveCount = EMOTION_LABELS
    .filter(isPositiveEmotion)
    .reduce((sum, emotion) => sum + emotionCounts[emotion], 0);

  const start = steps[0].timestamp;
  const end = steps[steps.length - 1].timestamp;

  return {
    totalSteps,
    emotionDistribution,
    emotionCounts,
    positiveEmotionRatio: positiveCount / totalSteps,
    sessionDurationMinutes: (end.getTime() - start.getTime()) / MS_PER_MINUTE,
    startTime: start.toISOString(),
    endTime: end.toISOString(),
  };
}
