/**
 * CLI - Trajectory Display
 */

import chalk from 'chalk';
import { EMOTION_LABELS, EmotionLabel, TrajectoryStatistics, TrajectoryStep } from '../../types';

const EMOTION_EMOJI: Record<EmotionLabel, string> = {
  excited: '🤩',
  happy: '😊',
  neutral: '😐',
  frustrated: '😣',
  tired: '😴',
  sad: '😔',
};

/**
 * Create ASCII progress bar for a ratio in [0, 1]
 */
export function createProgressBar(ratio: number, width: number): string {
  const clamped = Math.max(0, Math.min(1, ratio));
  const filledWidth = Math.round(clamped * width);
  return '█'.repeat(filledWidth) + '░'.repeat(width - filledWidth);
}

function emotionColor(emotion: EmotionLabel): chalk.Chalk {
  switch (emotion) {
    case 'excited':
    case 'happy':
      return chalk.green;
    case 'neutral':
      return chalk.white;
    case 'frustrated':
      return chalk.red;
    default:
      return chalk.yellow;
  }
}

export function displaySteps(steps: readonly TrajectoryStep[]): void {
  steps.forEach((step, i) => {
    const color = emotionColor(step.reward);
    const flag = step.metadata.needs_intervention === true ? chalk.red(' ⚠ intervention') : '';

    console.log(
      chalk.gray(`#${String(i + 1).padStart(3)} `) +
        `${EMOTION_EMOJI[step.reward]} ${color(step.reward.padEnd(10))}` +
        chalk.cyan(` ${String(step.metadata.language_level)} `) +
        chalk.gray(`(${String(step.metadata.emotion_trend)})`) +
        flag
    );
    console.log(`     ${chalk.white('S:')} ${step.state}`);
    console.log(`     ${chalk.white('A:')} ${chalk.gray(step.action)}`);
  });
}

export function displayStatistics(stats: TrajectoryStatistics): void {
  console.log(chalk.gray('\n┌' + '─'.repeat(68) + '┐'));
  console.log(chalk.bold('  📈 Trajectory Statistics:\n'));
  console.log(`   ${chalk.white('Steps:')}     ${stats.totalSteps}`);
  console.log(`   ${chalk.white('Duration:')}  ${stats.sessionDurationMinutes.toFixed(1)} min`);
  console.log(`   ${chalk.white('Positive:')}  ${(stats.positiveEmotionRatio * 100).toFixed(0)}%\n`);

  for (const emotion of EMOTION_LABELS) {
    const ratio = stats.emotionDistribution[emotion];
    console.log(
      `   ${EMOTION_EMOJI[emotion]} ${emotion.padEnd(10)} ${emotionColor(emotion)(createProgressBar(ratio, 20))} ` +
        chalk.gray(`${stats.emotionCounts[emotion]}`)
    );
  }

  console.log(chalk.gray('\n└' + '─'.repeat(68) + '┘'));
}
