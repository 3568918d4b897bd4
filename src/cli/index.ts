#!/usr/bin/env node

/**
 * Trajectory CLI - Entry Point
 *
 *   trajectory <session.log> [--out <file>] [--level L1..L5]
 *   stats <trajectory.json>
 */

import 'dotenv/config';
import chalk from 'chalk';
import { isProficiencyLevel } from '../types';
import { getConfig, validateConfig } from '../utils/config';
import { handleError } from '../utils/errors';
import { createGeminiOracles } from '../oracles/gemini-oracles';
import { readSessionLogFile } from '../session/session-log';
import { TrajectoryBuilder } from '../trajectory/trajectory-builder';
import { TrajectoryStore } from '../trajectory/trajectory-store';
import { getTrajectoryStatistics } from '../trajectory/statistics';
import { displayStatistics, displaySteps } from './display/trajectory';

const USAGE = `Usage:
  trajectory <session.log> [--out <file>] [--level L1..L5]
  stats <trajectory.json>`;

function option(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

async function runTrajectory(args: string[]): Promise<void> {
  const logPath = args[0];
  if (!logPath) {
    throw new Error(USAGE);
  }

  const level = option(args, '--level') ?? 'L1';
  if (!isProficiencyLevel(level)) {
    throw new Error(`Unknown level '${level}'`);
  }

  const { session, warnings } = readSessionLogFile(logPath, { initialLevel: level });
  if (warnings.length > 0) {
    console.log(chalk.yellow(`⚠ ${warnings.length} malformed line(s) skipped`));
  }

  const oracles = createGeminiOracles();
  console.log(chalk.gray(oracles ? 'Using Gemini oracles' : 'No GEMINI_API_KEY, using local fallbacks'));

  const builder = new TrajectoryBuilder({
    emotionOracle: oracles?.emotion ?? null,
    policyOracle: oracles?.policy ?? null,
  });
  const steps = await builder.build(session);

  console.log(chalk.cyan.bold(`\n🧭 Session ${session.sessionId}: ${steps.length} step(s)\n`));
  displaySteps(steps);

  const stats = getTrajectoryStatistics(steps);
  if (stats) {
    displayStatistics(stats);
  }

  const out = option(args, '--out');
  if (out) {
    new TrajectoryStore().save(steps, out);
    console.log(chalk.green(`\n✔ Trajectory written to ${out}`));
  }
}

function runStats(args: string[]): void {
  const source = args[0];
  if (!source) {
    throw new Error(USAGE);
  }

  const stats = getTrajectoryStatistics(new TrajectoryStore().load(source));
  if (!stats) {
    console.log(chalk.yellow('Trajectory is empty'));
    return;
  }
  displayStatistics(stats);
}

/**
 * Main CLI entry point. `.env` is loaded by the first import, before any
 * module reads its configuration.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  validateConfig(getConfig());

  const [command, ...args] = argv;

  try {
    switch (command) {
      case 'trajectory':
        await runTrajectory(args);
        break;
      case 'stats':
        runStats(args);
        break;
      default:
        console.log(USAGE);
        process.exitCode = command ? 1 : 0;
        return;
    }
  } catch (error) {
    const normalized = handleError(error);
    console.error(chalk.red(`\n❌ ${normalized.message}`));
    if (normalized.details) {
      console.error(chalk.gray(JSON.stringify(normalized.details, null, 2)));
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error(chalk.red('\n❌ Unhandled Rejection:'), reason);
    process.exit(1);
  });

  main().catch((error: unknown) => {
    console.error(chalk.red('\n❌ CLI error:'), error);
    process.exit(1);
  });
}
