/**
 * Trajectory Store
 *
 * JSON array persistence for step lists: rewards as labels, timestamps as
 * ISO-8601 strings, metadata as a nested object. Loading validates every step
 * and rejects the whole file on the first problem.
 */

import { z } from 'zod';
import { EMOTION_LABELS, TrajectoryStep } from '../types';
import { CorruptDataError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { readJsonFile, writeJsonAtomic } from '../persistence/file-store';

const logger = createLogger('TrajectoryStore');

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const stepSchema = z.object({
  state: z.string(),
  action: z.string(),
  reward: z.enum(EMOTION_LABELS),
  timestamp: z.string().datetime({ offset: true, message: 'Invalid ISO-8601 timestamp' }),
  metadata: z
    .record(metadataValueSchema)
    .nullish()
    .transform((value) => value ?? {}),
});

const trajectorySchema = z.array(stepSchema);

export interface SerializedStep {
  state: string;
  action: string;
  reward: string;
  timestamp: string;
  metadata: Record<string, string | number | boolean | null>;
}

export function serializeTrajectory(steps: readonly TrajectoryStep[]): SerializedStep[] {
  return steps.map((step) => ({
    state: step.state,
    action: step.action,
    reward: step.reward,
    timestamp: step.timestamp.toISOString(),
    metadata: { ...step.metadata },
  }));
}

export function deserializeTrajectory(data: unknown): TrajectoryStep[] {
  const result = trajectorySchema.safeParse(data);
  if (!result.success) {
    throw new CorruptDataError('Malformed trajectory data', { issues: result.error.issues });
  }

  return result.data.map((step) => ({
    state: step.state,
    action: step.action,
    reward: step.reward,
    timestamp: new Date(step.timestamp),
    metadata: step.metadata,
  }));
}

export class TrajectoryStore {
  save(steps: readonly TrajectoryStep[], destination: string): void {
    writeJsonAtomic(destination, serializeTrajectory(steps));
    logger.info(`Trajectory saved to ${destination}`, { steps: steps.length });
  }

  /**
   * Missing file, invalid JSON, or any invalid step is CorruptDataError
   */
  load(source: string): TrajectoryStep[] {
    const data = readJsonFile(source);
    if (data === null) {
      throw new CorruptDataError(`Trajectory file not found: ${source}`);
    }
    return deserializeTrajectory(data);
  }
}
