/**
 * Trajectory Builder
 *
 * Replays a chat session's user turns in chronological order and emits one
 * (State, Action, Reward) step per processed turn. Trend and intervention are
 * computed per step from the emotions seen so far; the level is reviewed
 * after every fifth processed turn.
 */

import {
  ChatMessage,
  ChatSession,
  EmotionLabel,
  TrajectoryStep,
  isEmotionLabel,
} from '../types';
import { InvalidArgumentError } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import type { EmotionOracle, PolicyOracle } from '../oracles/types';
import { EmotionResolver } from '../emotion/emotion-resolver';
import { evaluateEmotionSignal } from '../emotion/trend';
import { isReviewTurn, reviewLevel } from '../level/level-review';
import { ActionSelector } from '../policy/action-selector';
import { readSessionLogFile } from '../session/session-log';

export interface TrajectoryBuilderOptions {
  emotionOracle?: EmotionOracle | null;
  policyOracle?: PolicyOracle | null;
  logger?: Logger;
}

function assertWellFormed(message: ChatMessage, index: number): void {
  if (typeof message.content !== 'string' || message.content.trim().length === 0) {
    throw new InvalidArgumentError(`User turn ${index} has no text`);
  }
  if (!(message.timestamp instanceof Date) || Number.isNaN(message.timestamp.getTime())) {
    throw new InvalidArgumentError(`User turn ${index} has an invalid timestamp`);
  }
  if (message.emotion !== undefined && !isEmotionLabel(message.emotion)) {
    throw new InvalidArgumentError(`User turn ${index} has an unknown emotion label`, {
      emotion: message.emotion,
    });
  }
}

export class TrajectoryBuilder {
  private readonly emotions: EmotionResolver;
  private readonly actions: ActionSelector;
  private readonly logger: Logger;

  constructor(options: TrajectoryBuilderOptions = {}) {
    this.logger = options.logger ?? createLogger('TrajectoryBuilder');
    this.emotions = new EmotionResolver(options.emotionOracle ?? null, {
      whenAbsent: 'neutral',
      logger: this.logger,
    });
    this.actions = new ActionSelector(options.policyOracle ?? null, this.logger);
  }

  async build(session: ChatSession): Promise<TrajectoryStep[]> {
    const userTurns = session.messages.filter((message) => message.role === 'user');
    const steps: TrajectoryStep[] = [];
    const history: EmotionLabel[] = [];
    let level = session.initialLevel;
    let processed = 0;

    for (const [index, message] of userTurns.entries()) {
      try {
        assertWellFormed(message, index);

        const reward = await this.emotions.resolve(message.content, message.emotion);
        const seen = [...history, reward];
        const signal = evaluateEmotionSignal(seen);

        const { action } = await this.actions.select(reward, level, signal.trend, {
          turn_index: String(index),
          session_progress: `${index + 1}/${userTurns.length}`,
          previous_emotions: seen.slice(-3).join(', '),
        });

        steps.push({
          state: message.content,
          action,
          reward,
          timestamp: message.timestamp,
          metadata: {
            message_index: index,
            language_level: level,
            emotion_trend: signal.trend,
            needs_intervention: signal.needsIntervention,
            session_id: session.sessionId,
          },
        });

        // The turn is committed only once its step exists
        history.push(reward);
        processed += 1;

        if (isReviewTurn(processed)) {
          const reviewed = reviewLevel(history, level);
          if (reviewed !== level) {
            this.logger.info(`Level advanced ${level} -> ${reviewed}`, {
              sessionId: session.sessionId,
              turn: processed,
            });
          }
          level = reviewed;
        }
      } catch (error) {
        this.logger.error(`Skipping user turn ${index}`, error, { sessionId: session.sessionId });
      }
    }

    return steps;
  }

  /**
   * Parse a session log file and build its trajectory. An unreadable file yields no steps.
   */
  async buildFromLog(logPath: string): Promise<TrajectoryStep[]> {
    let session: ChatSession;
    try {
      session = readSessionLogFile(logPath).session;
    } catch (error) {
      this.logger.error(`Could not read session log ${logPath}`, error);
      return [];
    }
    return this.build(session);
  }
}
