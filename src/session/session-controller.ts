/**
 * Session Controller
 *
 * Live-session context. Holds one student profile exclusively from open()
 * to end(), keeps its emotion signal and vocabulary mastery current on every
 * turn, and applies the level adoption rule to estimator results. The agent
 * that writes the replies is external and reached through TutorResponder.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ChatMessage,
  EmotionLabel,
  ProficiencyLevel,
  StudentProfile,
  TrendDirection,
  WordKnowledge,
} from '../types';
import { CONFIG } from '../utils/config';
import { InvalidArgumentError } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import type { EmotionOracle, LevelOracle, PolicyOracle } from '../oracles/types';
import { EmotionHistory } from '../emotion/emotion-history';
import { EmotionResolver } from '../emotion/emotion-resolver';
import { LevelEstimator, shouldAdoptLevel } from '../level/level-estimator';
import { MasteryTracker, extractHanWords } from '../mastery/mastery-tracker';
import { WordBank } from '../mastery/word-bank';
import { ActionSelector } from '../policy/action-selector';
import { interventionPolicy } from '../policy/fallback-policy';
import { InMemoryProfileStore, ProfileStore, createProfile } from '../profile/student-profile';
import { SessionLogStore } from './session-log-store';

export const APOLOGY_RESPONSE = "Oops! Something went wrong. Let's try again! 😊";

const MS_PER_MINUTE = 60_000;

export interface TurnState {
  emotion: EmotionLabel;
  trend: TrendDirection;
  needsIntervention: boolean;
  level: ProficiencyLevel;
  levelChanged: boolean;
  policy: string;
  policySource: 'oracle' | 'fallback';
  /** Emotional-support strategy, present when the turn needs intervention */
  intervention?: string;
}

/**
 * The external conversational agent
 */
export interface TutorResponder {
  reply(input: string, turn: TurnState): Promise<string>;
}

export interface SessionSummary {
  sessionId: string;
  durationMinutes: number;
  messageCount: number;
  currentLevel: ProficiencyLevel;
  currentEmotion: EmotionLabel;
  emotionTrend: TrendDirection;
  wordsLearned: number;
  totalSessions: number;
}

export interface SessionControllerOptions {
  sessionId?: string;
  profileStore?: ProfileStore;
  /** Where session logs go on end(); null disables logging */
  logStore?: SessionLogStore | null;
  emotionOracle?: EmotionOracle | null;
  policyOracle?: PolicyOracle | null;
  levelOracle?: LevelOracle | null;
  /** Vocabulary offered by suggestWord; defaults to the built-in list */
  wordBank?: WordBank;
  clock?: () => Date;
  logger?: Logger;
}

export class SessionController {
  private readonly messages: ChatMessage[] = [];
  private readonly history: EmotionHistory;
  private readonly mastery: MasteryTracker;
  private readonly emotions: EmotionResolver;
  private readonly actions: ActionSelector;
  private readonly estimator: LevelEstimator;
  private readonly startedAt: Date;
  private currentEmotion: EmotionLabel = 'neutral';
  private userTurns = 0;
  private ended = false;

  private constructor(
    private readonly profile: StudentProfile,
    private readonly store: ProfileStore,
    private readonly logStore: SessionLogStore | null,
    private readonly wordBank: WordBank,
    private readonly clock: () => Date,
    private readonly logger: Logger,
    oracles: { emotion: EmotionOracle | null; policy: PolicyOracle | null; level: LevelOracle | null }
  ) {
    this.history = new EmotionHistory(profile.emotionHistory);
    this.mastery = new MasteryTracker(profile.learnedWords);
    this.emotions = new EmotionResolver(oracles.emotion, { whenAbsent: 'keyword', logger });
    this.actions = new ActionSelector(oracles.policy, logger);
    this.estimator = new LevelEstimator(oracles.level, logger);
    this.startedAt = clock();
  }

  /**
   * Load the stored profile for the session, or create one, and count the session
   */
  static open(options: SessionControllerOptions = {}): SessionController {
    const sessionId = options.sessionId ?? uuidv4();
    const store = options.profileStore ?? new InMemoryProfileStore();
    const logger = (options.logger ?? createLogger('SessionController')).child(sessionId);

    const profile = store.load(sessionId) ?? createProfile(sessionId);
    profile.sessionCount += 1;
    logger.info(`Session opened (session #${profile.sessionCount}, level ${profile.languageLevel})`);

    return new SessionController(
      profile,
      store,
      options.logStore === undefined ? new SessionLogStore() : options.logStore,
      options.wordBank ?? new WordBank(),
      options.clock ?? (() => new Date()),
      logger,
      {
        emotion: options.emotionOracle ?? null,
        policy: options.policyOracle ?? null,
        level: options.levelOracle ?? null,
      }
    );
  }

  get sessionId(): string {
    return this.profile.sessionId;
  }

  async handleUserTurn(text: string): Promise<TurnState> {
    this.ensureActive();
    const content = text.trim();
    if (!content) {
      throw new InvalidArgumentError('User input cannot be empty');
    }

    const emotion = await this.emotions.resolve(content);
    this.currentEmotion = emotion;
    this.messages.push({
      role: 'user',
      content,
      timestamp: this.clock(),
      emotion,
      wordsUsed: extractHanWords(content),
    });

    const signal = this.history.append(emotion);
    this.userTurns += 1;

    let levelChanged = false;
    if (this.userTurns % CONFIG.levelReview.interval === 0) {
      const estimate = await this.estimator.estimate(this.messages);
      if (shouldAdoptLevel(this.profile.languageLevel, estimate)) {
        this.logger.info(`Language level updated to ${estimate.level}`, estimate);
        this.profile.languageLevel = estimate.level;
        levelChanged = true;
      }
    }

    const { action, source } = await this.actions.select(emotion, this.profile.languageLevel, signal.trend, {
      turn_index: String(this.userTurns - 1),
      previous_emotions: this.history.recent(3).join(', '),
    });

    return {
      emotion,
      trend: signal.trend,
      needsIntervention: signal.needsIntervention,
      level: this.profile.languageLevel,
      levelChanged,
      policy: action,
      policySource: source,
      intervention: signal.needsIntervention ? interventionPolicy(emotion) : undefined,
    };
  }

  /**
   * Record a tutor reply; every Han-script word in it gains assistant-usage mastery
   */
  recordAssistantTurn(text: string): string[] {
    this.ensureActive();
    const words = extractHanWords(text);
    for (const word of words) {
      this.mastery.recordUsage(word, CONFIG.mastery.assistantIncrement);
    }
    this.messages.push({ role: 'assistant', content: text, timestamp: this.clock(), wordsUsed: words });
    return words;
  }

  /**
   * One full turn. Any failure yields the fixed apology and the session continues.
   */
  async respond(text: string, responder: TutorResponder): Promise<string> {
    let reply: string;
    try {
      const turn = await this.handleUserTurn(text);
      reply = await responder.reply(text, turn);
    } catch (error) {
      this.logger.error('Turn failed, sending apology', error);
      reply = APOLOGY_RESPONSE;
    }

    this.recordAssistantTurn(reply);
    return reply;
  }

  masteryOf(word: string): number {
    return this.mastery.masteryOf(word);
  }

  describeMastery(word: string): string {
    return this.mastery.masteryDescription(word);
  }

  /**
   * A word at or below the student's level, from the category when the bank has it
   */
  suggestWord(category?: string): WordKnowledge | undefined {
    return this.wordBank.wordForLevel(this.profile.languageLevel, category);
  }

  transcript(): readonly ChatMessage[] {
    return [...this.messages];
  }

  summary(): SessionSummary {
    return {
      sessionId: this.profile.sessionId,
      durationMinutes: this.durationMinutes(),
      messageCount: this.messages.length,
      currentLevel: this.profile.languageLevel,
      currentEmotion: this.currentEmotion,
      emotionTrend: this.history.current().trend,
      wordsLearned: this.mastery.learnedWords().length,
      totalSessions: this.profile.sessionCount,
    };
  }

  /**
   * Persist the profile and the session log, then return a farewell
   */
  end(): string {
    this.ensureActive();
    this.ended = true;

    this.profile.totalInteractionTime += this.durationMinutes();
    this.store.save(this.profile);
    this.logStore?.save(this.profile.sessionId, this.messages, this.clock());
    this.logger.info('Session ended', this.summary());

    switch (this.currentEmotion) {
      case 'happy':
      case 'excited':
        return 'That was so much fun! See you next time, buddy! 🌟 再见 (zàijiàn)!';
      case 'tired':
      case 'sad':
        return "Rest well, my friend! Tomorrow will be even better! 💤 晚安 (wǎn'ān)!";
      default:
        return "Great job today! Can't wait to play again! 👋 再见 (zàijiàn)!";
    }
  }

  private durationMinutes(): number {
    return (this.clock().getTime() - this.startedAt.getTime()) / MS_PER_MINUTE;
  }

  private ensureActive(): void {
    if (this.ended) {
      throw new InvalidArgumentError(`Session ${this.profile.sessionId} has already ended`);
    }
  }
}
