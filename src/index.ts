/**
 * Adaptive Session State & Trajectory Engine
 */

export * from './types';

export { MasteryTracker, extractHanWords } from './mastery/mastery-tracker';
export { WordBank, parseWordList } from './mastery/word-bank';

export {
  EMOTION_ORDINAL,
  INTERVENTION_EMOTIONS,
  POSITIVE_EMOTIONS,
  calculateTrend,
  evaluateEmotionSignal,
  isPositiveEmotion,
  needsIntervention,
} from './emotion/trend';
export { EmotionHistory } from './emotion/emotion-history';
export { EmotionResolver } from './emotion/emotion-resolver';
export { KeywordEmotionClassifier, mapModelLabel } from './emotion/keyword-classifier';

export {
  LevelEstimator,
  LEVEL_THRESHOLDS,
  classifyByStatistics,
  levelFeedback,
  messageStatistics,
  parseLevelResponse,
  shouldAdoptLevel,
} from './level/level-estimator';
export { reviewLevel, isReviewTurn } from './level/level-review';
export { advanceLevel, clampLevel, compareLevels, isMaxLevel, levelIndex } from './level/proficiency';

export { ActionSelector } from './policy/action-selector';
export { fallbackAction, interventionPolicy } from './policy/fallback-policy';

export type { EmotionOracle, LevelOracle, PolicyOracle } from './oracles/types';
export { GeminiClient } from './oracles/gemini-client';
export {
  GeminiEmotionOracle,
  GeminiLevelOracle,
  GeminiPolicyOracle,
  createGeminiOracles,
} from './oracles/gemini-oracles';

export { TrajectoryBuilder } from './trajectory/trajectory-builder';
export { TrajectoryStore, deserializeTrajectory, serializeTrajectory } from './trajectory/trajectory-store';
export { getTrajectoryStatistics } from './trajectory/statistics';

export {
  FileProfileStore,
  InMemoryProfileStore,
  createProfile,
  deserializeProfile,
  serializeProfile,
} from './profile/student-profile';
export type { ProfileStore } from './profile/student-profile';

export {
  formatSessionLog,
  parseSessionLog,
  readSessionLogFile,
  savedAtFromFileName,
  sessionIdFromFileName,
} from './session/session-log';
export { SessionLogStore } from './session/session-log-store';
export { APOLOGY_RESPONSE, SessionController } from './session/session-controller';
export type { SessionSummary, TurnState, TutorResponder } from './session/session-controller';

export {
  ConfigurationError,
  CorruptDataError,
  InvalidArgumentError,
  OracleUnavailableError,
  TutorError,
} from './utils/errors';
export type { ParseWarning } from './utils/errors';
