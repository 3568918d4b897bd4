/**
 * Core Type Definitions
 *
 * Shared interfaces and types used across the session state and
 * trajectory engine.
 */

/**
 * Closed set of learner emotions, ordered from most to least positive
 */
export const EMOTION_LABELS = ['excited', 'happy', 'neutral', 'frustrated', 'tired', 'sad'] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

export const isEmotionLabel = (value: unknown): value is EmotionLabel => {
  return EMOTION_LABELS.some((label) => label === value);
};

/**
 * Short-window direction of the emotion ordinal. Always derived from a history.
 */
export type TrendDirection = 'improving' | 'stable' | 'declining';

/**
 * Proficiency levels, L1 (emerging awareness) to L5 (structured speech)
 */
export const PROFICIENCY_LEVELS = ['L1', 'L2', 'L3', 'L4', 'L5'] as const;

export type ProficiencyLevel = (typeof PROFICIENCY_LEVELS)[number];

export const isProficiencyLevel = (value: unknown): value is ProficiencyLevel => {
  return PROFICIENCY_LEVELS.some((level) => level === value);
};

export type ChatRole = 'user' | 'assistant';

/**
 * ChatMessage - one immutable chat turn
 */
export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  readonly timestamp: Date;
  readonly emotion?: EmotionLabel;        // Pre-detected emotion, user turns only
  readonly wordsUsed?: readonly string[]; // Target-language tokens in the turn
}

/**
 * ChatSession - read-only input to trajectory generation
 */
export interface ChatSession {
  sessionId: string;
  messages: readonly ChatMessage[];
  startTime: Date;
  endTime?: Date;
  initialLevel: ProficiencyLevel;
  metadata?: Record<string, unknown>;
}

export type StepMetadataValue = string | number | boolean | null;

/**
 * TrajectoryStep - one (State, Action, Reward) step
 */
export interface TrajectoryStep {
  readonly state: string;                 // User message text (S)
  readonly action: string;                // Coaching text chosen for the turn (A)
  readonly reward: EmotionLabel;          // Emotion of the turn (R)
  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, StepMetadataValue>>;
}

/**
 * StudentProfile - aggregate owned by persistent storage
 */
export interface StudentProfile {
  sessionId: string;
  languageLevel: ProficiencyLevel;
  emotionHistory: EmotionLabel[];         // Append-only
  learnedWords: Record<string, number>;   // word -> mastery (0-100)
  sessionCount: number;
  totalInteractionTime: number;           // Minutes
  preferredTopics: string[];
}

/**
 * A vocabulary entry the tutor can introduce
 */
export interface WordKnowledge {
  chinese: string;
  pinyin: string;
  english: string;
  category: string;
  level: ProficiencyLevel;
  examples: string[];
  emoji?: string;
}

/**
 * Trend and intervention signal computed after each emotion append
 */
export interface EmotionSignal {
  trend: TrendDirection;
  needsIntervention: boolean;
}

/**
 * Level estimate with the path that produced it
 */
export interface LevelEstimate {
  level: ProficiencyLevel;
  confidence: number;
  source: 'short-context' | 'oracle' | 'heuristic';
}

/**
 * TrajectoryStatistics - pure summary of a step list
 */
export interface TrajectoryStatistics {
  totalSteps: number;
  emotionDistribution: Record<EmotionLabel, number>;
  emotionCounts: Record<EmotionLabel, number>;
  positiveEmotionRatio: number;
  sessionDurationMinutes: number;
  startTime: string;
  endTime: string;
}
