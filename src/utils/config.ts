/**
 * Tutor Configuration
 *
 * Central configuration for all thresholds, constants, and settings.
 */

import { ConfigurationError } from './errors';

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Emotion Trend Calculation
   *
   * Ordinals are used only for trend arithmetic. Changing them changes
   * every stored trajectory's trend labels.
   */
  trend: {
    window: 5,               // Entries considered (most recent)
    recentSize: 3,           // Entries in the "recent" slice
    threshold: 0.5,          // Average difference needed to leave "stable"
    minHistory: 3,           // Below this the trend is always stable
  },

  /**
   * Level Advancement (trajectory replay)
   */
  levelReview: {
    interval: 5,             // Review after every Nth processed user turn
    window: 5,               // Emotions looked at during a review
    minPositive: 4,          // Positive emotions needed to advance one level
  },

  /**
   * Level Estimation
   */
  levelEstimation: {
    minMessages: 3,          // Fewer messages short-circuit to L1
    shortContextConfidence: 0.5,
    heuristicConfidence: 0.7,
    adoptionConfidence: 0.7, // Caller adopts a new level only above this
    messageWindow: 10,       // Most recent messages sent to the estimator
  },

  /**
   * Vocabulary Mastery
   */
  mastery: {
    max: 100,
    defaultIncrement: 10,
    assistantIncrement: 5,   // Applied to words the tutor used in a reply
  },

  /**
   * Profile Persistence
   */
  profile: {
    emotionRetention: 50,    // Emotion history entries kept on save
  },

  /**
   * Gemini API Configuration
   */
  gemini: {
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || 'gemini-1.5-flash',
    emotionTemperature: 0.3,
    policyTemperature: 0.7,
    levelTemperature: 0.3,
    maxRetries: 3,           // Max API retry attempts
    retryDelay: 1000,        // Base delay between retries (ms)
    timeout: 30000,          // Per-call timeout (ms)
  },

  /**
   * Storage Configuration
   */
  storage: {
    dataDir: process.env.TUTOR_DATA_DIR || './data',
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',  // Pretty print logs in dev
  },
} as const;

/**
 * Widened configuration shape, so overrides may carry other values
 */
export interface AppConfig {
  trend: { window: number; recentSize: number; threshold: number; minHistory: number };
  levelReview: { interval: number; window: number; minPositive: number };
  levelEstimation: {
    minMessages: number;
    shortContextConfidence: number;
    heuristicConfidence: number;
    adoptionConfidence: number;
    messageWindow: number;
  };
  mastery: { max: number; defaultIncrement: number; assistantIncrement: number };
  profile: { emotionRetention: number };
  gemini: {
    apiKey: string;
    model: string;
    emotionTemperature: number;
    policyTemperature: number;
    levelTemperature: number;
    maxRetries: number;
    retryDelay: number;
    timeout: number;
  };
  storage: { dataDir: string };
  logging: { level: string; pretty: boolean };
}

/**
 * Environment-specific configuration overrides
 */
export const getConfig = (): AppConfig => {
  const gemini = {
    ...CONFIG.gemini,
    apiKey: process.env.GEMINI_API_KEY || CONFIG.gemini.apiKey,
    model: process.env.GEMINI_MODEL || CONFIG.gemini.model,
  };

  const storage = {
    dataDir: process.env.TUTOR_DATA_DIR || CONFIG.storage.dataDir,
  };

  const logging = {
    level: process.env.LOG_LEVEL || CONFIG.logging.level,
    pretty: CONFIG.logging.pretty,
  };

  return {
    ...CONFIG,
    gemini,
    storage,
    logging,
  };
};

/**
 * Validate configuration on startup
 */
export const validateConfig = (config: AppConfig): void => {
  if (config.trend.recentSize < 1 || config.trend.recentSize > config.trend.window) {
    throw new ConfigurationError('Trend recent slice must fit inside the trend window', {
      recentSize: config.trend.recentSize,
      window: config.trend.window,
    });
  }
  if (config.trend.threshold < 0) {
    throw new ConfigurationError('Trend threshold cannot be negative');
  }

  if (config.levelReview.minPositive > config.levelReview.window) {
    throw new ConfigurationError('Level review cannot require more positives than its window');
  }
  if (config.levelReview.interval < 1) {
    throw new ConfigurationError('Level review interval must be at least 1');
  }

  const { shortContextConfidence, heuristicConfidence, adoptionConfidence } = config.levelEstimation;
  for (const value of [shortContextConfidence, heuristicConfidence, adoptionConfidence]) {
    if (value < 0 || value > 1) {
      throw new ConfigurationError('Level confidences must be between 0 and 1');
    }
  }

  if (config.mastery.defaultIncrement < 0 || config.mastery.assistantIncrement < 0) {
    throw new ConfigurationError('Mastery increments cannot be negative');
  }
};
