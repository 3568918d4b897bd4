import { EmotionLabel, isEmotionLabel } from '../types';
import { errorMessage } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import type { EmotionOracle } from '../oracles/types';
import { KeywordEmotionClassifier } from './keyword-classifier';

export interface EmotionResolverOptions {
  /** What an absent oracle yields: plain neutral, or the keyword classifier */
  whenAbsent?: 'neutral' | 'keyword';
  logger?: Logger;
}

/**
 * Resolves the emotion of a user turn. A pre-attached label wins; otherwise
 * the oracle is asked. An oracle failure or a label outside the closed set
 * falls back to keyword scoring.
 */
export class EmotionResolver {
  private readonly keywords = new KeywordEmotionClassifier();
  private readonly whenAbsent: 'neutral' | 'keyword';
  private readonly logger: Logger;

  constructor(private readonly oracle: EmotionOracle | null, options: EmotionResolverOptions = {}) {
    this.whenAbsent = options.whenAbsent ?? 'neutral';
    this.logger = options.logger ?? createLogger('EmotionResolver');
  }

  async resolve(text: string, preAttached?: EmotionLabel): Promise<EmotionLabel> {
    if (preAttached) {
      return preAttached;
    }

    if (!this.oracle) {
      return this.whenAbsent === 'keyword' ? this.keywords.detect(text) : 'neutral';
    }

    let label: unknown;
    try {
      label = await this.oracle.classify(text);
    } catch (error) {
      this.logger.warn('Emotion oracle unavailable, using keyword fallback', {
        error: errorMessage(error),
      });
      return this.keywords.detect(text);
    }

    if (isEmotionLabel(label)) {
      return label;
    }
    this.logger.warn('Emotion oracle returned an unknown label, using keyword fallback', { label });
    return this.keywords.detect(text);
  }
}
