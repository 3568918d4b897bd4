import { EmotionLabel, ProficiencyLevel, TrendDirection } from '../types';
import { errorMessage } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import type { PolicyOracle } from '../oracles/types';
import { fallbackAction } from './fallback-policy';

export interface SelectedAction {
  action: string;
  source: 'oracle' | 'fallback';
}

/**
 * Picks the action text for a turn: the policy oracle when present,
 * the deterministic fallback when it is absent, fails, or answers blank.
 */
export class ActionSelector {
  private readonly logger: Logger;

  constructor(private readonly oracle: PolicyOracle | null, logger?: Logger) {
    this.logger = logger ?? createLogger('ActionSelector');
  }

  async select(
    emotion: EmotionLabel,
    level: ProficiencyLevel,
    trend: TrendDirection,
    context: Record<string, string>
  ): Promise<SelectedAction> {
    if (this.oracle) {
      try {
        const action = (await this.oracle.generate(emotion, level, trend, context)).trim();
        if (action) {
          return { action, source: 'oracle' };
        }
        this.logger.warn('Policy oracle returned empty text, using fallback');
      } catch (error) {
        this.logger.warn('Policy oracle unavailable, using fallback', { error: errorMessage(error) });
      }
    }

    return { action: fallbackAction(emotion, level, trend), source: 'fallback' };
  }
}
