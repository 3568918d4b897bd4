/**
 * Gemini Oracle Adapters
 *
 * Emotion, policy and level oracles backed by one GeminiClient.
 * Each rejects with OracleUnavailableError on any failure.
 */

import { ChatMessage, EmotionLabel, ProficiencyLevel, TrendDirection } from '../types';
import { getConfig } from '../utils/config';
import { OracleUnavailableError } from '../utils/errors';
import { mapModelLabel } from '../emotion/keyword-classifier';
import { GeminiClient } from './gemini-client';
import {
  EMOTION_DESCRIPTIONS,
  EMOTION_PROMPT,
  LEVEL_SUMMARIES,
  buildLevelPrompt,
  buildPolicyPrompt,
} from './prompts';
import type { EmotionOracle, LevelOracle, PolicyOracle } from './types';

export class GeminiEmotionOracle implements EmotionOracle {
  constructor(private readonly client: GeminiClient) {}

  async classify(text: string): Promise<EmotionLabel> {
    const response = await this.client.generateText(
      EMOTION_PROMPT + text,
      getConfig().gemini.emotionTemperature
    );

    const label = mapModelLabel(response);
    if (!label) {
      throw new OracleUnavailableError('Emotion', 'unrecognised label', { response });
    }
    return label;
  }
}

/**
 * "k: v; k2: v2", or a placeholder for an empty context
 */
export function formatContext(context: Record<string, string>): string {
  const items = Object.entries(context).map(([key, value]) => `${key}: ${value}`);
  return items.length > 0 ? items.join('; ') : 'No additional context';
}

export class GeminiPolicyOracle implements PolicyOracle {
  constructor(private readonly client: GeminiClient) {}

  async generate(
    emotion: EmotionLabel,
    level: ProficiencyLevel,
    trend: TrendDirection,
    context: Record<string, string>
  ): Promise<string> {
    const prompt = buildPolicyPrompt(
      EMOTION_DESCRIPTIONS[emotion],
      LEVEL_SUMMARIES[level],
      trend,
      formatContext(context)
    );
    return this.client.generateText(prompt, getConfig().gemini.policyTemperature);
  }
}

export class GeminiLevelOracle implements LevelOracle {
  constructor(private readonly client: GeminiClient) {}

  async evaluate(messages: readonly ChatMessage[], levelDescriptions: string): Promise<string> {
    const formatted = messages
      .map((message, i) => `Message ${i + 1}: ${message.content}`)
      .join('\n');

    return this.client.generateText(
      buildLevelPrompt(formatted, levelDescriptions),
      getConfig().gemini.levelTemperature
    );
  }
}

export interface GeminiOracles {
  emotion: GeminiEmotionOracle;
  policy: GeminiPolicyOracle;
  level: GeminiLevelOracle;
}

/**
 * All three adapters when an API key is configured, otherwise null
 */
export function createGeminiOracles(client: GeminiClient = new GeminiClient()): GeminiOracles | null {
  if (!client.isAvailable()) {
    return null;
  }
  return {
    emotion: new GeminiEmotionOracle(client),
    policy: new GeminiPolicyOracle(client),
    level: new GeminiLevelOracle(client),
  };
}
