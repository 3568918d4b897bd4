/**
 * Prompt text for the Gemini oracle adapters
 */

import { EmotionLabel, ProficiencyLevel } from '../types';

export const LEVEL_DESCRIPTIONS = `
L1 (Emerging Awareness):
- Uses 0-2 Chinese characters per conversation
- Very simple English sentences (avg 5 words)
- No complex structures
- Single word responses common

L2 (Basic Expression):
- Uses 1-3 Chinese characters
- Simple sentences (avg 7 words)
- Beginning to form basic phrases
- Can say simple greetings and express basic needs

L3 (Sentence Development):
- Uses 3-5 Chinese characters
- Moderate sentence length (avg 10 words)
- Uses basic connectors (and, but)
- Can form complete sentences with reasons

L4 (Interactive Communication):
- Uses 5-8 Chinese characters
- Longer sentences (avg 12 words)
- Complex structures present
- Can engage in back-and-forth conversation

L5 (Structured & Logical Speech):
- Uses 8+ Chinese characters
- Complex sentences (avg 15+ words)
- Advanced connectors and structures
- Can explain reasoning and tell stories
`;

export const EMOTION_DESCRIPTIONS: Readonly<Record<EmotionLabel, string>> = {
  excited: 'Excited and energetic - high engagement and enthusiasm',
  happy: 'Happy and positive - good mood and receptive to learning',
  neutral: 'Neutral - calm but may need engagement boost',
  frustrated: 'Frustrated - struggling and needs support',
  tired: 'Tired - low energy, needs gentle approach',
  sad: 'Sad - needs emotional support and comfort',
};

export const LEVEL_SUMMARIES: Readonly<Record<ProficiencyLevel, string>> = {
  L1: 'L1 (Emerging Awareness) - Just beginning, focus on single words',
  L2: 'L2 (Basic Expression) - Simple phrases and basic patterns',
  L3: 'L3 (Sentence Development) - Building complete sentences',
  L4: 'L4 (Interactive Communication) - Conversational level',
  L5: 'L5 (Structured & Logical) - Advanced communication',
};

export const EMOTION_PROMPT = `Classify the emotion of a young language learner from their message.
Answer with exactly one word from this list: excited, happy, neutral, frustrated, tired, sad.

Message:
`;

export const POLICY_SYSTEM = `You are an expert in adaptive teaching strategies for young language learners.
Your policies should be emotionally responsive, developmentally appropriate, playful,
specific and actionable, and focused on keeping learning a positive experience.`;

export function buildPolicyPrompt(
  emotionDescription: string,
  levelDescription: string,
  trend: string,
  context: string
): string {
  return `${POLICY_SYSTEM}

Generate a specific teaching policy based on the current context:

Current Student State:
- Emotional State: ${emotionDescription}
- Language Level: ${levelDescription}
- Emotion Trend: ${trend}
- Additional Context: ${context}

Create an adaptive teaching policy that:
1. Responds appropriately to the student's emotional state
2. Matches activities to their language level
3. Considers the emotion trend (improving, stable, declining)
4. Provides specific, actionable guidance

Format your policy as clear, concise instructions that the teaching agent can follow.

ADAPTIVE TEACHING POLICY:
`;
}

export function buildLevelPrompt(messages: string, levelDescriptions: string): string {
  return `You are an expert in Chinese language education, specifically evaluating children's Chinese proficiency levels.

Analyze the following conversation messages and determine the student's Chinese language level.

Language Levels:
${levelDescriptions}

Recent Messages:
${messages}

Provide your evaluation in the following format:
LEVEL: [L1/L2/L3/L4/L5]
CONFIDENCE: [0.0-1.0]
REASONING: [Brief explanation of your assessment]
`;
}
