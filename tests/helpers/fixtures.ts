import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ChatMessage, ChatSession, EmotionLabel, ProficiencyLevel } from '../../src/types';

export const BASE_TIME = Date.parse('2025-08-29T10:00:00.000Z');

export const minutes = (n: number): Date => new Date(BASE_TIME + n * 60_000);

export function userTurn(content: string, minute: number, emotion?: EmotionLabel): ChatMessage {
  return emotion
    ? { role: 'user', content, timestamp: minutes(minute), emotion }
    : { role: 'user', content, timestamp: minutes(minute) };
}

export function assistantTurn(content: string, minute: number): ChatMessage {
  return { role: 'assistant', content, timestamp: minutes(minute) };
}

/**
 * One user turn every two minutes, each followed by an assistant reply a minute later
 */
export function sessionWithEmotions(
  emotions: EmotionLabel[],
  initialLevel: ProficiencyLevel = 'L1',
  sessionId = 'test-session'
): ChatSession {
  const messages: ChatMessage[] = [];
  emotions.forEach((emotion, i) => {
    messages.push(userTurn(`user turn ${i + 1}`, i * 2, emotion));
    messages.push(assistantTurn(`reply ${i + 1}`, i * 2 + 1));
  });

  return {
    sessionId,
    messages,
    startTime: minutes(0),
    endTime: minutes(emotions.length * 2),
    initialLevel,
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
