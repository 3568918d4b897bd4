/**
 * Session Log Format
 *
 * Line-oriented chat logs. Two message line forms are read:
 *
 *   2025-08-29T10:00:00.000Z [user] Hi! I want to learn Chinese!
 *   [10:00:00] user: Hi! I want to learn Chinese!
 *
 * Clock lines may be followed by indented annotation lines, and a clock that
 * goes backwards marks a new day:
 *
 *     [Emotion: excited]
 *     [Chinese words: 猫, 狗]
 *
 * Malformed lines are skipped with a warning; they never fail the parse.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ChatMessage,
  ChatRole,
  ChatSession,
  EmotionLabel,
  ProficiencyLevel,
  isEmotionLabel,
} from '../types';
import { ParseWarning } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';

const ISO_LINE = /^(\d{4}-\d{2}-\d{2}T\S+)\s+\[([A-Za-z]+)\]\s*(.*)$/;
const CLOCK_LINE = /^\[(\d{2}):(\d{2}):(\d{2})\]\s+([A-Za-z]+):\s?(.*)$/;
const EMOTION_NOTE = /^\[Emotion:\s*([^\]]*)\]$/;
const WORDS_NOTE = /^\[Chinese words:\s*([^\]]*)\]$/;

export interface ParseSessionLogOptions {
  sessionId?: string;
  fileName?: string;
  /** UTC day of the last clock-only line; earlier lines step back a day wherever the clock wraps */
  referenceDate?: Date;
  initialLevel?: ProficiencyLevel;
  logger?: Logger;
}

export interface ParsedSessionLog {
  session: ChatSession;
  warnings: ParseWarning[];
}

/**
 * Clock lines carry no date: their time is kept as an offset from midnight of
 * the first clock day and placed on the calendar once the whole log is read.
 */
type DraftTime = { kind: 'absolute'; at: Date } | { kind: 'clock'; msFromFirstDay: number };

interface DraftMessage {
  role: ChatRole;
  content: string;
  time: DraftTime;
  emotion?: EmotionLabel;
  wordsUsed?: string[];
}

const MS_PER_SECOND = 1000;
const MS_PER_DAY = 86_400_000;

function toRole(value: string): ChatRole | undefined {
  const role = value.toLowerCase();
  return role === 'user' || role === 'assistant' ? role : undefined;
}

/**
 * "<id>_session_<stamp>.log" -> "<id>"
 */
export function sessionIdFromFileName(fileName: string): string | undefined {
  const base = path.basename(fileName);
  const marker = base.indexOf('_session_');
  return marker > 0 ? base.slice(0, marker) : undefined;
}

function secondsOfDay(hours: number, minutes: number, seconds: number): number | undefined {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }
  return hours * 3600 + minutes * 60 + seconds;
}

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function parseSessionLog(text: string, options: ParseSessionLogOptions = {}): ParsedSessionLog {
  const logger = options.logger ?? createLogger('SessionLog');
  const reference = options.referenceDate ?? new Date();
  const drafts: DraftMessage[] = [];
  const warnings: ParseWarning[] = [];
  let clockDay = 0;
  let lastClockSeconds: number | undefined;

  const warn = (lineNumber: number, line: string, reason: string): void => {
    warnings.push({ lineNumber, line, reason });
    logger.warn(`Skipping malformed log line ${lineNumber}: ${reason}`, { line: line.slice(0, 50) });
  };

  const lines = text.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const lineNumber = i + 1;
    const line = raw.trim();
    if (!line) {
      return;
    }

    // Annotations are indented and belong to the message above them
    if (/^\s/.test(raw)) {
      const previous = drafts[drafts.length - 1];
      const emotionNote = line.match(EMOTION_NOTE);
      const wordsNote = line.match(WORDS_NOTE);

      if (!emotionNote && !wordsNote) {
        warn(lineNumber, raw, 'unrecognised indented line');
      } else if (!previous) {
        warn(lineNumber, raw, 'annotation without a preceding message');
      } else if (emotionNote) {
        const label = emotionNote[1].trim().toLowerCase();
        if (isEmotionLabel(label)) {
          previous.emotion = label;
        } else {
          warn(lineNumber, raw, `unknown emotion label '${label}'`);
        }
      } else if (wordsNote) {
        previous.wordsUsed = wordsNote[1]
          .split(',')
          .map((word) => word.trim())
          .filter((word) => word.length > 0);
      }
      return;
    }

    const clock = line.match(CLOCK_LINE);
    if (clock) {
      const role = toRole(clock[4]);
      const seconds = secondsOfDay(Number(clock[1]), Number(clock[2]), Number(clock[3]));
      const content = clock[5].trim();

      if (!role) {
        warn(lineNumber, raw, `unknown role '${clock[4]}'`);
      } else if (seconds === undefined) {
        warn(lineNumber, raw, 'invalid clock time');
      } else if (!content) {
        warn(lineNumber, raw, 'empty message');
      } else {
        if (lastClockSeconds !== undefined && seconds < lastClockSeconds) {
          clockDay += 1;
        }
        lastClockSeconds = seconds;
        drafts.push({
          role,
          content,
          time: { kind: 'clock', msFromFirstDay: clockDay * MS_PER_DAY + seconds * MS_PER_SECOND },
        });
      }
      return;
    }

    const iso = line.match(ISO_LINE);
    if (iso) {
      const role = toRole(iso[2]);
      const time = Date.parse(iso[1]);
      const content = iso[3].trim();

      if (!role) {
        warn(lineNumber, raw, `unknown role '${iso[2]}'`);
      } else if (Number.isNaN(time)) {
        warn(lineNumber, raw, 'invalid timestamp');
      } else if (!content) {
        warn(lineNumber, raw, 'empty message');
      } else {
        drafts.push({ role, content, time: { kind: 'absolute', at: new Date(time) } });
      }
      return;
    }

    warn(lineNumber, raw, 'not a message line');
  });

  // The last clock day is the reference day
  const firstClockDay = utcMidnight(reference) - clockDay * MS_PER_DAY;
  const messages: ChatMessage[] = drafts.map(({ time, ...rest }) =>
    Object.freeze({
      ...rest,
      timestamp: time.kind === 'absolute' ? time.at : new Date(firstClockDay + time.msFromFirstDay),
    })
  );
  const fromFile = options.fileName ? sessionIdFromFileName(options.fileName) : undefined;

  return {
    session: {
      sessionId: options.sessionId ?? fromFile ?? 'unknown',
      messages,
      startTime: messages.length > 0 ? messages[0].timestamp : reference,
      endTime: messages.length > 0 ? messages[messages.length - 1].timestamp : undefined,
      initialLevel: options.initialLevel ?? 'L1',
    },
    warnings,
  };
}

/**
 * The UTC save time in "<id>_session_YYYYMMDD_HHMMSS.log", if the name has one
 */
export function savedAtFromFileName(fileName: string): Date | undefined {
  const match = path.basename(fileName).match(/_session_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.log$/);
  if (!match) {
    return undefined;
  }
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const at = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  return Number.isNaN(at.getTime()) ? undefined : at;
}

/**
 * Parse a log file. Clock-only timestamps end on the save time in the file
 * name, else on the file's modification date, unless a reference date is given.
 */
export function readSessionLogFile(logPath: string, options: ParseSessionLogOptions = {}): ParsedSessionLog {
  const text = fs.readFileSync(logPath, 'utf-8');
  return parseSessionLog(text, {
    ...options,
    fileName: options.fileName ?? logPath,
    referenceDate: options.referenceDate ?? savedAtFromFileName(logPath) ?? fs.statSync(logPath).mtime,
  });
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Clock-form log text: one message line per message, its annotations, then a blank line
 */
export function formatSessionLog(messages: readonly ChatMessage[]): string {
  return messages
    .map((message) => {
      const t = message.timestamp;
      const clock = `${pad(t.getUTCHours())}:${pad(t.getUTCMinutes())}:${pad(t.getUTCSeconds())}`;
      const lines = [`[${clock}] ${message.role}: ${message.content.replace(/\r?\n/g, ' ')}`];

      if (message.emotion) {
        lines.push(`  [Emotion: ${message.emotion}]`);
      }
      if (message.wordsUsed && message.wordsUsed.length > 0) {
        lines.push(`  [Chinese words: ${message.wordsUsed.join(', ')}]`);
      }
      return lines.join('\n') + '\n\n';
    })
    .join('');
}
