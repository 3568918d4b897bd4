import * as fs from 'fs';
import * as path from 'path';
import { ChatMessage } from '../types';
import { getConfig } from '../utils/config';
import { createLogger } from '../utils/logger';
import { assertFileKey, writeFileAtomic } from '../persistence/file-store';
import { ParseSessionLogOptions, ParsedSessionLog, formatSessionLog, readSessionLogFile } from './session-log';

const logger = createLogger('SessionLogStore');

function stamp(at: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`
  );
}

/**
 * Session logs on disk, named <sessionId>_session_<YYYYMMDD_HHMMSS>.log
 */
export class SessionLogStore {
  private readonly dir: string;

  constructor(dir: string = getConfig().storage.dataDir) {
    this.dir = path.resolve(dir);
  }

  save(sessionId: string, messages: readonly ChatMessage[], at: Date = new Date()): string {
    assertFileKey(sessionId);
    const logPath = path.join(this.dir, `${sessionId}_session_${stamp(at)}.log`);
    writeFileAtomic(logPath, formatSessionLog(messages));
    logger.info(`Session log saved to ${logPath}`, { messages: messages.length });
    return logPath;
  }

  /**
   * Log paths for a session, oldest first
   */
  list(sessionId: string): string[] {
    assertFileKey(sessionId);
    if (!fs.existsSync(this.dir)) {
      return [];
    }
    const prefix = `${sessionId}_session_`;
    return fs
      .readdirSync(this.dir)
      .filter((name) => name.startsWith(prefix) && name.endsWith('.log'))
      .sort()
      .map((name) => path.join(this.dir, name));
  }

  load(logPath: string, options: ParseSessionLogOptions = {}): ParsedSessionLog {
    return readSessionLogFile(logPath, options);
  }
}
