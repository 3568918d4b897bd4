import * as fs from 'fs';
import * as path from 'path';
import { CorruptDataError, InvalidArgumentError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('FileStore');

/**
 * Replace a file's contents whole: write a sibling temp file, then rename over
 * the target. Readers see the old file or the new one, never a partial write.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true });
    }
    throw error;
  }
}

export function writeJsonAtomic(filePath: string, data: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}

/**
 * File contents, or null when the file does not exist
 */
export function readTextFile(filePath: string): string | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Parsed JSON, or null when the file does not exist. Invalid JSON is CorruptDataError.
 */
export function readJsonFile(filePath: string): unknown {
  const content = readTextFile(filePath);
  if (content === null) {
    return null;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new CorruptDataError(`Invalid JSON in ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Keys become file names inside a store directory: no separators, no dot segments
 */
export function assertFileKey(key: string): void {
  if (!key || key === '.' || key.includes('..') || /[\\/\0]/.test(key)) {
    throw new InvalidArgumentError(`'${key}' cannot be used as a file key`, { key });
  }
}

/**
 * Directory of JSON documents, one file per key
 */
export class FileStore {
  private readonly dir: string;

  constructor(dir: string, private readonly suffix: string = '.json') {
    this.dir = path.resolve(dir);
  }

  pathFor(key: string): string {
    assertFileKey(key);
    return path.join(this.dir, `${key}${this.suffix}`);
  }

  read(key: string): unknown {
    return readJsonFile(this.pathFor(key));
  }

  write(key: string, value: unknown): void {
    const filePath = this.pathFor(key);
    writeJsonAtomic(filePath, value);
    logger.debug(`Saved ${filePath}`);
  }

  keys(): string[] {
    if (!fs.existsSync(this.dir)) {
      return [];
    }
    return fs
      .readdirSync(this.dir)
      .filter((name) => name.endsWith(this.suffix) && !name.startsWith('.'))
      .map((name) => name.slice(0, -this.suffix.length));
  }
}
