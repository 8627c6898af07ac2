/**
 * Utility functions
 */

import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { Config } from './config';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export class Logger {
  static level: LogLevel = isLogLevel(Config.LOG_LEVEL) ? Config.LOG_LEVEL : 'info';

  static log(level: LogLevel, message: string, obj?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(obj && { data: obj }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, obj?: Record<string, unknown>) {
    this.log('info', message, obj);
  }

  static warn(message: string, obj?: Record<string, unknown>) {
    this.log('warn', message, obj);
  }

  static error(message: string, obj?: Record<string, unknown>) {
    this.log('error', message, obj);
  }

  static debug(message: string, obj?: Record<string, unknown>) {
    this.log('debug', message, obj);
  }
}

const URL_SAFE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_-';

export class Crypto {
  static uuid(): string {
    return uuidv4();
  }

  /** `size` characters from [A-Za-z0-9_-]. */
  static nanoId(size = 10): string {
    let id = '';
    for (const byte of randomBytes(size)) {
      id += URL_SAFE_ALPHABET[byte & 63];
    }
    return id;
  }
}

export class Clock {
  static nowUtc(): Date {
    return new Date();
  }

  static toDateString(date: Date): string {
    return date.toISOString().split('T')[0];
  }

  static toCompactDate(date: Date): string {
    return this.toDateString(date).replace(/-/g, '');
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    delayMs?: number;
    backoff?: boolean;
    shouldRetry?: (error: unknown) => boolean;
    onError?: (error: Error, attempt: number) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoff = true,
    shouldRetry = () => true,
    onError,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (onError) {
        onError(error instanceof Error ? error : new Error(String(error)), attempt);
      }

      if (!shouldRetry(error)) {
        break;
      }

      if (attempt < maxRetries) {
        const delay = backoff ? delayMs * Math.pow(2, attempt - 1) : delayMs;
        Logger.warn(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`, {
          error: errorMessage(error),
        });
        await sleep(delay);
      }
    }
  }

  throw lastError instanceof Error ? lastError : new Error('Max retries exceeded');
}

export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.includes('.');
  } catch {
    return false;
  }
}

export function cleanText(text: string | undefined): string {
  if (!text || typeof text !== 'string') {
    return '';
  }
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Collapse whitespace and cut at a word boundary so that the result,
 * placeholder included, fits in `width` characters.
 */
export function shortenAtWord(text: string, width: number, placeholder = '…'): string {
  const collapsed = cleanText(text);
  if (collapsed.length <= width) {
    return collapsed;
  }

  let result = '';
  for (const word of collapsed.split(' ')) {
    const candidate = result ? `${result} ${word}` : word;
    if (candidate.length + placeholder.length > width) {
      break;
    }
    result = candidate;
  }

  if (!result) {
    // a single token longer than the budget has no boundary to cut at
    return collapsed.substring(0, Math.max(0, width - placeholder.length)) + placeholder;
  }
  return result + placeholder;
}

const MARKDOWN_PATTERNS: Array<[RegExp, string]> = [
  [/\*\*([^*]+)\*\*/g, '$1'],
  [/\*([^*]+)\*/g, '$1'],
  [/#+\s*/g, ''],
  [/`([^`]+)`/g, '$1'],
  [/\[([^\]]+)\]\([^)]+\)/g, '$1'],
  [/^---+$/gm, ''],
  [/\n\s*\n\s*\n+/g, '\n\n'],
];

export function stripMarkdown(text: string): string {
  let result = text;
  for (const [pattern, replacement] of MARKDOWN_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result.trim();
}

/**
 * Lowercase, keep letters, digits and hyphens, turn whitespace into single
 * hyphens. Returns '' when nothing usable is left.
 */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s-]/gu, '')
    .trim()
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function splitSentences(text: string): string[] {
  return cleanText(text)
    .split(/(?<=[.!?।])\s+/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}
