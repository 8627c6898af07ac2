/**
 * Tests for utility functions
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { Crypto, Logger, cleanText, isHttpUrl, retry, shortenAtWord, slugify, stripMarkdown } from '../lib/utils';

describe('slugify', () => {
  it('should lowercase, strip punctuation and hyphenate', () => {
    expect(slugify('Breaking: AI Wins!!')).toBe('breaking-ai-wins');
  });

  it('should collapse hyphens and trim them at the edges', () => {
    expect(slugify('  -- Hello   World -- ')).toBe('hello-world');
  });

  it('should keep letters from other scripts', () => {
    expect(slugify('Noticias de España')).toBe('noticias-de-españa');
  });

  it('should return an empty string when nothing usable is left', () => {
    expect(slugify('!!! ???')).toBe('');
  });
});

describe('shortenAtWord', () => {
  it('should cut at a word boundary and append the placeholder', () => {
    expect(shortenAtWord('The quick brown fox jumps', 15)).toBe('The quick…');
  });

  it('should return short text unchanged', () => {
    expect(shortenAtWord('short', 10)).toBe('short');
  });

  it('should hard-cut a single overlong token', () => {
    expect(shortenAtWord('abcdefghijkl', 5)).toBe('abcd…');
  });
});

describe('stripMarkdown', () => {
  it('should remove emphasis, code and links', () => {
    expect(stripMarkdown('**Bold** and `code` [link](http://x)')).toBe('Bold and code link');
  });

  it('should remove heading markers', () => {
    expect(stripMarkdown('## Title')).toBe('Title');
  });
});

describe('cleanText', () => {
  it('should normalize whitespace', () => {
    expect(cleanText('  hello   world  ')).toBe('hello world');
    expect(cleanText('hello\n\nworld')).toBe('hello world');
  });
});

describe('isHttpUrl', () => {
  it('should accept http(s) URLs with a dotted host', () => {
    expect(isHttpUrl('https://example.com/a')).toBe(true);
  });

  it('should reject other schemes and bare hosts', () => {
    expect(isHttpUrl('ftp://example.com')).toBe(false);
    expect(isHttpUrl('http://localhost')).toBe(false);
    expect(isHttpUrl('not a url')).toBe(false);
  });
});

describe('Crypto', () => {
  it('should generate 10-character nano IDs from the URL-safe alphabet', () => {
    expect(Crypto.nanoId()).toMatch(/^[A-Za-z0-9_-]{10}$/);
  });

  it('should generate v4 UUIDs', () => {
    expect(Crypto.uuid()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('retry', () => {
  it('should retry until the call succeeds', async () => {
    const fn = vi.fn(async (): Promise<string> => 'ok').mockRejectedValueOnce(new Error('flaky'));

    await expect(retry(fn, { maxRetries: 3, delayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop at the first error that is not retryable', async () => {
    const fn = vi.fn(async (): Promise<string> => 'ok').mockRejectedValue(new Error('final'));

    await expect(retry(fn, { maxRetries: 3, delayMs: 0, shouldRetry: () => false })).rejects.toThrow('final');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('Logger', () => {
  const original = Logger.level;

  afterEach(() => {
    Logger.level = original;
    vi.restoreAllMocks();
  });

  it('should drop events below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    Logger.level = 'warn';

    Logger.info('hidden');
    Logger.warn('shown', { stage: 'images' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry.level).toBe('warn');
    expect(entry.message).toBe('shown');
    expect(entry.data).toEqual({ stage: 'images' });
  });
});
