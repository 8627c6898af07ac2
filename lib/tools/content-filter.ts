/**
 * Drops sentences about violence and disaster from news source text before
 * it reaches the writer. Keyword lists live in data/negative-keywords.json,
 * one list per script.
 */

import negativeKeywords from '../../data/negative-keywords.json';
import { ScriptLanguageStrategy, languageScript } from './language-detection';
import { Logger } from '../utils';

const KEYWORDS: Record<string, string[]> = negativeKeywords;

const MIN_FILTERABLE_LENGTH = 50;
const MIN_SENTENCE_LENGTH = 10;
const MIN_KEPT_RATIO = 0.3;
const SENTENCE_END = /[.!?।|॥]\s+/u;

export interface KeywordMatcher {
  keyword: string;
  test(sentence: string): boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Latin keywords match whole words ("war" must not hit "award"); other
// scripts attach vowel signs and suffixes, so they match as substrings.
function matcherFor(keyword: string, script: string): KeywordMatcher {
  if (script === 'Latin') {
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, 'iu');
    return { keyword, test: sentence => pattern.test(sentence) };
  }
  return { keyword, test: sentence => sentence.includes(keyword) };
}

export function dominantScript(text: string): string {
  const guess = new ScriptLanguageStrategy('en').detect(text);
  return languageScript(guess.language_code);
}

/**
 * Keywords of the text's dominant script plus the Latin list, which mixed
 * content always needs. Keywords of two letters or fewer are ignored.
 */
export function negativeMatchers(script: string): KeywordMatcher[] {
  const lists: Array<[string, string[]]> = [['Latin', KEYWORDS.Latin ?? []]];
  if (script !== 'Latin' && KEYWORDS[script]) {
    lists.push([script, KEYWORDS[script]]);
  }
  return lists.flatMap(([listScript, words]) =>
    words.filter(word => word.length > 2).map(word => matcherFor(word, listScript))
  );
}

/**
 * Returns the text without its negative sentences, joined with ". ".
 * Short texts are returned unchanged, and so is any text that would keep
 * less than 30% of its length.
 */
export function filterNegativeSentences(text: string): string {
  if (!text || text.trim().length < MIN_FILTERABLE_LENGTH) {
    return text;
  }

  const script = dominantScript(text);
  const matchers = negativeMatchers(script);
  const kept: string[] = [];
  let dropped = 0;

  for (const raw of text.split(SENTENCE_END)) {
    const sentence = raw.trim();
    if (sentence.length < MIN_SENTENCE_LENGTH) {
      continue;
    }
    const hit = matchers.find(matcher => matcher.test(sentence));
    if (hit) {
      dropped++;
      Logger.debug('Dropped negative sentence', { keyword: hit.keyword, sentence: sentence.substring(0, 80) });
    } else {
      kept.push(sentence);
    }
  }

  if (dropped === 0) {
    return text;
  }

  const filtered = kept.join('. ');
  const ratio = filtered.length / text.length;
  if (!filtered || ratio < MIN_KEPT_RATIO) {
    Logger.warn('Negative filter would remove most of the article, keeping it whole', {
      kept: filtered.length,
      total: text.length,
    });
    return text;
  }

  Logger.info('Negative sentences removed', { script, dropped, kept: filtered.length, total: text.length });
  return filtered;
}
