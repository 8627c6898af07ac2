/**
 * URL content validator - checks that an extracted article is actually about
 * what its URL path says. Extractors occasionally hand back a cached or
 * unrelated article; this rejects those before generation sees them.
 */

import type { ArticleExtraction } from './article-extractor';

export const URL_STOP_WORDS: ReadonlySet<string> = new Set([
  'article', 'news', 'story', 'com', 'org', 'www', 'http', 'https', 'html',
  'sports', 'cities', 'entertainment', 'technology', 'business', 'politics',
  'world', 'local', 'health', 'science', 'education', 'lifestyle', 'opinion',
  'editorial',
]);

export const MAX_URL_KEYWORDS = 10;
export const CONTENT_WINDOW = 2000;
export const MIN_TEXT_LENGTH = 50;
export const MIN_MATCH_RATIO = 0.1;

export interface KeywordCheck {
  keywords: string[];
  matches: string[];
  ratio: number;
  required: number;
  accepted: boolean;
}

export type UrlValidationOutcome =
  | { accepted: true; check: KeywordCheck }
  | { accepted: false; reason: 'too_short' }
  | { accepted: false; reason: 'keyword_mismatch'; check: KeywordCheck };

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Path tokens split on '-', dropping short, numeric, generic and host-name
 * tokens. Returns at most ten of the longest unique tokens.
 */
export function extractUrlKeywords(url: string): string[] {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return [];
  }

  const hostLabels = parsed.hostname.toLowerCase().split('.');
  const tokens: string[] = [];

  for (const segment of parsed.pathname.split('/')) {
    const cleaned = decodeSegment(segment).toLowerCase().replace(/\.[a-z]{2,5}$/, '');
    for (const token of cleaned.split('-')) {
      if (token.length <= 3 || /^\d+$/.test(token)) {
        continue;
      }
      if (URL_STOP_WORDS.has(token) || hostLabels.includes(token)) {
        continue;
      }
      if (!tokens.includes(token)) {
        tokens.push(token);
      }
    }
  }

  // stable sort keeps path order among equal lengths
  return [...tokens].sort((a, b) => b.length - a.length).slice(0, MAX_URL_KEYWORDS);
}

export function requiredMatches(keywordCount: number): number {
  return Math.max(2, Math.min(3, Math.floor(keywordCount / 3)));
}

/**
 * Case-insensitive substring overlap between the URL keywords and the
 * content text. Fewer than three keywords carry too little signal and are
 * always accepted.
 */
export function checkKeywordOverlap(keywords: string[], contentText: string): KeywordCheck {
  const haystack = contentText.toLowerCase();
  const unique = Array.from(new Set(keywords.map(k => k.toLowerCase())));
  const matches = unique.filter(keyword => haystack.includes(keyword));
  const ratio = unique.length > 0 ? matches.length / unique.length : 0;
  const required = requiredMatches(unique.length);

  const accepted = unique.length < 3 || (ratio >= MIN_MATCH_RATIO && matches.length >= required);

  return { keywords: unique, matches, ratio, required, accepted };
}

export class UrlContentValidator {
  validate(url: string, article: ArticleExtraction): UrlValidationOutcome {
    if (article.text.trim().length < MIN_TEXT_LENGTH) {
      return { accepted: false, reason: 'too_short' };
    }

    const contentText = `${article.title} ${article.text.substring(0, CONTENT_WINDOW)}`;
    const check = checkKeywordOverlap(extractUrlKeywords(url), contentText);

    if (!check.accepted) {
      return { accepted: false, reason: 'keyword_mismatch', check };
    }
    return { accepted: true, check };
  }
}
