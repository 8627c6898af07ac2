/**
 * Language detection helpers: explicit request phrases ("in hindi") and a
 * script-based statistical guess.
 */

import languageTable from '../../data/languages.json';

export interface LanguageInfo {
  code: string;
  name: string;
  script: string;
  patterns: RegExp[];
}

export const LANGUAGES: LanguageInfo[] = Object.entries(languageTable).map(([code, entry]) => ({
  code,
  name: entry.name,
  script: entry.script,
  patterns: entry.patterns.map(source => new RegExp(source, 'iu')),
}));

export function languageName(code: string): string {
  const base = code.split('-')[0];
  return LANGUAGES.find(l => l.code === base)?.name || 'English';
}

export function languageScript(code: string): string {
  const base = code.split('-')[0];
  return LANGUAGES.find(l => l.code === base)?.script || 'Latin';
}

/**
 * Returns the language code of the first explicit request found, e.g.
 * "tell me about monsoons in hindi" -> "hi".
 */
export function detectLanguageRequest(text: string | undefined): string | null {
  if (!text || !text.trim()) {
    return null;
  }
  const lowered = text.toLowerCase().trim();
  for (const language of LANGUAGES) {
    if (language.patterns.some(pattern => pattern.test(lowered))) {
      return language.code;
    }
  }
  return null;
}

export interface LanguageGuess {
  language_code: string;
  confidence: number;
}

export interface LanguageDetectionStrategy {
  detect(text: string): LanguageGuess;
}

const SCRIPT_RANGES: Array<{ code: string; pattern: RegExp }> = [
  { code: 'hi', pattern: /\p{Script=Devanagari}/u },
  { code: 'bn', pattern: /\p{Script=Bengali}/u },
  { code: 'pa', pattern: /\p{Script=Gurmukhi}/u },
  { code: 'gu', pattern: /\p{Script=Gujarati}/u },
  { code: 'or', pattern: /\p{Script=Oriya}/u },
  { code: 'ta', pattern: /\p{Script=Tamil}/u },
  { code: 'te', pattern: /\p{Script=Telugu}/u },
  { code: 'kn', pattern: /\p{Script=Kannada}/u },
  { code: 'ml', pattern: /\p{Script=Malayalam}/u },
  { code: 'ur', pattern: /\p{Script=Arabic}/u },
  { code: 'en', pattern: /\p{Script=Latin}/u },
];

/**
 * Counts letters per script and reports the dominant one. Confidence is the
 * dominant script's share of all classified letters.
 */
export class ScriptLanguageStrategy implements LanguageDetectionStrategy {
  constructor(private defaultCode = 'en') {}

  detect(text: string): LanguageGuess {
    const counts = new Map<string, number>();
    let total = 0;

    for (const char of text) {
      if (!/\p{L}|\p{M}/u.test(char)) {
        continue;
      }
      const match = SCRIPT_RANGES.find(range => range.pattern.test(char));
      if (match) {
        counts.set(match.code, (counts.get(match.code) || 0) + 1);
        total++;
      }
    }

    if (total === 0) {
      return { language_code: this.defaultCode, confidence: 0 };
    }

    let best = this.defaultCode;
    let bestCount = 0;
    for (const [code, count] of counts.entries()) {
      if (count > bestCount) {
        best = code;
        bestCount = count;
      }
    }

    return { language_code: best, confidence: Math.round((bestCount / total) * 100) / 100 };
  }
}
