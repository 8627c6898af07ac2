/**
 * Progressively safer image prompts for content-policy retries
 */

import prompts from '../../../data/image-prompts.json';

const SAFE_TERMS: readonly string[] = prompts.safe_terms;
const UNSAFE_PATTERN = new RegExp(`\\b(${prompts.unsafe_terms.join('|')})\\b`, 'gi');
const SAFE_MODIFIERS = 'family-friendly, calm, optimistic mood, professional quality, clean composition';

export const REVISED_PROMPT_LIMIT = 200;

/** Illustration style shared by explanatory slides. */
export const GENERIC_ALT =
  "Flat vector illustration of the slide's idea; clean geometric shapes, " +
  'smooth gradients, harmonious palette; inclusive, family-friendly; ' +
  'no text/logos/watermarks; no real-person likeness.';

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').replace(/\s+,/g, ',').replace(/,+/g, ',').replace(/^[\s,]+|[\s,]+$/g, '');
}

export function removeUnsafeTerms(text: string): string {
  return collapse(text.replace(UNSAFE_PATTERN, ''));
}

export function slideVariation(slideIndex: number): string {
  return prompts.slide_variations[slideIndex % prompts.slide_variations.length];
}

/**
 * Cleans the prompt the image service proposed in its rejection. Long
 * prompts are cut at the last comma or period past 70% of the limit.
 */
export function sanitizeRevisedPrompt(revised: string, maxLength = REVISED_PROMPT_LIMIT): string {
  const sanitized = removeUnsafeTerms(revised);
  if (sanitized.length <= maxLength) {
    return sanitized;
  }
  const truncated = sanitized.substring(0, maxLength);
  const lastBreak = Math.max(truncated.lastIndexOf(','), truncated.lastIndexOf('.'));
  return lastBreak > maxLength * 0.7 ? truncated.substring(0, lastBreak + 1) : truncated;
}

/** First safe term found in the topic, else in the opening words of the prompt. */
export function safeTopicTerm(topic: string, originalPrompt = ''): string | null {
  const lowered = topic.toLowerCase();
  const inTopic = SAFE_TERMS.find(term => lowered.includes(term));
  if (inTopic) {
    return inTopic;
  }
  const words = originalPrompt.toLowerCase().match(/\b[a-z]{4,}\b/g) ?? [];
  return words.slice(0, 3).find(word => SAFE_TERMS.includes(word)) ?? null;
}

export function contentRelatedPrompt(topic: string, originalPrompt: string): string {
  const term = safeTopicTerm(topic, originalPrompt) ?? 'news';
  return `professional ${term} themed editorial illustration, informative, uplifting, clean design, modern aesthetic, ${SAFE_MODIFIERS}`;
}

export function minimalTopicPrompt(topic: string, originalPrompt: string): string {
  const term = safeTopicTerm(topic, originalPrompt) ?? 'news';
  return `professional ${term} themed illustration, clean, modern, uplifting, ${SAFE_MODIFIERS}`;
}

export function genericSafePrompt(slideIndex: number): string {
  const base = prompts.simple_safe_prompts[slideIndex % prompts.simple_safe_prompts.length];
  const variation = prompts.variation_modifiers[slideIndex % prompts.variation_modifiers.length];
  return `${base}, ${variation}, professional, clean, modern, positive, informative, high quality`;
}

/**
 * Yields the next prompt after each content-policy rejection, strictly
 * safer than the one before, and null once the ladder is exhausted.
 */
export class SafePromptLadder {
  private rung = 0;

  constructor(
    private topic: string,
    private originalPrompt: string,
    private slideIndex: number
  ) {}

  next(revisedPrompt?: string): string | null {
    while (this.rung < 4) {
      const step = this.rung++;
      switch (step) {
        case 0: {
          const revised = revisedPrompt ? sanitizeRevisedPrompt(revisedPrompt) : '';
          if (revised) {
            return revised;
          }
          break;
        }
        case 1:
          return contentRelatedPrompt(this.topic, this.originalPrompt);
        case 2:
          return minimalTopicPrompt(this.topic, this.originalPrompt);
        case 3:
          return genericSafePrompt(this.slideIndex);
      }
    }
    return null;
  }
}
