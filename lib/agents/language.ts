/**
 * Language Agent - Determines the target language of the story
 */

import { BaseAgent } from './base';
import { IntakePayload, LanguageMetadata } from '../types';
import { ValidationError } from '../errors';
import {
  LanguageDetectionStrategy,
  ScriptLanguageStrategy,
  detectLanguageRequest,
} from '../tools/language-detection';
import { Logger } from '../utils';

export const EXPLICIT_REQUEST_CONFIDENCE = 0.95;
export const PREVIEW_LENGTH = 200;
const LANGUAGE_CODE = /^[a-z]{2}(-[A-Z]{2})?$/;

export class LanguageAgent extends BaseAgent<IntakePayload, LanguageMetadata> {
  constructor(
    private strategy: LanguageDetectionStrategy = new ScriptLanguageStrategy(),
    private defaultLanguage = 'en'
  ) {
    super({ name: 'LanguageAgent' });
  }

  protected async process(payload: IntakePayload): Promise<LanguageMetadata> {
    return this.detect(payload);
  }

  detect(payload: IntakePayload): LanguageMetadata {
    const aggregated = [payload.text_prompt, payload.notes, payload.prompt_keywords.join(' '), payload.urls.join(' ')]
      .filter((part): part is string => !!part && part.trim().length > 0)
      .join(' ')
      .trim();
    const preview = aggregated.substring(0, PREVIEW_LENGTH) || undefined;

    // an explicit "in hindi" beats whatever the text looks like
    const requested = detectLanguageRequest(payload.text_prompt) || detectLanguageRequest(payload.notes);
    if (requested) {
      Logger.info('Explicit language request detected', { language: requested });
      return this.checked({
        language_code: requested,
        confidence: EXPLICIT_REQUEST_CONFIDENCE,
        source_text_preview: preview,
      });
    }

    if (!aggregated) {
      return { language_code: this.defaultLanguage, confidence: 0 };
    }

    const guess = this.strategy.detect(aggregated);
    return this.checked({ ...guess, source_text_preview: preview });
  }

  private checked(result: LanguageMetadata): LanguageMetadata {
    if (!LANGUAGE_CODE.test(result.language_code)) {
      throw new ValidationError(`Unparseable language code: ${result.language_code}`);
    }
    if (!(result.confidence >= 0 && result.confidence <= 1)) {
      throw new ValidationError(`Language confidence out of range: ${result.confidence}`);
    }
    return result;
  }
}
