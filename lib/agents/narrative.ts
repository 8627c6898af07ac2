/**
 * Narrative Agent - Routes generation to the writer for the story mode
 */

import { BaseAgent, RetryPolicy } from './base';
import { Config } from '../config';
import {
  DocInsights,
  IntakePayload,
  NarrativeResponse,
  RenderedPrompt,
  SlideBlock,
  StoryMode,
} from '../types';
import { ExternalServiceError, ValidationError } from '../errors';
import type { CompletionOptions, LanguageModel } from '../tools/llm';

export { GENERIC_ALT } from '../tools/images/safe-prompts';

export interface NarrativeRequest {
  prompt: RenderedPrompt;
  insights: DocInsights;
  slideCount: number;
  templateKey: string;
  category?: string;
}

export interface NarrativeGenerator {
  readonly mode: StoryMode;
  generate(request: NarrativeRequest): Promise<NarrativeResponse>;
}

/** Cover and CTA frame the middle slides; at least one middle slide. */
export function middleSlideCount(slideCount: number): number {
  return Math.max(1, slideCount - 2);
}

export function baseLanguage(code: string): string {
  return code.split('-')[0];
}

export function sourceText(insights: DocInsights, fallback: string): string {
  const parts = insights.semantic_chunks
    .map(chunk => chunk.text.trim())
    .filter(text => text.length > 0);
  return parts.join('\n\n') || fallback;
}

/**
 * Truncates or pads the deck to exactly `count` slides.
 */
export function fitSlides(
  slides: SlideBlock[],
  count: number,
  pad: (index: number) => SlideBlock
): SlideBlock[] {
  const fitted = slides.slice(0, count);
  while (fitted.length < count) {
    fitted.push(pad(fitted.length));
  }
  return fitted;
}

/**
 * Wraps a language model and records whether any call went through, so a
 * writer can tell "model unavailable" apart from individual call failures.
 */
export class TrackedModel implements LanguageModel {
  attempts = 0;
  successes = 0;
  private lastError: unknown;

  constructor(private inner: LanguageModel) {}

  async complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string> {
    this.attempts++;
    try {
      const result = await this.inner.complete(systemPrompt, userPrompt, options);
      this.successes++;
      return result;
    } catch (error) {
      this.lastError = error;
      throw error;
    }
  }

  assertReachable(writer: string): void {
    if (this.attempts > 0 && this.successes === 0) {
      // keep the upstream status so an outage stays retryable
      const status = this.lastError instanceof ExternalServiceError ? this.lastError.status : undefined;
      throw new ExternalServiceError('llm', `${writer}: language model failed on every call`, {
        status,
        cause: this.lastError,
      });
    }
  }
}

export interface NarrativeInput {
  payload: IntakePayload;
  prompt: RenderedPrompt;
  insights: DocInsights;
}

export class NarrativeAgent extends BaseAgent<NarrativeInput, NarrativeResponse> {
  private generators: Map<StoryMode, NarrativeGenerator>;

  constructor(generators: NarrativeGenerator[], retryPolicy: RetryPolicy = {}) {
    super({ name: 'NarrativeAgent', retries: Config.AGENT_RETRIES, ...retryPolicy });
    this.generators = new Map(generators.map(g => [g.mode, g]));
  }

  protected async process(input: NarrativeInput): Promise<NarrativeResponse> {
    const generator = this.generators.get(input.payload.mode);
    if (!generator) {
      throw new ValidationError(`No narrative generator for mode: ${input.payload.mode}`);
    }

    return generator.generate({
      prompt: input.prompt,
      insights: input.insights,
      slideCount: input.payload.slide_count,
      templateKey: input.payload.template_key,
      category: input.payload.category,
    });
  }
}
