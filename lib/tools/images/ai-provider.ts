/**
 * AI image provider - generated backgrounds with cooldown, backoff and a
 * content-policy prompt ladder
 */

import OpenAI from 'openai';
import { Config } from '../../config';
import { ExternalServiceError } from '../../errors';
import { IntakePayload, SlideBlock, StoryMode } from '../../types';
import { Logger, errorMessage, sleep } from '../../utils';
import { codeOf, createImage, statusOf } from '../../utils/openai-helper';
import type { LanguageModel } from '../llm';
import { CooldownLimiter, imageCooldown } from './cooldown';
import { GENERIC_ALT, SafePromptLadder, genericSafePrompt, removeUnsafeTerms, slideVariation } from './safe-prompts';
import { ImageContent, ImageProvider, ImageRequest } from './types';

const MAX_BACKOFF_MS = 60000;
const IMAGE_SIZES = ['1024x1024', '1792x1024', '1024x1792'] as const;
type ImageSize = (typeof IMAGE_SIZES)[number];

export interface GeneratedImage {
  data: Buffer;
  revised_prompt?: string;
}

export interface ImageModel {
  generate(prompt: string): Promise<GeneratedImage>;
}

/** The image service refused the prompt on content grounds. */
export class ContentPolicyError extends ExternalServiceError {
  constructor(
    message: string,
    public revisedPrompt?: string,
    cause?: unknown
  ) {
    super('images', message, { status: 400, cause });
    this.name = 'ContentPolicyError';
  }
}

function revisedPromptOf(error: unknown): string | undefined {
  if (!(error instanceof OpenAI.APIError)) {
    return undefined;
  }
  const body = error.error;
  if (typeof body === 'object' && body !== null && 'inner_error' in body) {
    const inner = body.inner_error;
    if (typeof inner === 'object' && inner !== null && 'revised_prompt' in inner && typeof inner.revised_prompt === 'string') {
      return inner.revised_prompt;
    }
  }
  return undefined;
}

function isContentPolicy(error: unknown): boolean {
  return codeOf(error) === 'content_policy_violation' || /content[_ ]policy|safety system/i.test(errorMessage(error));
}

function imageSize(value: string): ImageSize {
  return IMAGE_SIZES.find(size => size === value) ?? '1024x1792';
}

export class OpenAIImageModel implements ImageModel {
  constructor(
    private client: OpenAI,
    private model: string = Config.OPENAI_IMAGE_MODEL,
    private size: ImageSize = imageSize(Config.IMAGE_SIZE)
  ) {}

  async generate(prompt: string): Promise<GeneratedImage> {
    try {
      const response = await createImage(this.client, {
        model: this.model,
        prompt,
        n: 1,
        size: this.size,
        response_format: 'b64_json',
      });
      const image = response.data?.[0];
      if (!image?.b64_json) {
        throw new ExternalServiceError('images', 'empty image response');
      }
      return { data: Buffer.from(image.b64_json, 'base64'), revised_prompt: image.revised_prompt };
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      const status = statusOf(error);
      if (status === 400 && isContentPolicy(error)) {
        throw new ContentPolicyError(errorMessage(error), revisedPromptOf(error), error);
      }
      throw new ExternalServiceError('images', 'image generation failed', { status, cause: error });
    }
  }
}

export interface AiImageProviderOptions {
  /** Used to describe slides that carry no image prompt of their own. */
  llm?: LanguageModel;
  cooldown?: CooldownLimiter;
  maxAttempts?: number;
  wait?: (ms: number) => Promise<void>;
}

export function buildImagePrompt(alt: string, slideIndex: number, mode: StoryMode): string {
  if (mode === 'curious') {
    return alt.includes(GENERIC_ALT) ? alt : `${alt} — ${GENERIC_ALT}`;
  }
  const safe = removeUnsafeTerms(alt) || genericSafePrompt(slideIndex);
  return `${safe}, professional news illustration for slide ${slideIndex + 1}, ${slideVariation(slideIndex)}, no text or logos`;
}

export class AiImageProvider implements ImageProvider {
  readonly source = 'ai';
  private cooldown: CooldownLimiter;
  private maxAttempts: number;
  private wait: (ms: number) => Promise<void>;

  constructor(
    private model: ImageModel,
    private options: AiImageProviderOptions = {}
  ) {
    this.cooldown = options.cooldown ?? imageCooldown;
    this.maxAttempts = options.maxAttempts ?? Config.IMAGE_MAX_ATTEMPTS;
    this.wait = options.wait ?? sleep;
  }

  supports(payload: IntakePayload): boolean {
    return payload.image_source === 'ai';
  }

  async generate({ deck, payload }: ImageRequest): Promise<ImageContent[]> {
    const contents: ImageContent[] = [];
    let lastGood: Buffer | undefined;

    for (let i = 0; i < deck.slides.length; i++) {
      const slide = deck.slides[i];
      if (slide.image_url) {
        continue;
      }

      const alt = await this.altText(slide, payload, i);
      const image = await this.generateWithLadder(buildImagePrompt(alt, i, payload.mode), alt, i);

      if (image) {
        lastGood = image;
        contents.push({ slide_index: i, source_kind: 'generated', contentType: 'image/png', data: image, description: alt });
      } else if (lastGood) {
        Logger.warn('Image attempts exhausted, reusing previous image', { slide: i });
        contents.push({ slide_index: i, source_kind: 'generated', contentType: 'image/png', data: lastGood, description: alt });
      } else {
        Logger.warn('Image attempts exhausted and no earlier image to reuse, skipping slide', { slide: i });
      }
    }

    return contents;
  }

  /**
   * Slide prompt from the narrative, then user keywords, then a model
   * description, then the slide text itself.
   */
  async altText(slide: SlideBlock, payload: IntakePayload, index: number): Promise<string> {
    if (slide.image_prompt?.trim()) {
      return slide.image_prompt.trim();
    }
    if (payload.prompt_keywords.length > 0) {
      return payload.prompt_keywords.join(', ');
    }
    if (this.options.llm && slide.text.trim()) {
      try {
        const description = await this.options.llm.complete(
          'You write short English prompts for illustrations. No text or logos in the image.',
          `Describe one illustration for this slide in under 30 words:\n${slide.text.substring(0, 500)}`,
          { temperature: 0.5, maxTokens: 80 }
        );
        if (description.trim()) {
          return description.trim();
        }
      } catch (error) {
        Logger.warn('Alt text generation failed, using slide text', { slide: index, error: errorMessage(error) });
      }
    }
    return slide.text.trim() || 'Visual concept';
  }

  private async generateWithLadder(prompt: string, topic: string, slideIndex: number): Promise<Buffer | null> {
    const ladder = new SafePromptLadder(topic, prompt, slideIndex);
    let current = prompt;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        const result = await this.cooldown.schedule(() => this.model.generate(current));
        return result.data;
      } catch (error) {
        if (error instanceof ContentPolicyError) {
          const next = ladder.next(error.revisedPrompt);
          if (next === null) {
            Logger.warn('Prompt ladder exhausted', { slide: slideIndex });
            return null;
          }
          Logger.warn('Prompt rejected by content policy, retrying with a safer prompt', { slide: slideIndex, attempt });
          current = next;
          continue;
        }
        if (error instanceof ExternalServiceError && error.status === 429) {
          const delay = Math.min(Math.pow(2, attempt) * 2000, MAX_BACKOFF_MS);
          Logger.warn('Image generation rate limited, backing off', { slide: slideIndex, attempt, delayMs: delay });
          await this.wait(delay);
          continue;
        }
        Logger.warn('Image generation failed', { slide: slideIndex, attempt, error: errorMessage(error) });
        return null;
      }
    }
    return null;
  }
}
