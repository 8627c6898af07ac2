/**
 * Intake Agent - Normalizes raw request fields into a frozen IntakePayload
 */

import { z } from 'zod';
import { BaseAgent } from './base';
import { IMAGE_SOURCES, IntakePayload, STORY_MODES, StoryCreateRequest } from '../types';
import { ValidationError } from '../errors';
import { InputDetector } from '../tools/input-detector';
import { TEMPLATE_KEY_PATTERN } from '../tools/html-renderer';
import { Logger, isHttpUrl } from '../utils';

export const MIN_SLIDES = 4;
export const MAX_SLIDES = 10;

const optionalText = z
  .string()
  .nullish()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

export const storyRequestSchema = z.object({
  mode: z.preprocess(
    value => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(STORY_MODES)
  ),
  template_key: z.string().trim().regex(TEMPLATE_KEY_PATTERN, 'template_key may only contain letters, digits, _ and -'),
  slide_count: z.coerce.number().int().min(MIN_SLIDES).max(MAX_SLIDES),
  category: optionalText,
  user_input: optionalText,
  text_prompt: optionalText,
  notes: optionalText,
  urls: z.array(z.string()).nullish().transform(value => value ?? []),
  attachments: z.array(z.string()).nullish().transform(value => value ?? []),
  prompt_keywords: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform(value => {
      const items = typeof value === 'string' ? value.split(',') : value ?? [];
      return items.map(k => k.trim()).filter(k => k.length > 0);
    }),
  image_source: z.enum(IMAGE_SOURCES).nullish().transform(value => value ?? null),
  voice_engine: optionalText,
  metadata: z.record(z.unknown()).nullish().transform(value => value ?? {}),
});

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

function freeze(payload: IntakePayload): IntakePayload {
  Object.freeze(payload.urls);
  Object.freeze(payload.attachments);
  Object.freeze(payload.prompt_keywords);
  Object.freeze(payload.metadata);
  return Object.freeze(payload);
}

/**
 * Derived copy of a payload with extra metadata. The original is untouched.
 */
export function withMetadata(payload: IntakePayload, extra: Record<string, unknown>): IntakePayload {
  return freeze({
    ...payload,
    urls: [...payload.urls],
    attachments: [...payload.attachments],
    prompt_keywords: [...payload.prompt_keywords],
    metadata: { ...payload.metadata, ...extra },
  });
}

export class IntakeAgent extends BaseAgent<StoryCreateRequest, IntakePayload> {
  private detector: InputDetector;

  constructor(detector: InputDetector = new InputDetector()) {
    super({ name: 'IntakeAgent' });
    this.detector = detector;
  }

  protected async process(input: StoryCreateRequest): Promise<IntakePayload> {
    return this.normalize(input);
  }

  normalize(input: unknown): IntakePayload {
    const parsed = storyRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid story request', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const request = parsed.data;
    let textPrompt = request.text_prompt;
    let notes = request.notes;
    const urls = [...request.urls];
    const attachments = [...request.attachments];

    if (request.user_input) {
      const detected = this.detector.detect(request.user_input);
      Logger.info('Unified input detected', { kind: detected.kind, urls: detected.urls.length });

      switch (detected.kind) {
        case 'url':
          urls.push(...detected.urls);
          break;
        case 'mixed':
          urls.push(...detected.urls);
          notes = notes ? `${notes}\n${detected.text}` : detected.text;
          break;
        case 'file':
          if (detected.filePath) {
            attachments.push(detected.filePath);
          }
          break;
        case 'text':
          textPrompt = textPrompt || detected.text || undefined;
          break;
      }
    }

    const validUrls = unique(urls.map(u => u.trim()).filter(isHttpUrl));
    if (validUrls.length < urls.length) {
      Logger.debug('Dropped invalid or duplicate URLs', { received: urls.length, kept: validUrls.length });
    }

    return freeze({
      text_prompt: textPrompt,
      notes,
      urls: validUrls,
      attachments: unique(attachments.map(a => a.trim()).filter(a => a.length > 0)),
      prompt_keywords: request.prompt_keywords,
      mode: request.mode,
      template_key: request.template_key,
      slide_count: request.slide_count,
      category: request.category,
      image_source: request.image_source,
      voice_engine: request.voice_engine,
      metadata: request.metadata,
    });
  }
}
