/**
 * Curious Writer - Single-pass structured generation of explanatory stories
 */

import { NarrativeResponse, SlideBlock } from '../types';
import { ExternalServiceError } from '../errors';
import type { LanguageModel } from '../tools/llm';
import { recoverJsonObject, stringField, JsonObject } from '../tools/json-recovery';
import { languageName, languageScript } from '../tools/language-detection';
import { Logger, stripMarkdown, errorMessage } from '../utils';
import {
  GENERIC_ALT,
  NarrativeGenerator,
  NarrativeRequest,
  baseLanguage,
  fitSlides,
  middleSlideCount,
  sourceText,
} from './narrative';

export const COVER_TEXT_LIMIT = 180;
const SOURCE_LIMIT = 3000;
const PARAGRAPH_LIMITS = [500, 450, 400, 350, 300, 250];

function buildSystemPrompt(target: string, middleCount: number): string {
  const name = languageName(target);
  const script = languageScript(target);
  const limits = Array.from({ length: middleCount }, (_, i) =>
    `   - s${i + 1}paragraph1: <= ${PARAGRAPH_LIMITS[i] ?? 250} characters`
  ).join('\n');
  const keys = [
    `  "language": "${target}"`,
    '  "storytitle": "..."',
    '  "s0alt1": "..."',
    ...Array.from({ length: middleCount }, (_, i) => `  "s${i + 1}paragraph1": "..."`),
    ...Array.from({ length: middleCount }, (_, i) => `  "s${i + 1}alt1": "..."`),
  ].join(',\n');

  return `
You are a multilingual teaching assistant.

LANGUAGE REQUIREMENTS:
- Target language code = "${target}" (${name}, ${script} script).
- storytitle and every s{i}paragraph1 MUST be written in ${name}.
- Image prompts (s0alt1, s1alt1, ...) MUST ALWAYS be in English.
- Do NOT use markdown formatting. Plain text only.
- Generate EXACTLY ${middleCount} slides (s1paragraph1 through s${middleCount}paragraph1).

Your job:
1) Write a short, catchy title as storytitle (<= 80 characters).
2) Summarise the content into EXACTLY ${middleCount} slides within these limits:
${limits}
3) For the cover (s0alt1) and each slide (s1alt1..s${middleCount}alt1) write an English image prompt:
   flat vector illustration, bright colors, clean lines, family-friendly, no text, captions or logos.
4) Keep content factual, educational and accessible. Reinterpret unsafe themes into safe, inclusive content.

Respond with a single JSON object:
{
${keys}
}
`.trim();
}

export class CuriousWriter implements NarrativeGenerator {
  readonly mode = 'curious' as const;

  constructor(private llm: LanguageModel) {}

  async generate(request: NarrativeRequest): Promise<NarrativeResponse> {
    const target = baseLanguage(request.prompt.metadata.language);
    const middleCount = middleSlideCount(request.slideCount);
    const source = sourceText(request.insights, 'No content provided.');

    const userPrompt =
      `${request.prompt.user}\n\nSOURCE INPUT:\n${source.substring(0, SOURCE_LIMIT)}\n\n` +
      `Return only the JSON object described above. Include EXACTLY ${middleCount} slides.`;

    let raw: string;
    try {
      raw = await this.llm.complete(buildSystemPrompt(target, middleCount), userPrompt, { json: true });
    } catch (error) {
      // nothing to build a story from without the primary completion
      throw error instanceof ExternalServiceError
        ? error
        : new ExternalServiceError('llm', 'curious generation failed', { cause: error });
    }

    const parsed = recoverJsonObject(raw);
    if (!parsed) {
      Logger.warn('Curious output was not valid JSON, using minimal structure', { preview: raw.substring(0, 300) });
    }
    const fields: JsonObject = parsed ?? { storytitle: source.substring(0, 80) };

    const paragraphs = Array.from({ length: middleCount }, (_, i) =>
      stripMarkdown(stringField(fields, `s${i + 1}paragraph1`))
    );

    let title = stripMarkdown(stringField(fields, 'storytitle'));
    if (!title) {
      title = paragraphs[0].substring(0, 60).replace(/^[\s.,-]+|[\s.,-]+$/g, '') || 'Educational Story';
    }
    if (!paragraphs[0]) {
      paragraphs[0] = title.substring(0, 500);
    }

    const coverAlt = stringField(fields, 's0alt1') || await this.coverAlt(title, target);
    const slideAlts: string[] = [];
    for (let i = 0; i < middleCount; i++) {
      slideAlts.push(stringField(fields, `s${i + 1}alt1`) || await this.slideAlt(paragraphs[i] || title, target, i + 1));
    }

    const slides: SlideBlock[] = [
      { placeholder_id: 'cover', text: title.substring(0, COVER_TEXT_LIMIT), image_prompt: coverAlt },
      ...paragraphs.map((paragraph, i) => ({
        placeholder_id: `slide_${i + 1}`,
        text: paragraph || `Slide ${i + 1} content`,
        image_prompt: slideAlts[i],
      })),
    ];

    const deck = fitSlides(slides, middleCount + 1, index => ({
      placeholder_id: `slide_${index}`,
      text: `Slide ${index} content`,
      image_prompt: GENERIC_ALT,
    }));

    const result: JsonObject = { language: target, storytitle: title, s0alt1: coverAlt };
    paragraphs.forEach((paragraph, i) => {
      result[`s${i + 1}paragraph1`] = paragraph;
      result[`s${i + 1}alt1`] = slideAlts[i];
    });

    Logger.info('Curious story generated', { middleCount, slides: deck.length });

    return {
      mode: this.mode,
      title,
      slide_deck: {
        template_key: request.templateKey,
        language_code: request.prompt.metadata.language,
        slides: deck,
      },
      raw_output: JSON.stringify(result, null, 2),
    };
  }

  private async coverAlt(title: string, target: string): Promise<string> {
    if (target === 'en') {
      return `Cover for the story titled '${title}': welcoming, abstract, educational motif — ${GENERIC_ALT}`;
    }
    const description = await this.toEnglish(
      `Convert this story title to a brief English description for an image prompt (max 50 words).\n` +
      `Title: ${title}\nOriginal Language: ${target}\n\n` +
      'Return only the English description that captures the visual essence of the story, no quotes or labels.'
    );
    return description
      ? `Cover illustration for story about ${description}: welcoming, abstract, educational motif — ${GENERIC_ALT}`
      : `Educational story cover illustration, welcoming, abstract, positive theme — ${GENERIC_ALT}`;
  }

  private async slideAlt(seed: string, target: string, index: number): Promise<string> {
    if (!seed) {
      return GENERIC_ALT;
    }
    if (target === 'en') {
      return `${seed} — ${GENERIC_ALT}`;
    }
    const description = await this.toEnglish(
      `Convert this story content to a brief English description for an image prompt (max 30 words).\n` +
      `Content: ${seed.substring(0, 200)}\nOriginal Language: ${target}\n\n` +
      'Return only the English description that captures the visual essence, no quotes or labels.',
      index
    );
    return description ? `${description} — ${GENERIC_ALT}` : GENERIC_ALT;
  }

  /** Returns '' when the translation is unusable or the call fails. */
  private async toEnglish(prompt: string, slide?: number): Promise<string> {
    try {
      const response = await this.llm.complete(
        'You are a translator. Convert story text to English descriptions for image generation.',
        prompt,
        { maxTokens: 200 }
      );
      const description = response.trim().replace(/^["']+|["']+$/g, '').trim();
      return description.length > 10 ? description : '';
    } catch (error) {
      Logger.warn('Alt text translation failed', { slide, error: errorMessage(error) });
      return '';
    }
  }
}
