/**
 * News Writer - Classification, slide structure, then per-slide narration
 */

import { NarrativeResponse, NewsClassification, SlideBlock } from '../types';
import type { LanguageModel } from '../tools/llm';
import { recoverJsonObject, stringField, objectArrayField } from '../tools/json-recovery';
import { languageName, languageScript } from '../tools/language-detection';
import { extractUrlKeywords } from '../tools/url-validator';
import { filterNegativeSentences } from '../tools/content-filter';
import { Logger, errorMessage, shortenAtWord, stripMarkdown } from '../utils';
import {
  NarrativeGenerator,
  NarrativeRequest,
  TrackedModel,
  baseLanguage,
  fitSlides,
  middleSlideCount,
  sourceText,
} from './narrative';

export interface SlideOutline {
  title: string;
  summary: string;
  image_prompt: string;
}

export const DEFAULT_CLASSIFICATION: NewsClassification = {
  category: 'News',
  subcategory: 'General',
  emotion: 'Neutral',
};

export const STORYTITLE_LIMIT = 80;
const NARRATION_LIMITS: Record<number, number> = { 1: 80, 2: 500, 3: 450, 4: 250, 5: 200 };
const DEFAULT_NARRATION_LIMIT = 200;
const MIN_CLASSIFIABLE_LENGTH = 50;
const ARTICLE_CONTEXT = 3000;
const FALLBACK_IMAGE_PROMPT = 'News story background';

// keyed by absolute slide position; the cover is position 1
const SLIDE_GUIDANCE: Record<number, string> = {
  2: 'state the core development: what happened, who is involved, and where.',
  3: 'give the context or build-up that led to this development.',
  4: 'present the key evidence, figures or official statements.',
  5: 'summarise reactions from the people and institutions affected.',
  6: 'explain the implications and what changes as a result.',
  7: 'close with the open questions and what to watch next.',
};
const DEFAULT_GUIDANCE = 'add further factual detail, supporting evidence, or expert insight while staying concise.';

export function narrationLimit(slideIndex: number): number {
  return NARRATION_LIMITS[slideIndex] ?? DEFAULT_NARRATION_LIMIT;
}

export function languageInstruction(code: string): string {
  const target = baseLanguage(code);
  if (target === 'en') {
    return 'Write in English only, even if the source is in another language.';
  }
  return `Write in ${languageName(target)} (${languageScript(target)} script). Use English only for proper nouns.`;
}

/**
 * Splits the article on sentence ends into `middleCount` groups.
 */
export function fallbackStructure(article: string, middleCount: number): SlideOutline[] {
  const sentences = article
    .split('. ')
    .map(s => s.trim())
    .filter(s => s.length > 0);
  const perSlide = Math.max(1, Math.floor(sentences.length / middleCount));

  return Array.from({ length: middleCount }, (_, i) => {
    const group = sentences.slice(i * perSlide, (i + 1) * perSlide).join('. ');
    const text = group || article.substring(0, 300) || `Slide ${i + 2}`;
    return {
      title: text.substring(0, 90),
      summary: text.substring(0, 300),
      image_prompt: FALLBACK_IMAGE_PROMPT,
    };
  });
}

export function headlineOf(article: string): string {
  const firstLine = article.split('\n').map(line => line.trim()).find(line => line.length > 0) ?? '';
  return firstLine.replace(/["“”]/g, '').trim() || article.substring(0, 100);
}

export class NewsWriter implements NarrativeGenerator {
  readonly mode = 'news' as const;

  constructor(private llm: LanguageModel) {}

  async generate(request: NarrativeRequest): Promise<NarrativeResponse> {
    const model = new TrackedModel(this.llm);
    const middleCount = middleSlideCount(request.slideCount);
    const language = request.prompt.metadata.language;
    const article = this.anchoredArticle(request);

    const detected = await this.classify(model, article);
    const classification: NewsClassification = request.category
      ? { ...detected, category: request.category }
      : detected;

    const outline = await this.structure(model, article, middleCount, language);
    const storytitle = await this.storytitle(model, article, language);
    model.assertReachable('news writer');

    const narrations: string[] = [];
    for (let idx = 0; idx < outline.length; idx++) {
      narrations.push(await this.narrate(model, outline[idx], idx + 2, article, language));
    }
    model.assertReachable('news writer');

    const slides: SlideBlock[] = [
      {
        placeholder_id: 'cover',
        text: storytitle,
        image_prompt: outline[0]?.image_prompt || FALLBACK_IMAGE_PROMPT,
      },
      ...outline.map((slide, idx) => ({
        placeholder_id: `slide_${idx + 1}`,
        text: narrations[idx],
        image_prompt: slide.image_prompt,
      })),
    ];

    const padding = fallbackStructure(article, middleCount);
    const deck = fitSlides(slides, middleCount + 1, index => ({
      placeholder_id: `slide_${index}`,
      text: shortenAtWord(padding[index - 1]?.summary ?? '', narrationLimit(index + 1)),
      image_prompt: FALLBACK_IMAGE_PROMPT,
    }));

    Logger.info('News story generated', {
      category: classification.category,
      middleCount,
      slides: deck.length,
      llm_calls: model.attempts,
      llm_failures: model.attempts - model.successes,
    });

    return {
      mode: this.mode,
      title: storytitle,
      slide_deck: {
        template_key: request.templateKey,
        language_code: language,
        slides: deck,
      },
      raw_output: JSON.stringify({ classification, storytitle, slides: outline, narrations }, null, 2),
      classification,
    };
  }

  /**
   * Source text without negative sentences, followed by the source URL's
   * topic words so the model stays on the article the reader asked for.
   */
  private anchoredArticle(request: NarrativeRequest): string {
    const article = filterNegativeSentences(sourceText(request.insights, request.prompt.user));
    const first = request.insights.semantic_chunks[0];
    if (!first || !/^https?:\/\//.test(first.source_id)) {
      return article;
    }
    const keywords = extractUrlKeywords(first.source_id).slice(0, 5);
    if (keywords.length === 0) {
      return article;
    }
    return `${article}\n\nIMPORTANT: The story must stay on the topic indicated by the source URL: ${keywords.join(', ')}.`;
  }

  private async classify(model: LanguageModel, article: string): Promise<NewsClassification> {
    if (article.trim().length < MIN_CLASSIFIABLE_LENGTH) {
      return { ...DEFAULT_CLASSIFICATION };
    }

    try {
      const response = await model.complete(
        'You are a news desk editor. Classify articles. Respond with JSON only.',
        'Classify this article and return {"category": "...", "subcategory": "...", "emotion": "..."}.\n' +
          'category is a broad desk such as Politics, Business, Sports, Technology, Science, Health, Entertainment, World.\n' +
          'emotion is the dominant tone, e.g. Neutral, Hopeful, Tense, Sad, Celebratory.\n\n' +
          `ARTICLE:\n${article.substring(0, ARTICLE_CONTEXT)}`,
        { json: true, temperature: 0.2, maxTokens: 200 }
      );
      const parsed = recoverJsonObject(response);
      const category = parsed ? stringField(parsed, 'category') : '';
      const subcategory = parsed ? stringField(parsed, 'subcategory') : '';
      const emotion = parsed ? stringField(parsed, 'emotion') : '';
      if (category && subcategory && emotion) {
        return { category, subcategory, emotion };
      }
      Logger.warn('Classification response incomplete, using defaults');
    } catch (error) {
      Logger.warn('Classification failed, using defaults', { error: errorMessage(error) });
    }
    return { ...DEFAULT_CLASSIFICATION };
  }

  private async structure(
    model: LanguageModel,
    article: string,
    middleCount: number,
    language: string
  ): Promise<SlideOutline[]> {
    const guidance = Array.from({ length: middleCount }, (_, i) => {
      const position = i + 2;
      return `- Slide ${position}: ${SLIDE_GUIDANCE[position] ?? DEFAULT_GUIDANCE}`;
    }).join('\n');

    const fallback = fallbackStructure(article, middleCount);
    try {
      const response = await model.complete(
        'You plan factual news web stories. Respond with JSON only.',
        `Plan EXACTLY ${middleCount} slides for this article. ${languageInstruction(language)}\n` +
          'image_prompt must always be in English and describe a photo-realistic editorial scene with no text or logos.\n' +
          `Slide guidance:\n${guidance}\n\n` +
          'Return {"slides": [{"title": "...", "summary": "...", "image_prompt": "..."}]}\n\n' +
          `ARTICLE:\n${article.substring(0, ARTICLE_CONTEXT)}`,
        { json: true, temperature: 0.4 }
      );
      const parsed = recoverJsonObject(response);
      const slides = parsed
        ? objectArrayField(parsed, 'slides')
            .map(slide => ({
              title: stringField(slide, 'title'),
              summary: stringField(slide, 'summary'),
              image_prompt: stringField(slide, 'image_prompt') || FALLBACK_IMAGE_PROMPT,
            }))
            .filter(slide => slide.title || slide.summary)
        : [];

      if (slides.length > 0) {
        // short plans are topped up from the sentence split
        return fallback.map((entry, i) => slides[i] ?? entry);
      }
      Logger.warn('Slide structure unusable, splitting article instead');
    } catch (error) {
      Logger.warn('Slide structure generation failed, splitting article instead', { error: errorMessage(error) });
    }
    return fallback;
  }

  private async storytitle(model: LanguageModel, article: string, language: string): Promise<string> {
    const headline = headlineOf(article);
    try {
      const response = await model.complete(
        'You write cover lines for news web stories. Plain text only, no quotes or markdown.',
        `Write one cover line of at most ${STORYTITLE_LIMIT} characters for this story. ${languageInstruction(language)}\n\n` +
          `HEADLINE: ${headline}\n\nARTICLE:\n${article.substring(0, 1500)}`,
        { temperature: 0.5, maxTokens: 100 }
      );
      const title = shortenAtWord(stripMarkdown(response), STORYTITLE_LIMIT);
      if (title) {
        return title;
      }
    } catch (error) {
      Logger.warn('Storytitle generation failed, using headline', { error: errorMessage(error) });
    }
    return shortenAtWord(headline, STORYTITLE_LIMIT) || 'Breaking News Story';
  }

  private async narrate(
    model: LanguageModel,
    slide: SlideOutline,
    slideIndex: number,
    article: string,
    language: string
  ): Promise<string> {
    const limit = narrationLimit(slideIndex);
    try {
      const response = await model.complete(
        'You narrate news web story slides. Be factual and neutral. Plain text only, no markdown.',
        `Write the narration for slide ${slideIndex} in at most ${limit} characters. ${languageInstruction(language)}\n` +
          `Slide title: ${slide.title}\nSlide summary: ${slide.summary}\n\n` +
          `ARTICLE CONTEXT:\n${article.substring(0, 1500)}`,
        { temperature: 0.5, maxTokens: 400 }
      );
      const narration = shortenAtWord(stripMarkdown(response), limit);
      if (narration) {
        return narration;
      }
    } catch (error) {
      Logger.warn('Narration failed, using slide summary', { slide: slideIndex, error: errorMessage(error) });
    }
    return shortenAtWord(slide.summary, limit) || 'Unable to generate narration for this slide.';
  }
}
