/**
 * Article extraction - fetches a page and pulls out title, body text and images
 */

import * as cheerio from 'cheerio';
import { HttpTool } from './http';
import { Logger, cleanText, splitSentences, errorMessage } from '../utils';

export interface ArticleExtraction {
  title: string;
  text: string;
  summary: string;
  top_image_url?: string;
  images: string[];
}

export interface ArticleExtractor {
  extract(url: string): Promise<ArticleExtraction | null>;
}

const NOISE_SELECTORS = 'script, style, noscript, nav, footer, header, aside, form, iframe, .ads, .advertisement, .related, .share';
const BODY_SELECTORS = ['article', 'main', '[itemprop="articleBody"]', '.article-body', '.story-content', '.entry-content', 'body'];
const MAX_IMAGES = 10;

/**
 * Up to three leading sentences while the joined summary stays within 300
 * characters; falls back to a hard cut when the first sentence is too long.
 */
export function summarize(text: string, maxLength = 300): string {
  const parts: string[] = [];
  for (const sentence of splitSentences(text).slice(0, 3)) {
    const candidate = [...parts, sentence].join(' ');
    if (candidate.length > maxLength) {
      break;
    }
    parts.push(sentence);
  }
  return parts.length > 0 ? parts.join(' ') : cleanText(text).substring(0, maxLength);
}

function absolutize(src: string | undefined, baseUrl: string): string | null {
  if (!src || src.startsWith('data:')) {
    return null;
  }
  try {
    return new URL(src, baseUrl).toString();
  } catch {
    return null;
  }
}

export class CheerioArticleExtractor implements ArticleExtractor {
  constructor(private timeoutMs = 15000) {}

  async extract(url: string): Promise<ArticleExtraction | null> {
    try {
      Logger.info('Starting article extraction', { url });
      const response = await HttpTool.fetch(url, { timeout: this.timeoutMs, maxRetries: 2 });
      const result = this.parse(response.text, response.url || url);
      Logger.info('Article extracted', {
        url,
        title: result.title,
        textLength: result.text.length,
        images: result.images.length,
      });
      return result;
    } catch (error) {
      Logger.warn('Article extraction failed', { url, error: errorMessage(error) });
      return null;
    }
  }

  parse(html: string, baseUrl: string): ArticleExtraction {
    const $ = cheerio.load(html);

    const title = cleanText(
      $('meta[property="og:title"]').attr('content') ||
      $('title').first().text() ||
      $('h1').first().text()
    );

    const topImage = absolutize($('meta[property="og:image"]').attr('content'), baseUrl) || undefined;

    $(NOISE_SELECTORS).remove();

    let text = '';
    for (const selector of BODY_SELECTORS) {
      const container = $(selector).first();
      if (container.length === 0) {
        continue;
      }
      const paragraphs = container
        .find('p')
        .map((_, el) => cleanText($(el).text()))
        .get()
        .filter(p => p.length > 0);
      text = paragraphs.length > 0 ? paragraphs.join('\n\n') : cleanText(container.text());
      if (text.length > 0) {
        break;
      }
    }

    const images: string[] = [];
    $('img').each((_, el) => {
      const src = absolutize($(el).attr('src'), baseUrl);
      if (src && !images.includes(src) && images.length < MAX_IMAGES) {
        images.push(src);
      }
    });

    return {
      title: title || 'Untitled Article',
      text,
      summary: summarize(text),
      top_image_url: topImage,
      images,
    };
  }
}
