/**
 * Pexels stock photo provider
 */

import { z } from 'zod';
import { Config } from '../../config';
import { ExternalServiceError } from '../../errors';
import { IntakePayload, SlideDeck } from '../../types';
import { Logger, errorMessage } from '../../utils';
import { HttpTool } from '../http';
import { Downloader, ImageContent, ImageProvider, ImageRequest, httpDownloader } from './types';
import stopwordList from '../../../data/stopwords.json';

const SEARCH_URL = 'https://api.pexels.com/v1/search';
export const CANDIDATES_PER_QUERY = 15;
const MAX_KEYWORDS = 2;
const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const searchResponseSchema = z.object({
  photos: z.array(
    z.object({
      alt: z.string().nullish(),
      src: z.object({
        portrait: z.string().optional(),
        large: z.string().optional(),
        original: z.string(),
      }),
    })
  ),
});

export interface StockPhoto {
  url: string;
  alt: string;
}

export type TextFetcher = (url: string, headers: Record<string, string>) => Promise<string>;

const httpText: TextFetcher = async (url, headers) => (await HttpTool.fetch(url, { headers, maxRetries: 2 })).text;

/** One or two stop-word-filtered words, cover text first. */
export function searchKeywords(deck: SlideDeck): string[] {
  const text = deck.slides.map(slide => slide.text).join(' ').toLowerCase();
  const keywords: string[] = [];
  for (const match of text.matchAll(/[a-z]{4,}/g)) {
    const word = match[0];
    if (!STOPWORDS.has(word) && !keywords.includes(word)) {
      keywords.push(word);
      if (keywords.length === MAX_KEYWORDS) {
        break;
      }
    }
  }
  return keywords;
}

export interface PexelsProviderOptions {
  apiKey?: string;
  fetchText?: TextFetcher;
  download?: Downloader;
}

export class PexelsImageProvider implements ImageProvider {
  readonly source = 'pexels';
  private apiKey: string;
  private fetchText: TextFetcher;
  private download: Downloader;

  constructor(options: PexelsProviderOptions = {}) {
    this.apiKey = options.apiKey ?? Config.PEXELS_API_KEY;
    this.fetchText = options.fetchText ?? httpText;
    this.download = options.download ?? httpDownloader;
  }

  supports(payload: IntakePayload): boolean {
    return payload.image_source === 'pexels';
  }

  async generate({ deck, payload }: ImageRequest): Promise<ImageContent[]> {
    const keywords = payload.prompt_keywords.length > 0
      ? payload.prompt_keywords.slice(0, MAX_KEYWORDS)
      : searchKeywords(deck);
    const query = keywords.join(' ') || 'news';

    const photos = await this.search(query);
    if (photos.length === 0) {
      Logger.warn('Pexels returned no photos', { query });
      return [];
    }

    const contents: ImageContent[] = [];
    for (let i = 0; i < deck.slides.length; i++) {
      if (deck.slides[i].image_url) {
        continue;
      }
      // a different candidate per slide, cycling when there are fewer photos
      const photo = photos[i % photos.length];
      try {
        const image = await this.download(photo.url);
        contents.push({
          slide_index: i,
          source_kind: 'stock',
          contentType: image.contentType,
          data: image.data,
          description: photo.alt || query,
        });
      } catch (error) {
        Logger.warn('Pexels photo download failed', { slide: i, url: photo.url, error: errorMessage(error) });
      }
    }
    return contents;
  }

  async search(query: string): Promise<StockPhoto[]> {
    if (!this.apiKey) {
      throw new ExternalServiceError('pexels', 'PEXELS_API_KEY is not configured');
    }
    const url = `${SEARCH_URL}?query=${encodeURIComponent(query)}&per_page=${CANDIDATES_PER_QUERY}&orientation=portrait`;
    const body: unknown = JSON.parse(await this.fetchText(url, { Authorization: this.apiKey }));
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError('pexels', 'unexpected search response');
    }
    return parsed.data.photos.map(photo => ({
      url: photo.src.portrait || photo.src.large || photo.src.original,
      alt: photo.alt || '',
    }));
  }
}
