/**
 * Fallback providers: the news default and images found in source articles
 */

import { IntakePayload } from '../../types';
import { Logger, errorMessage } from '../../utils';
import { BinaryResponse } from '../http';
import { Downloader, ImageContent, ImageProvider, ImageRequest, httpDownloader } from './types';

/**
 * News stories without an image source use the template's static
 * backgrounds, so nothing is produced here.
 */
export class NewsDefaultProvider implements ImageProvider {
  readonly source = 'news-default';

  supports(payload: IntakePayload): boolean {
    return payload.mode === 'news' && payload.image_source === null;
  }

  async generate(): Promise<ImageContent[]> {
    return [];
  }
}

export class ArticleImageProvider implements ImageProvider {
  readonly source = 'article';

  constructor(private download: Downloader = httpDownloader) {}

  supports(_payload: IntakePayload, articleImages: readonly string[]): boolean {
    return articleImages.length > 0;
  }

  async generate({ deck, articleImages }: ImageRequest): Promise<ImageContent[]> {
    const contents: ImageContent[] = [];
    const fetched = new Map<string, BinaryResponse>();

    for (let i = 0; i < deck.slides.length; i++) {
      if (deck.slides[i].image_url) {
        continue;
      }
      const url = articleImages[i % articleImages.length];
      try {
        let image = fetched.get(url);
        if (!image) {
          image = await this.download(url);
          fetched.set(url, image);
        }
        contents.push({
          slide_index: i,
          source_kind: 'http',
          contentType: image.contentType,
          data: image.data,
          description: 'Image from source article',
        });
      } catch (error) {
        Logger.warn('Article image download failed', { slide: i, url, error: errorMessage(error) });
      }
    }
    return contents;
  }
}
