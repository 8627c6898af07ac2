/**
 * Image Director Agent - Picks an image provider and stores one background per slide
 */

import { BaseAgent } from './base';
import { ImageAsset, IntakePayload, SlideDeck } from '../types';
import { ImageContent, ImageProvider } from '../tools/images/types';
import { ImageStorageService } from '../tools/images/image-storage';
import { Logger, errorMessage } from '../utils';

export interface ImageAgentInput {
  deck: SlideDeck;
  payload: IntakePayload;
  articleImages: readonly string[];
}

export class ImageAgent extends BaseAgent<ImageAgentInput, ImageAsset[]> {
  constructor(
    private providers: ImageProvider[],
    private storage: ImageStorageService
  ) {
    super({ name: 'ImageAgent' });
  }

  protected async process(input: ImageAgentInput): Promise<ImageAsset[]> {
    return this.run(input);
  }

  /**
   * Never throws: a failing provider yields no images and a failing slide is
   * left out. Assets come back ordered by slide index, at most one per slide.
   */
  async run({ deck, payload, articleImages }: ImageAgentInput): Promise<ImageAsset[]> {
    const provider = this.providers.find(p => p.supports(payload, articleImages));
    if (!provider) {
      Logger.info('No image provider for this story', { image_source: payload.image_source, mode: payload.mode });
      return [];
    }

    let contents: ImageContent[];
    try {
      contents = await provider.generate({ deck, payload, articleImages });
    } catch (error) {
      Logger.warn('Image provider failed', { provider: provider.source, error: errorMessage(error) });
      return [];
    }

    const bySlide = new Map<number, ImageContent>();
    for (const content of contents) {
      const inDeck = Number.isInteger(content.slide_index) && content.slide_index >= 0 && content.slide_index < deck.slides.length;
      if (inDeck && !bySlide.has(content.slide_index)) {
        bySlide.set(content.slide_index, content);
      }
    }

    const assets: ImageAsset[] = [];
    for (const index of Array.from(bySlide.keys()).sort((a, b) => a - b)) {
      const content = bySlide.get(index);
      if (!content) {
        continue;
      }
      try {
        assets.push(await this.storage.store(content, provider.source));
      } catch (error) {
        Logger.warn('Image storage failed', { slide: index, error: errorMessage(error) });
      }
    }

    Logger.info('Images ready', { provider: provider.source, stored: assets.length, slides: deck.slides.length });
    return assets;
  }
}
