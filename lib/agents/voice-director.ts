/**
 * Voice Director Agent - One narration clip per slide
 */

import { BaseAgent } from './base';
import { SlideDeck, VoiceAsset } from '../types';
import { Config } from '../config';
import { AudioTool } from '../tools/audio';
import type { TtsProvider } from '../tools/tts';
import type { ObjectStorage } from '../tools/storage';
import { Crypto, Logger, errorMessage, sleep } from '../utils';

export interface VoiceAgentInput {
  deck: SlideDeck;
  language: string;
  providerId?: string;
}

export interface VoiceAgentOptions {
  prefix?: string;
  delayMs?: number;
  placeholderUrl?: string;
  wait?: (ms: number) => Promise<void>;
}

export class VoiceAgent extends BaseAgent<VoiceAgentInput, VoiceAsset[]> {
  private prefix: string;
  private delayMs: number;
  private placeholderUrl: string;
  private wait: (ms: number) => Promise<void>;

  constructor(
    private providers: TtsProvider[],
    private storage: ObjectStorage,
    options: VoiceAgentOptions = {}
  ) {
    super({ name: 'VoiceAgent' });
    this.prefix = (options.prefix ?? Config.S3_PREFIX_AUDIO).replace(/\/+$/, '');
    this.delayMs = options.delayMs ?? Config.SLIDE_DELAY_MS;
    this.placeholderUrl = options.placeholderUrl ?? Config.PLACEHOLDER_AUDIO_URL;
    this.wait = options.wait ?? sleep;
  }

  protected async process(input: VoiceAgentInput): Promise<VoiceAsset[]> {
    return this.run(input);
  }

  /**
   * Returns exactly one asset per slide, in slide order, once a provider
   * matches. Renderers index into the list by slide position.
   */
  async run({ deck, language, providerId }: VoiceAgentInput): Promise<VoiceAsset[]> {
    const requested = providerId || Config.DEFAULT_VOICE_PROVIDER;
    const provider = this.providers.find(p => p.supports(requested));
    if (!provider) {
      Logger.info('No voice provider matches, story will have no audio', { provider: requested });
      return [];
    }

    const assets: VoiceAsset[] = [];
    for (let i = 0; i < deck.slides.length; i++) {
      if (i > 0 && this.delayMs > 0) {
        await this.wait(this.delayMs);
      }
      assets.push(await this.synthesizeSlide(provider, deck.slides[i].text, language, i));
    }

    Logger.info('Narration ready', {
      provider: provider.name,
      slides: deck.slides.length,
      placeholders: assets.filter(a => a.provider === 'placeholder').length,
    });
    return assets;
  }

  private async synthesizeSlide(provider: TtsProvider, text: string, language: string, index: number): Promise<VoiceAsset> {
    try {
      const result = await provider.synthesize(AudioTool.speakableText(text), language);
      const key = `${this.prefix}/${Crypto.uuid()}.${result.format}`;
      const audio_url = await this.storage.put(key, result.audio, AudioTool.contentType(result.format));
      return {
        provider: provider.name,
        voice_id: result.voice_id,
        audio_url,
        duration_seconds: AudioTool.estimateDuration(result.audio, result.bitrateKbps),
      };
    } catch (error) {
      Logger.warn('Slide narration failed, using placeholder', { slide: index, error: errorMessage(error) });
      return { provider: 'placeholder', audio_url: this.placeholderUrl, duration_seconds: 0 };
    }
  }
}
