/**
 * TTS Tool - Text-to-speech provider contract and the OpenAI voice
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { ExternalServiceError } from '../errors';
import { Logger } from '../utils';
import { createSpeech, statusOf } from '../utils/openai-helper';
import type { AudioFormat } from './audio';

export interface SynthesisResult {
  audio: Buffer;
  format: AudioFormat;
  bitrateKbps: number;
  voice_id?: string;
}

export interface TtsProvider {
  /** Provider id recorded on every voice asset. */
  readonly name: string;
  supports(providerId: string): boolean;
  synthesize(text: string, language: string): Promise<SynthesisResult>;
}

const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
type OpenAiVoice = (typeof OPENAI_VOICES)[number];

function openAiVoice(value: string): OpenAiVoice {
  return OPENAI_VOICES.find(voice => voice === value) ?? 'nova';
}

export class OpenAiTtsProvider implements TtsProvider {
  readonly name = 'openai_tts';
  private client: OpenAI;
  private voice: OpenAiVoice;

  constructor(client?: OpenAI, voice: string = Config.OPENAI_TTS_VOICE) {
    this.client = client ?? new OpenAI({ apiKey: Config.OPENAI_API_KEY });
    this.voice = openAiVoice(voice);
  }

  supports(providerId: string): boolean {
    return providerId === this.name;
  }

  // the model picks the language up from the text itself
  async synthesize(text: string): Promise<SynthesisResult> {
    Logger.debug('OpenAI TTS call', { voice: this.voice, textLength: text.length });

    try {
      const response = await createSpeech(
        this.client,
        {
          model: 'tts-1-hd',
          voice: this.voice,
          input: text,
          response_format: 'mp3',
          speed: 0.95,
        },
        {
          maxRetries: 3,
          initialDelayMs: 2000,
          maxDelayMs: 15000,
          backoffMultiplier: 2,
        }
      );

      const audio = Buffer.from(await response.arrayBuffer());
      if (audio.length === 0) {
        throw new ExternalServiceError('openai_tts', 'empty audio buffer');
      }
      return { audio, format: 'mp3', bitrateKbps: 128, voice_id: this.voice };
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      throw new ExternalServiceError('openai_tts', 'speech synthesis failed', { status: statusOf(error), cause: error });
    }
  }
}
