/**
 * REST voices: ElevenLabs and Azure Speech
 */

import { Config } from '../config';
import { ExternalServiceError } from '../errors';
import { HttpError, HttpOptions, HttpTool, BinaryResponse } from './http';
import type { SynthesisResult, TtsProvider } from './tts';

export type AudioPoster = (url: string, options: HttpOptions) => Promise<BinaryResponse>;

const httpPoster: AudioPoster = (url, options) => HttpTool.fetchBuffer(url, { ...options, method: 'POST', timeout: 60000 });

function serviceError(service: string, error: unknown): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }
  const status = error instanceof HttpError ? error.status : undefined;
  return new ExternalServiceError(service, 'speech synthesis failed', { status, cause: error });
}

export interface ElevenLabsOptions {
  apiKey?: string;
  voiceId?: string;
  model?: string;
  post?: AudioPoster;
}

export class ElevenLabsTtsProvider implements TtsProvider {
  readonly name = 'elevenlabs_pro';
  private apiKey: string;
  private voiceId: string;
  private model: string;
  private post: AudioPoster;

  constructor(options: ElevenLabsOptions = {}) {
    this.apiKey = options.apiKey ?? Config.ELEVENLABS_API_KEY;
    this.voiceId = options.voiceId ?? Config.ELEVENLABS_VOICE_ID;
    this.model = options.model ?? Config.ELEVENLABS_MODEL;
    this.post = options.post ?? httpPoster;
  }

  supports(providerId: string): boolean {
    return providerId === this.name;
  }

  async synthesize(text: string, language: string): Promise<SynthesisResult> {
    if (!this.apiKey) {
      throw new ExternalServiceError(this.name, 'ELEVENLABS_API_KEY is not configured');
    }
    try {
      const response = await this.post(`https://api.elevenlabs.io/v1/text-to-speech/${this.voiceId}`, {
        headers: {
          'xi-api-key': this.apiKey,
          'Content-Type': 'application/json',
          Accept: 'audio/mpeg',
        },
        body: JSON.stringify({
          text,
          model_id: this.model,
          language_code: language.split('-')[0],
          voice_settings: { stability: 0.5, similarity_boost: 0.75 },
        }),
      });
      return { audio: response.data, format: 'mp3', bitrateKbps: 128, voice_id: this.voiceId };
    } catch (error) {
      throw serviceError(this.name, error);
    }
  }
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** xml:lang comes from the voice name, e.g. hi-IN-AaravNeural -> hi-IN. */
export function buildSsml(text: string, voice: string): string {
  const lang = voice.split('-').slice(0, 2).join('-');
  return (
    `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${lang}">` +
    `<voice name="${voice}">${escapeXml(text)}</voice>` +
    '</speak>'
  );
}

export interface AzureSpeechOptions {
  apiKey?: string;
  region?: string;
  voice?: string;
  post?: AudioPoster;
}

export class AzureTtsProvider implements TtsProvider {
  readonly name = 'azure_basic';
  private apiKey: string;
  private region: string;
  private voice: string;
  private post: AudioPoster;

  constructor(options: AzureSpeechOptions = {}) {
    this.apiKey = options.apiKey ?? Config.AZURE_SPEECH_KEY;
    this.region = options.region ?? Config.AZURE_SPEECH_REGION;
    this.voice = options.voice ?? Config.AZURE_SPEECH_VOICE;
    this.post = options.post ?? httpPoster;
  }

  supports(providerId: string): boolean {
    return providerId === this.name;
  }

  // the configured neural voice fixes the spoken language
  async synthesize(text: string): Promise<SynthesisResult> {
    if (!this.apiKey) {
      throw new ExternalServiceError(this.name, 'AZURE_SPEECH_KEY is not configured');
    }
    try {
      const response = await this.post(`https://${this.region}.tts.speech.microsoft.com/cognitiveservices/v1`, {
        headers: {
          'Ocp-Apim-Subscription-Key': this.apiKey,
          'Content-Type': 'application/ssml+xml',
          'X-Microsoft-OutputFormat': 'audio-24khz-48kbitrate-mono-mp3',
        },
        body: buildSsml(text, this.voice),
      });
      return { audio: response.data, format: 'mp3', bitrateKbps: 48, voice_id: this.voice };
    } catch (error) {
      throw serviceError(this.name, error);
    }
  }
}
