/**
 * Language model client - chat completions over OpenAI or Azure OpenAI
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { Config } from '../config';
import { ExternalServiceError } from '../errors';
import { Logger } from '../utils';
import { createChatCompletion, statusOf } from '../utils/openai-helper';

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  json?: boolean;
}

export interface LanguageModel {
  complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string>;
}

/** A model that can also read text out of an image (used for OCR). */
export interface VisionModel extends LanguageModel {
  transcribeImage(imageUrl: string, instruction: string): Promise<string>;
}

/**
 * Azure OpenAI when an endpoint is configured, the public API otherwise.
 */
export function openAIClientFromConfig(): OpenAI {
  if (Config.AZURE_OPENAI_ENDPOINT) {
    Logger.info('Using Azure OpenAI deployment', { deployment: Config.AZURE_OPENAI_DEPLOYMENT });
    return new AzureOpenAI({
      endpoint: Config.AZURE_OPENAI_ENDPOINT,
      apiKey: Config.AZURE_OPENAI_API_KEY,
      apiVersion: Config.AZURE_OPENAI_API_VERSION,
      deployment: Config.AZURE_OPENAI_DEPLOYMENT,
      timeout: Config.LLM_TIMEOUT_MS,
    });
  }
  return new OpenAI({ apiKey: Config.OPENAI_API_KEY, timeout: Config.LLM_TIMEOUT_MS });
}

export class OpenAIChatModel implements VisionModel {
  constructor(
    private client: OpenAI,
    private model: string = Config.OPENAI_MODEL
  ) {}

  static fromConfig(client: OpenAI = openAIClientFromConfig()): OpenAIChatModel {
    return new OpenAIChatModel(client, Config.AZURE_OPENAI_ENDPOINT ? Config.AZURE_OPENAI_DEPLOYMENT : Config.OPENAI_MODEL);
  }

  async complete(systemPrompt: string, userPrompt: string, options: CompletionOptions = {}): Promise<string> {
    const { temperature = 0.7, maxTokens = 2000, json = false } = options;

    try {
      const response = await createChatCompletion(
        this.client,
        {
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature,
          max_tokens: maxTokens,
          response_format: json ? { type: 'json_object' } : undefined,
        },
        {
          maxRetries: 3,
          initialDelayMs: 1000,
          maxDelayMs: 10000,
          backoffMultiplier: 2,
        }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ExternalServiceError('openai', 'empty completion');
      }
      return content;
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      throw new ExternalServiceError('openai', 'chat completion failed', { status: statusOf(error), cause: error });
    }
  }

  async transcribeImage(imageUrl: string, instruction: string): Promise<string> {
    try {
      const response = await createChatCompletion(this.client, {
        model: this.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: instruction },
              { type: 'image_url', image_url: { url: imageUrl } },
            ],
          },
        ],
        max_tokens: 2000,
      });
      return response.choices[0]?.message?.content || '';
    } catch (error) {
      throw new ExternalServiceError('openai', 'image transcription failed', { status: statusOf(error), cause: error });
    }
  }
}
