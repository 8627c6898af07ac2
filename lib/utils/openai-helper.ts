/**
 * OpenAI API Helper with Retry Logic
 */

import OpenAI from 'openai';
import { Logger, sleep, errorMessage } from '../utils';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

export function statusOf(error: unknown): number | undefined {
  if (error instanceof OpenAI.APIError) {
    return error.status;
  }
  return undefined;
}

export function codeOf(error: unknown): string | undefined {
  if (error instanceof OpenAI.APIError && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isRateLimit(error: unknown): boolean {
  return statusOf(error) === 429 || codeOf(error) === 'rate_limit_exceeded' ||
    errorMessage(error).toLowerCase().includes('rate limit');
}

/**
 * Retry wrapper with exponential backoff for OpenAI API calls.
 * Only rate limits and 5xx responses are retried.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    backoffMultiplier = 2,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const status = statusOf(error);
      const rateLimited = isRateLimit(error);
      const retryable = rateLimited || (status !== undefined && status >= 500);

      if (!retryable) {
        Logger.error('Non-retryable OpenAI error', {
          attempt,
          status,
          code: codeOf(error),
          error: errorMessage(error),
        });
        throw error;
      }

      if (attempt >= maxRetries) {
        Logger.error('Max retries exceeded', {
          maxRetries,
          lastError: errorMessage(error),
        });
        throw error;
      }

      const delay = Math.min(
        initialDelayMs * Math.pow(backoffMultiplier, attempt),
        maxDelayMs
      );
      const jitter = Math.random() * 0.3 * delay;
      const finalDelay = delay + jitter;

      Logger.warn('Rate limit hit, retrying with backoff', {
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(finalDelay),
        isRateLimit: rateLimited,
      });

      await sleep(finalDelay);
    }
  }
}

export async function createChatCompletion(
  client: OpenAI,
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  retryOptions?: RetryOptions
): Promise<OpenAI.Chat.ChatCompletion> {
  return retryWithBackoff(
    () => client.chat.completions.create(params),
    retryOptions
  );
}

/**
 * Image generation is called without internal retries: the image provider
 * owns its own retry ladder for rate limits and content-policy rejections.
 */
export async function createImage(
  client: OpenAI,
  params: OpenAI.Images.ImageGenerateParams
): Promise<OpenAI.Images.ImagesResponse> {
  return client.images.generate(params);
}

export async function createSpeech(
  client: OpenAI,
  params: OpenAI.Audio.SpeechCreateParams,
  retryOptions?: RetryOptions
): Promise<Response> {
  return retryWithBackoff(
    () => client.audio.speech.create(params),
    retryOptions
  );
}
