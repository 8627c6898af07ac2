/**
 * HTTP Tool - Fetch content from URLs with timeout and retry support
 */

import { Logger, retry } from '../utils';

export interface HttpResponse {
  status: number;
  text: string;
  contentType: string;
  url: string;
  /** Lower-cased header names. */
  headers: Record<string, string>;
}

export interface BinaryResponse {
  data: Buffer;
  contentType: string;
}

export interface HttpOptions {
  method?: 'GET' | 'POST';
  body?: string | Buffer;
  headers?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
}

const USER_AGENT = 'Mozilla/5.0 (compatible; WebStoryBot/1.0)';

export class HttpError extends Error {
  constructor(public status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpError';
  }
}

export class HttpTool {
  static async fetch(url: string, options: HttpOptions = {}): Promise<HttpResponse> {
    const response = await this.request(url, options, async res => ({
      status: res.status,
      text: await res.text(),
      contentType: res.headers.get('content-type') || 'text/plain',
      url: res.url,
      headers: Object.fromEntries(res.headers.entries()),
    }));
    return response;
  }

  static async fetchBuffer(url: string, options: HttpOptions = {}): Promise<BinaryResponse> {
    return this.request(url, options, async res => ({
      data: Buffer.from(await res.arrayBuffer()),
      contentType: res.headers.get('content-type') || 'application/octet-stream',
    }));
  }

  private static async request<T>(
    url: string,
    options: HttpOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const { method = 'GET', body, headers = {}, timeout = 15000, maxRetries = 3 } = options;

    Logger.debug('HTTP fetch', { method, url });

    return retry(
      async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
          const response = await fetch(url, {
            method,
            body,
            headers: {
              'User-Agent': USER_AGENT,
              ...headers,
            },
            signal: controller.signal,
          });

          if (!response.ok) {
            throw new HttpError(response.status, response.statusText);
          }

          return await read(response);
        } finally {
          clearTimeout(timeoutId);
        }
      },
      {
        maxRetries,
        delayMs: 1000,
        backoff: true,
        // client errors will not change on retry
        shouldRetry: error => !(error instanceof HttpError && error.status < 500 && error.status !== 429),
        onError: (error, attempt) => {
          Logger.warn(`HTTP fetch failed (attempt ${attempt})`, { url, error: error.message });
        },
      }
    );
  }
}
