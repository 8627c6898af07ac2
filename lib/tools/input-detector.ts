/**
 * Input detection for the single freeform input box
 */

import { isHttpUrl } from '../utils';

export type InputKind = 'url' | 'text' | 'file' | 'mixed';

export interface DetectedInput {
  kind: InputKind;
  urls: string[];
  text?: string;
  filePath?: string;
}

const FILE_EXTENSIONS = ['.pdf', '.jpg', '.jpeg', '.png', '.docx', '.txt', '.doc'];
const BARE_DOMAIN = /^[a-zA-Z0-9-]+(\.[a-zA-Z0-9-]+)*\.[a-zA-Z]{2,}(\/\S*)?$/;
const TRAILING_PUNCTUATION = /[),.;!?]+$/;

function hasFileExtension(value: string): boolean {
  const lower = value.toLowerCase();
  return FILE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

export class InputDetector {
  detect(userInput: string | undefined): DetectedInput {
    const input = (userInput || '').trim();
    if (!input) {
      return { kind: 'text', urls: [], text: '' };
    }

    if (this.isFileReference(input)) {
      return { kind: 'file', urls: [], filePath: input };
    }

    const urls: string[] = [];
    const remaining: string[] = [];
    for (const token of input.split(/\s+/)) {
      const url = this.toUrl(token);
      if (url) {
        if (!urls.includes(url)) {
          urls.push(url);
        }
      } else {
        remaining.push(token);
      }
    }

    if (urls.length === 0) {
      return { kind: 'text', urls: [], text: input };
    }

    const text = remaining.join(' ').trim();
    if (text) {
      return { kind: 'mixed', urls, text };
    }
    return { kind: 'url', urls };
  }

  /**
   * A lone token with a document/image extension that is addressed by a
   * scheme or carries a path separator.
   */
  isFileReference(input: string): boolean {
    if (/\s/.test(input) || !hasFileExtension(input)) {
      return false;
    }
    return /^(file|s3|https?):\/\//i.test(input) || input.includes('/') || input.includes('\\');
  }

  private toUrl(rawToken: string): string | null {
    const token = rawToken.replace(TRAILING_PUNCTUATION, '');
    let candidate: string | null = null;

    if (/^https?:\/\//i.test(token)) {
      candidate = token;
    } else if (/^www\./i.test(token)) {
      candidate = `https://${token}`;
    } else if (BARE_DOMAIN.test(token) && !hasFileExtension(token)) {
      candidate = `https://${token}`;
    }

    return candidate && isHttpUrl(candidate) ? candidate : null;
  }
}
