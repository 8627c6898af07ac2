/**
 * Image provider contracts
 */

import { IntakePayload, SlideDeck } from '../../types';
import { BinaryResponse, HttpTool } from '../http';

/** Where the bytes came from; `s3` content is already stored. */
export type ImageSourceKind = 'generated' | 'stock' | 'http' | 's3' | 'local';

export interface ImageContent {
  slide_index: number;
  source_kind: ImageSourceKind;
  contentType: string;
  description: string;
  data?: Buffer;
  /** Object key of an image that is already in storage. Skips the upload. */
  existing_key?: string;
  /** Bucket holding `existing_key` when it is not the storage's own. */
  existing_bucket?: string;
}

export interface ImageRequest {
  deck: SlideDeck;
  payload: IntakePayload;
  articleImages: readonly string[];
}

export interface ImageProvider {
  /** Recorded on every stored asset as `source`. */
  readonly source: string;
  supports(payload: IntakePayload, articleImages: readonly string[]): boolean;
  generate(request: ImageRequest): Promise<ImageContent[]>;
}

export type Downloader = (url: string) => Promise<BinaryResponse>;

export const httpDownloader: Downloader = url => HttpTool.fetchBuffer(url, { timeout: 30000, maxRetries: 2 });

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
};

export function extensionFor(contentType: string): string {
  return EXTENSIONS[contentType.split(';')[0].trim().toLowerCase()] ?? 'jpg';
}

export function contentTypeForPath(path: string): string {
  const ext = path.split('?')[0].split('.').pop()?.toLowerCase() ?? '';
  switch (ext) {
    case 'png':
      return 'image/png';
    case 'webp':
      return 'image/webp';
    case 'gif':
      return 'image/gif';
    default:
      return 'image/jpeg';
  }
}
