/**
 * Stores image content and addresses resized variants through the media CDN
 */

import { Config, ResizeVariant } from '../../config';
import { ImageAsset } from '../../types';
import { Clock, Crypto, Logger } from '../../utils';
import type { ObjectStorage } from '../storage';
import { ImageContent, extensionFor } from './types';

export interface ImageStorageOptions {
  prefix?: string;
  cdnPrefix?: string;
  variants?: ResizeVariant[];
  now?: () => Date;
}

/**
 * The CDN resizes on the fly from a base64url-encoded edit request naming
 * the bucket, key and target box.
 */
export function variantUrl(cdnPrefix: string, bucket: string, key: string, variant: ResizeVariant): string {
  const request = {
    bucket,
    key,
    edits: { resize: { width: variant.width, height: variant.height, fit: 'cover' } },
  };
  return cdnPrefix + Buffer.from(JSON.stringify(request)).toString('base64url');
}

export class ImageStorageService {
  private prefix: string;
  private cdnPrefix: string;
  private variants: ResizeVariant[];
  private now: () => Date;

  constructor(
    private storage: ObjectStorage,
    options: ImageStorageOptions = {}
  ) {
    this.prefix = (options.prefix ?? Config.S3_PREFIX_IMAGES).replace(/\/+$/, '');
    this.cdnPrefix = options.cdnPrefix ?? Config.CDN_MEDIA_PREFIX;
    this.variants = options.variants ?? Config.parseResizeVariants();
    this.now = options.now ?? Clock.nowUtc;
  }

  async store(content: ImageContent, source: string): Promise<ImageAsset> {
    let key = content.existing_key;

    if (!key) {
      if (!content.data) {
        throw new Error(`Image for slide ${content.slide_index} has neither data nor an existing key`);
      }
      key = `${this.prefix}/${Clock.toCompactDate(this.now())}/${Crypto.uuid()}.${extensionFor(content.contentType)}`;
      await this.storage.put(key, content.data, content.contentType);
      Logger.debug('Image stored', { key, slide: content.slide_index, bytes: content.data.length });
    }

    const bucket = content.existing_bucket ?? this.storage.bucket;
    const resized_variants: Record<string, string> = {};
    for (const variant of this.variants) {
      resized_variants[variant.name] = variantUrl(this.cdnPrefix, bucket, key, variant);
    }

    return {
      source,
      slide_index: content.slide_index,
      original_object_key: key,
      ...(bucket !== this.storage.bucket ? { bucket } : {}),
      resized_variants,
      description: content.description,
    };
  }
}
