/**
 * User upload provider - maps attachments to slides by position
 */

import { promises as fs } from 'fs';
import { IntakePayload } from '../../types';
import { Logger, errorMessage, isHttpUrl } from '../../utils';
import { BinaryResponse } from '../http';
import { resolveUploadPath } from '../attachments';
import { Downloader, ImageContent, ImageProvider, ImageRequest, contentTypeForPath, httpDownloader } from './types';

export type AttachmentSource =
  | { kind: 'http'; url: string }
  | { kind: 's3'; bucket: string; key: string }
  | { kind: 'local'; path: string };

export function classifyAttachment(uri: string): AttachmentSource {
  const trimmed = uri.trim();
  const s3 = trimmed.match(/^s3:\/\/([^/]+)\/(.+)$/);
  if (s3) {
    return { kind: 's3', bucket: s3[1], key: s3[2] };
  }
  if (isHttpUrl(trimmed)) {
    return { kind: 'http', url: trimmed };
  }
  return { kind: 'local', path: trimmed.replace(/^file:\/\//, '') };
}

/** Attachment for a slide: positional, the last one repeated for the rest. */
export function attachmentFor(attachments: readonly string[], slideIndex: number): string {
  return attachments[Math.min(slideIndex, attachments.length - 1)];
}

export interface UploadProviderOptions {
  download?: Downloader;
  readFile?: (path: string) => Promise<Buffer>;
  uploadsDir?: string;
}

export class UserUploadProvider implements ImageProvider {
  readonly source = 'custom';
  private download: Downloader;
  private readFile: (path: string) => Promise<Buffer>;
  private uploadsDir?: string;

  constructor(options: UploadProviderOptions = {}) {
    this.download = options.download ?? httpDownloader;
    this.readFile = options.readFile ?? (path => fs.readFile(path));
    this.uploadsDir = options.uploadsDir;
  }

  supports(payload: IntakePayload): boolean {
    return payload.image_source === 'custom' && payload.attachments.length > 0;
  }

  async generate({ deck, payload }: ImageRequest): Promise<ImageContent[]> {
    const contents: ImageContent[] = [];
    const fetched = new Map<string, BinaryResponse>();

    for (let i = 0; i < deck.slides.length; i++) {
      if (deck.slides[i].image_url) {
        continue;
      }
      const attachment = attachmentFor(payload.attachments, i);
      const source = classifyAttachment(attachment);
      const description = `User uploaded image ${attachment.split('/').pop() || attachment}`;

      if (source.kind === 's3') {
        contents.push({
          slide_index: i,
          source_kind: 's3',
          contentType: contentTypeForPath(source.key),
          existing_key: source.key,
          existing_bucket: source.bucket,
          description,
        });
        continue;
      }

      try {
        let image = fetched.get(attachment);
        if (!image) {
          image = source.kind === 'http'
            ? await this.download(source.url)
            : {
                data: await this.readFile(resolveUploadPath(source.path, this.uploadsDir)),
                contentType: contentTypeForPath(source.path),
              };
          fetched.set(attachment, image);
        }
        contents.push({
          slide_index: i,
          source_kind: source.kind,
          contentType: image.contentType,
          data: image.data,
          description,
        });
      } catch (error) {
        Logger.warn('Attachment could not be read', { slide: i, attachment, error: errorMessage(error) });
      }
    }

    return contents;
  }
}
