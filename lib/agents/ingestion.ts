/**
 * Ingestion Agent - Merges request text into a single structured job
 */

import { BaseAgent } from './base';
import { AttachmentDescriptor, IntakePayload, LanguageMetadata, StructuredJobRequest } from '../types';

export interface IngestionInput {
  payload: IntakePayload;
  language: LanguageMetadata;
}

const MEDIA_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  txt: 'text/plain',
  md: 'text/markdown',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  doc: 'application/msword',
};

export function inferMediaType(uri: string): string | undefined {
  const path = uri.split(/[?#]/)[0];
  const match = path.match(/\.([a-z0-9]+)$/i);
  return match ? MEDIA_TYPES[match[1].toLowerCase()] : undefined;
}

export class IngestionAgent extends BaseAgent<IngestionInput, StructuredJobRequest> {
  constructor(private joiner = '\n\n') {
    super({ name: 'IngestionAgent' });
  }

  protected async process(input: IngestionInput): Promise<StructuredJobRequest> {
    return this.aggregate(input.payload, input.language);
  }

  aggregate(payload: IntakePayload, language: LanguageMetadata): StructuredJobRequest {
    const textInput = this.collectSegments(payload, language).join(this.joiner);

    return {
      text_input: textInput || undefined,
      url_list: [...payload.urls],
      attachments: payload.attachments.map((uri, index): AttachmentDescriptor => ({
        id: `attachment-${index + 1}`,
        uri,
        media_type: inferMediaType(uri),
      })),
      focus_keywords: [...payload.prompt_keywords],
    };
  }

  /**
   * With URLs present the article is the primary source: the raw prompt is
   * dropped and notes are kept only as guidance.
   */
  private collectSegments(payload: IntakePayload, language: LanguageMetadata): string[] {
    const segments: string[] = [];

    if (payload.urls.length > 0) {
      if (payload.notes) {
        segments.push(`[Additional Context]: ${payload.notes.trim()}`);
      }
    } else {
      if (payload.text_prompt) {
        segments.push(payload.text_prompt.trim());
      }
      if (payload.notes) {
        segments.push(payload.notes.trim());
      }
    }

    if (payload.prompt_keywords.length > 0) {
      segments.push(payload.prompt_keywords.join(' '));
    }

    if (language.source_text_preview) {
      segments.push(language.source_text_preview.trim());
    }

    return segments.filter(segment => segment.length > 0);
  }
}
