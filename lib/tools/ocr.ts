/**
 * OCR and parser adapters for attachments
 */

import { z } from 'zod';
import { Config } from '../config';
import { ExternalServiceError } from '../errors';
import { readAttachment } from './attachments';
import { HttpOptions, HttpResponse, HttpTool } from './http';
import type { VisionModel } from './llm';
import type { AttachmentDescriptor, SemanticChunk } from '../types';
import { Logger, cleanText, isHttpUrl, sleep } from '../utils';
import { summarize } from './article-extractor';

export interface OcrResult {
  text: string;
  metadata: Record<string, unknown>;
}

export interface OcrAdapter {
  readonly name: string;
  canProcess(attachment: AttachmentDescriptor): boolean;
  extract(attachment: AttachmentDescriptor): Promise<OcrResult>;
}

export interface ParserAdapter {
  readonly name: string;
  supports(attachment: AttachmentDescriptor, ocr: OcrResult): boolean;
  parse(attachment: AttachmentDescriptor, ocr: OcrResult): SemanticChunk[];
}

export class PlainTextOcrAdapter implements OcrAdapter {
  readonly name = 'plain-text';

  constructor(private uploadsDir?: string) {}

  canProcess(attachment: AttachmentDescriptor): boolean {
    return attachment.media_type === 'text/plain' || attachment.media_type === 'text/markdown';
  }

  async extract(attachment: AttachmentDescriptor): Promise<OcrResult> {
    const text = (await readAttachment(attachment.uri, this.uploadsDir)).toString('utf-8');
    return { text, metadata: { adapter: this.name } };
  }
}

export type HttpSender = (url: string, options: HttpOptions) => Promise<HttpResponse>;

export interface DocumentOcrOptions {
  endpoint?: string;
  apiKey?: string;
  modelId?: string;
  apiVersion?: string;
  uploadsDir?: string;
  load?: (uri: string) => Promise<Buffer>;
  send?: HttpSender;
  wait?: (ms: number) => Promise<void>;
  pollIntervalMs?: number;
  maxPolls?: number;
}

const DOCUMENT_TYPES = ['application/pdf', 'image/png', 'image/jpeg'];

const analyzeOperationSchema = z.object({
  status: z.string(),
  analyzeResult: z
    .object({
      pages: z.array(z.object({ lines: z.array(z.object({ content: z.string() })).default([]) })).default([]),
    })
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

/**
 * Azure Document Intelligence: submits the file for analysis, then polls the
 * operation until it succeeds or fails. Text is every page line in order.
 */
export class DocumentOcrAdapter implements OcrAdapter {
  readonly name = 'document-intelligence';
  private endpoint: string;
  private apiKey: string;
  private modelId: string;
  private apiVersion: string;
  private load: (uri: string) => Promise<Buffer>;
  private send: HttpSender;
  private wait: (ms: number) => Promise<void>;
  private pollIntervalMs: number;
  private maxPolls: number;

  constructor(options: DocumentOcrOptions = {}) {
    this.endpoint = (options.endpoint ?? Config.AZURE_DOCUMENT_ENDPOINT).replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? Config.AZURE_DOCUMENT_KEY;
    this.modelId = options.modelId ?? Config.AZURE_DOCUMENT_MODEL;
    this.apiVersion = options.apiVersion ?? '2023-07-31';
    const uploadsDir = options.uploadsDir;
    this.load = options.load ?? (uri => readAttachment(uri, uploadsDir));
    this.send = options.send ?? ((url, httpOptions) => HttpTool.fetch(url, httpOptions));
    this.wait = options.wait ?? sleep;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.maxPolls = options.maxPolls ?? 10;
  }

  canProcess(attachment: AttachmentDescriptor): boolean {
    return Boolean(this.endpoint && this.apiKey) && DOCUMENT_TYPES.includes(attachment.media_type ?? '');
  }

  async extract(attachment: AttachmentDescriptor): Promise<OcrResult> {
    const data = await this.load(attachment.uri);
    const submitted = await this.send(
      `${this.endpoint}/formrecognizer/documentModels/${this.modelId}:analyze?api-version=${this.apiVersion}`,
      {
        method: 'POST',
        body: data,
        headers: {
          'Ocp-Apim-Subscription-Key': this.apiKey,
          'Content-Type': attachment.media_type ?? 'application/octet-stream',
        },
        timeout: 60000,
        maxRetries: 1,
      }
    );

    const operation = submitted.headers['operation-location'];
    if (!operation) {
      throw new ExternalServiceError('document-intelligence', 'analysis was not accepted', { status: submitted.status });
    }

    for (let poll = 0; poll < this.maxPolls; poll++) {
      if (poll > 0) {
        await this.wait(this.pollIntervalMs);
      }
      const response = await this.send(operation, {
        headers: { 'Ocp-Apim-Subscription-Key': this.apiKey },
        maxRetries: 1,
      });
      const parsed = analyzeOperationSchema.safeParse(JSON.parse(response.text));
      if (!parsed.success) {
        throw new ExternalServiceError('document-intelligence', 'unexpected analysis response');
      }

      const { status, analyzeResult, error } = parsed.data;
      if (status === 'failed') {
        throw new ExternalServiceError('document-intelligence', error?.message ?? 'analysis failed');
      }
      if (status === 'succeeded') {
        const pages = analyzeResult?.pages ?? [];
        const text = pages.flatMap(page => page.lines.map(line => line.content)).join('\n');
        Logger.debug('Document analysed', { attachment: attachment.id, pages: pages.length, polls: poll + 1 });
        return {
          text,
          metadata: { adapter: this.name, model_id: this.modelId, api_version: this.apiVersion, pages: pages.length },
        };
      }
    }

    throw new ExternalServiceError('document-intelligence', `analysis still running after ${this.maxPolls} polls`);
  }
}

/** Reads text out of images through the language model's vision input. */
export class VisionOcrAdapter implements OcrAdapter {
  readonly name = 'vision';

  constructor(private model: VisionModel) {}

  canProcess(attachment: AttachmentDescriptor): boolean {
    return (attachment.media_type === 'image/png' || attachment.media_type === 'image/jpeg') &&
      isHttpUrl(attachment.uri);
  }

  async extract(attachment: AttachmentDescriptor): Promise<OcrResult> {
    const text = await this.model.transcribeImage(
      attachment.uri,
      'Transcribe all readable text in this image. Return plain text only.'
    );
    return { text, metadata: { adapter: this.name } };
  }
}

/**
 * Splits long OCR output into paragraph chunks so generation sees the
 * document's structure.
 */
export class ParagraphParser implements ParserAdapter {
  readonly name = 'paragraphs';

  constructor(private minLength = 1200) {}

  supports(_attachment: AttachmentDescriptor, ocr: OcrResult): boolean {
    return ocr.text.length >= this.minLength && /\n\s*\n/.test(ocr.text);
  }

  parse(attachment: AttachmentDescriptor, ocr: OcrResult): SemanticChunk[] {
    return ocr.text
      .split(/\n\s*\n/)
      .map(p => cleanText(p))
      .filter(p => p.length > 0)
      .map((paragraph, index) => ({
        id: `${attachment.id}:chunk-${index + 1}`,
        text: paragraph,
        source_id: attachment.id,
        metadata: { ...ocr.metadata, summary: summarize(paragraph, 160), parser: this.name },
      }));
  }
}

export function genericChunk(attachment: AttachmentDescriptor, ocr: OcrResult): SemanticChunk {
  return {
    id: `${attachment.id}:chunk-1`,
    text: ocr.text,
    source_id: attachment.id,
    metadata: { ...ocr.metadata, uri: attachment.uri },
  };
}
