/**
 * Document Intelligence Agent - Turns URLs, text and attachments into DocInsights
 */

import { BaseAgent } from './base';
import { AttachmentDescriptor, DocInsights, SemanticChunk, StructuredJobRequest } from '../types';
import { ContentMismatchError, NoContentError } from '../errors';
import { ArticleExtraction, ArticleExtractor } from '../tools/article-extractor';
import { UrlContentValidator } from '../tools/url-validator';
import { OcrAdapter, OcrResult, ParserAdapter, genericChunk } from '../tools/ocr';
import { Logger, errorMessage } from '../utils';

export const MAX_EXTRA_ARTICLE_IMAGES = 5;

export interface DocumentIntelligenceDeps {
  extractor: ArticleExtractor;
  validator?: UrlContentValidator;
  ocrAdapters?: OcrAdapter[];
  parsers?: ParserAdapter[];
}

export function emptyInsights(): DocInsights {
  return {
    semantic_chunks: [],
    entities: {},
    summaries: [],
    recommended_prompts: [],
    gaps: [],
    metadata: {},
  };
}

export function urlChunk(url: string, article: ArticleExtraction): SemanticChunk {
  return {
    id: `url:${url}`,
    text: article.text,
    source_id: url,
    metadata: {
      title: article.title,
      summary: article.summary,
      source: 'url_extraction',
    },
  };
}

export class DocumentIntelligenceAgent extends BaseAgent<StructuredJobRequest, DocInsights> {
  private extractor: ArticleExtractor;
  private validator: UrlContentValidator;
  private ocrAdapters: OcrAdapter[];
  private parsers: ParserAdapter[];

  constructor(deps: DocumentIntelligenceDeps) {
    super({ name: 'DocumentIntelligenceAgent' });
    this.extractor = deps.extractor;
    this.validator = deps.validator ?? new UrlContentValidator();
    this.ocrAdapters = deps.ocrAdapters ?? [];
    this.parsers = deps.parsers ?? [];
  }

  protected async process(job: StructuredJobRequest): Promise<DocInsights> {
    const insights = emptyInsights();

    const rejected = await this.processUrls(job.url_list, insights);

    // a URL-sourced story with no source content must not be published
    if (job.url_list.length > 0 && insights.semantic_chunks.length === 0) {
      if (rejected.length > 0) {
        throw new ContentMismatchError(
          'Extracted article content does not match the requested URL topic',
          { urls: rejected }
        );
      }
      throw new NoContentError('No content could be extracted from the provided URLs', { urls: job.url_list });
    }

    if (job.text_input) {
      insights.semantic_chunks.push({
        id: 'payload:text',
        text: job.text_input,
        source_id: 'payload',
        metadata: { source: 'text_input' },
      });
    }

    for (const attachment of job.attachments) {
      await this.processAttachment(attachment, insights);
    }

    Logger.info('Document intelligence complete', {
      chunks: insights.semantic_chunks.length,
      articleImages: insights.metadata.article_images?.length || 0,
    });

    return insights;
  }

  /**
   * Returns the URLs whose extraction was rejected by the content validator.
   */
  private async processUrls(urls: string[], insights: DocInsights): Promise<string[]> {
    const rejected: string[] = [];

    for (const url of urls) {
      let article: ArticleExtraction | null;
      try {
        article = await this.extractor.extract(url);
      } catch (error) {
        Logger.warn('URL extraction failed', { url, error: errorMessage(error) });
        continue;
      }
      if (!article) {
        Logger.warn('URL extraction returned nothing', { url });
        continue;
      }

      const outcome = this.validator.validate(url, article);
      if (!outcome.accepted) {
        if (outcome.reason === 'keyword_mismatch') {
          rejected.push(url);
          Logger.warn('Extracted content rejected: URL keywords not found in article', {
            url,
            keywords: outcome.check.keywords,
            matches: outcome.check.matches,
            required: outcome.check.required,
          });
        } else {
          Logger.warn('Extracted content too short', { url, length: article.text.trim().length });
        }
        continue;
      }

      insights.semantic_chunks.push(urlChunk(url, article));
      if (article.summary) {
        insights.summaries.push(article.summary);
      }

      const images = insights.metadata.article_images ?? [];
      if (article.top_image_url) {
        images.push(article.top_image_url);
      }
      images.push(...article.images.slice(0, MAX_EXTRA_ARTICLE_IMAGES));
      insights.metadata.article_images = Array.from(new Set(images));
    }

    return rejected;
  }

  private async processAttachment(attachment: AttachmentDescriptor, insights: DocInsights): Promise<void> {
    const adapter = this.ocrAdapters.find(a => a.canProcess(attachment));
    if (!adapter) {
      Logger.debug('No OCR adapter for attachment', { id: attachment.id, media_type: attachment.media_type });
      return;
    }

    let ocr: OcrResult;
    try {
      ocr = await adapter.extract(attachment);
    } catch (error) {
      Logger.warn('OCR failed for attachment', { id: attachment.id, adapter: adapter.name, error: errorMessage(error) });
      return;
    }
    if (!ocr.text.trim()) {
      return;
    }

    const parser = this.parsers.find(p => p.supports(attachment, ocr));
    const chunks = parser ? parser.parse(attachment, ocr) : [genericChunk(attachment, ocr)];
    insights.semantic_chunks.push(...chunks);
  }
}
