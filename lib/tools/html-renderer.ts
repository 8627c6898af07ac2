/**
 * HTML Renderer - Fills AMP story templates from a story record
 */

import { promises as fs } from 'fs';
import path from 'path';
import { Config } from '../config';
import { ImageAsset, StoryRecord } from '../types';
import { Logger, shortenAtWord, stripMarkdown } from '../utils';
import { variantUrl } from './images/image-storage';

export const SLIDES_MARKER = '<!--INSERT_SLIDES_HERE-->';
/** Template keys name a file in the templates directory: no separators or dots. */
export const TEMPLATE_KEY_PATTERN = /^[\w-]+$/;
const SLIDE_PARTIAL = 'partials/slide';
const META_DESCRIPTION_LIMIT = 160;
const PORTRAIT = { name: 'portrait', width: 720, height: 1280 };
const THUMBNAIL = { name: 'thumbnail', width: 300, height: 300 };

export type TemplateLoader = (name: string) => Promise<string>;

export interface HtmlRendererOptions {
  templatesDir?: string;
  loader?: TemplateLoader;
  cdnPrefix?: string;
  bucket?: string;
  defaultCoverImage?: string;
  defaultSlideImage?: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * `{{name}}` is replaced HTML-escaped, `{{{name}}}` verbatim. Unknown names
 * become empty strings.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template
    .replace(/\{\{\{\s*([\w-]+)\s*\}\}\}/g, (_, name: string) => values[name] ?? '')
    .replace(/\{\{\s*([\w-]+)\s*\}\}/g, (_, name: string) => escapeHtml(values[name] ?? ''));
}

export class HtmlRenderer {
  private loader: TemplateLoader;
  private cache = new Map<string, string>();
  private cdnPrefix: string;
  private bucket: string;
  private defaultCoverImage: string;
  private defaultSlideImage: string;

  constructor(options: HtmlRendererOptions = {}) {
    const dir = path.resolve(options.templatesDir ?? Config.TEMPLATES_DIR);
    this.loader = options.loader ?? (name => fs.readFile(path.join(dir, `${name}.html`), 'utf-8'));
    this.cdnPrefix = options.cdnPrefix ?? Config.CDN_MEDIA_PREFIX;
    this.bucket = options.bucket ?? Config.S3_BUCKET;
    this.defaultCoverImage = options.defaultCoverImage ?? Config.DEFAULT_COVER_IMAGE;
    this.defaultSlideImage = options.defaultSlideImage ?? Config.DEFAULT_SLIDE_IMAGE;
  }

  /**
   * Renders with the template named by `templateKey`, or the mode's
   * template when no such file exists.
   */
  async render(record: StoryRecord, templateKey: string): Promise<string> {
    const requested = TEMPLATE_KEY_PATTERN.test(templateKey) ? templateKey : record.mode;
    const page = await this.template(requested).catch(async () => {
      Logger.debug('Template not found, using mode template', { templateKey, mode: record.mode });
      return this.template(record.mode);
    });
    const partial = await this.template(SLIDE_PARTIAL);

    const slides = record.slide_deck.slides
      .slice(1)
      .map((slide, i) => {
        const index = i + 1;
        return fillTemplate(partial, {
          slideid: `slide-${index}`,
          paragraph: stripMarkdown(slide.text),
          image: this.imageFor(record.image_assets, index, this.defaultSlideImage),
          alt: slide.image_prompt ?? '',
          audioattr: this.audioAttribute(record, index),
        });
      })
      .join('\n');

    const title = record.slide_deck.slides[0]?.text || record.title || 'Web Story';
    const html = fillTemplate(page, this.placeholders(record, title));
    return html.includes(SLIDES_MARKER) ? html.replace(SLIDES_MARKER, () => slides) : html;
  }

  placeholders(record: StoryRecord, title: string): Record<string, string> {
    const cover = this.coverAsset(record);
    const description = shortenAtWord(record.slide_deck.slides[1]?.text || title, META_DESCRIPTION_LIMIT);

    return {
      storytitle: title.substring(0, 180),
      pagetitle: title,
      metadescription: description,
      category: record.category,
      lang: record.input_language,
      canurl: record.canurl,
      canurl1: record.canurl1,
      publishedtime: record.created_at,
      potraitcoverurl: cover ? this.resized(cover, PORTRAIT) : this.defaultCoverImage,
      msthumbnailcoverurl: cover ? this.resized(cover, THUMBNAIL) : this.defaultCoverImage,
      coveraudioattr: this.audioAttribute(record, 0),
    };
  }

  private coverAsset(record: StoryRecord): ImageAsset | undefined {
    return record.image_assets.find(asset => asset.slide_index === 0);
  }

  private imageFor(assets: ImageAsset[], slideIndex: number, fallback: string): string {
    const asset = assets.find(a => a.slide_index === slideIndex);
    return asset ? this.resized(asset, PORTRAIT) : fallback;
  }

  private resized(asset: ImageAsset, box: { name: string; width: number; height: number }): string {
    return variantUrl(this.cdnPrefix, asset.bucket ?? this.bucket, asset.original_object_key, box);
  }

  private audioAttribute(record: StoryRecord, slideIndex: number): string {
    const url = record.voice_assets[slideIndex]?.audio_url;
    return url ? `background-audio="${escapeHtml(url)}"` : '';
  }

  private async template(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const content = await this.loader(name);
    this.cache.set(name, content);
    return content;
  }
}
