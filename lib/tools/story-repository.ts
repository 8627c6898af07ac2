/**
 * Story Repository - Persists story records and resolves them by id or slug
 */

import { z } from 'zod';
import { STORY_MODES, StoryRecord } from '../types';
import { NotFoundError } from '../errors';
import { Logger } from '../utils';
import type { ObjectStorage } from './storage';

export interface StoryRepository {
  /** Saving an existing id overwrites it. */
  save(record: StoryRecord): Promise<StoryRecord>;
  get(id: string): Promise<StoryRecord>;
  getBySlug(slug: string): Promise<StoryRecord>;
}

const storyRecordSchema = z.object({
  id: z.string(),
  mode: z.enum(STORY_MODES),
  category: z.string(),
  input_language: z.string(),
  slide_count: z.number(),
  template_key: z.string(),
  title: z.string(),
  doc_insights: z.object({
    semantic_chunks: z.array(
      z.object({
        id: z.string(),
        text: z.string(),
        source_id: z.string(),
        metadata: z.record(z.unknown()),
      })
    ),
    entities: z.record(z.array(z.string())),
    summaries: z.array(z.string()),
    recommended_prompts: z.array(z.string()),
    gaps: z.array(z.string()),
    metadata: z.object({ article_images: z.array(z.string()).optional() }).catchall(z.unknown()),
  }),
  slide_deck: z.object({
    template_key: z.string(),
    language_code: z.string(),
    slides: z.array(
      z.object({
        placeholder_id: z.string(),
        text: z.string(),
        image_url: z.string().optional(),
        image_prompt: z.string().optional(),
      })
    ),
  }),
  image_assets: z.array(
    z.object({
      source: z.string(),
      slide_index: z.number(),
      original_object_key: z.string(),
      bucket: z.string().optional(),
      resized_variants: z.record(z.string()),
      description: z.string().optional(),
    })
  ),
  voice_assets: z.array(
    z.object({
      provider: z.string(),
      voice_id: z.string().optional(),
      audio_url: z.string(),
      duration_seconds: z.number(),
    })
  ),
  prompt_news: z.string().optional(),
  prompt_curious: z.string().optional(),
  canurl: z.string(),
  canurl1: z.string(),
  html_url: z.string().optional(),
  created_at: z.string(),
});

const slugIndexSchema = z.object({
  slugs: z.record(z.string()),
  last_updated: z.string(),
});

type SlugIndex = z.infer<typeof slugIndexSchema>;

export function parseStoryRecord(raw: string): StoryRecord {
  const parsed = storyRecordSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Stored story record is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/** Last path segment of a canonical URL, without ".html". */
export function slugOf(url: string): string {
  const segment = url.split('?')[0].replace(/\/+$/, '').split('/').pop() ?? '';
  return segment.replace(/\.html$/, '');
}

function matchesSlug(record: StoryRecord, slug: string): boolean {
  return slug.length > 0 && (slugOf(record.canurl) === slug || slugOf(record.canurl1) === slug);
}

export class StorageStoryRepository implements StoryRepository {
  private indexPath = 'stories/index.json';
  // index updates are read-modify-write; queue them so none is lost
  private indexWrites: Promise<void> = Promise.resolve();

  constructor(private storage: ObjectStorage) {}

  private recordPath(id: string): string {
    return `stories/${id}.json`;
  }

  async save(record: StoryRecord): Promise<StoryRecord> {
    await this.storage.put(this.recordPath(record.id), JSON.stringify(record, null, 2), 'application/json');

    await this.updateIndex(index => {
      index.slugs[slugOf(record.canurl)] = record.id;
      index.slugs[slugOf(record.canurl1)] = record.id;
    });

    Logger.info('Story saved', { id: record.id, slug: slugOf(record.canurl) });
    return record;
  }

  async get(id: string): Promise<StoryRecord> {
    const path = this.recordPath(id);
    if (!(await this.storage.exists(path))) {
      throw new NotFoundError(`story ${id}`);
    }
    const data = await this.storage.get(path);
    return parseStoryRecord(data.toString('utf-8'));
  }

  /**
   * Accepts a bare slug or a canonical URL; only an exact slug matches.
   */
  async getBySlug(slug: string): Promise<StoryRecord> {
    const wanted = slugOf(slug);
    const index = await this.readIndex();
    const id = Object.prototype.hasOwnProperty.call(index.slugs, wanted) ? index.slugs[wanted] : undefined;
    if (!id) {
      throw new NotFoundError(`story with slug ${slug}`);
    }
    return this.get(id);
  }

  private updateIndex(update: (index: SlugIndex) => void): Promise<void> {
    const write = this.indexWrites.then(async () => {
      const index = await this.readIndex();
      update(index);
      index.last_updated = new Date().toISOString();
      await this.storage.put(this.indexPath, JSON.stringify(index, null, 2), 'application/json');
    });
    // the caller sees the failure; later writes still run
    this.indexWrites = write.catch(() => undefined);
    return write;
  }

  private async readIndex(): Promise<SlugIndex> {
    if (!(await this.storage.exists(this.indexPath))) {
      return { slugs: {}, last_updated: new Date().toISOString() };
    }
    const data = await this.storage.get(this.indexPath);
    const parsed = slugIndexSchema.safeParse(JSON.parse(data.toString('utf-8')));
    if (!parsed.success) {
      Logger.warn('Story index is malformed, starting a new one');
      return { slugs: {}, last_updated: new Date().toISOString() };
    }
    return parsed.data;
  }
}

export class InMemoryStoryRepository implements StoryRepository {
  private records = new Map<string, StoryRecord>();

  async save(record: StoryRecord): Promise<StoryRecord> {
    this.records.set(record.id, record);
    return record;
  }

  async get(id: string): Promise<StoryRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(`story ${id}`);
    }
    return record;
  }

  async getBySlug(slug: string): Promise<StoryRecord> {
    const wanted = slugOf(slug);
    const all = Array.from(this.records.values());
    const record = all.find(r => matchesSlug(r, wanted));
    if (!record) {
      throw new NotFoundError(`story with slug ${slug}`);
    }
    return record;
  }

  get size(): number {
    return this.records.size;
  }
}

/** Persistence switched off: saves are accepted and nothing can be read back. */
export class NoopStoryRepository implements StoryRepository {
  async save(record: StoryRecord): Promise<StoryRecord> {
    Logger.debug('Persistence disabled, story not saved', { id: record.id });
    return record;
  }

  async get(id: string): Promise<StoryRecord> {
    throw new NotFoundError(`story ${id}`);
  }

  async getBySlug(slug: string): Promise<StoryRecord> {
    throw new NotFoundError(`story with slug ${slug}`);
  }
}
