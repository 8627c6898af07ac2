/**
 * Storage Tool - Abstraction over Vercel Blob, S3-compatible and in-memory storage
 */

import { put, list } from '@vercel/blob';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';
import { S3Storage } from './storage-s3';

export interface StorageObject {
  path: string;
  url: string;
  size: number;
  uploadedAt: Date;
}

export interface ObjectStorage {
  put(path: string, data: Buffer | string, contentType: string): Promise<string>;
  get(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
  list(prefix: string): Promise<StorageObject[]>;
  /** Bucket name used when addressing objects through the media CDN. */
  readonly bucket: string;
}

export type StorageBackend = 'vercel-blob' | 's3' | 'memory';

function isStorageBackend(value: string): value is StorageBackend {
  return value === 'vercel-blob' || value === 's3' || value === 'memory';
}

/**
 * In-process storage used for local runs and tests.
 */
export class MemoryStorage implements ObjectStorage {
  readonly bucket: string;
  private objects: Map<string, { data: Buffer; contentType: string; uploadedAt: Date }> = new Map();

  constructor(bucket = 'memory') {
    this.bucket = bucket;
  }

  async put(path: string, data: Buffer | string, contentType: string): Promise<string> {
    const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.objects.set(path, { data: buffer, contentType, uploadedAt: new Date() });
    return this.urlFor(path);
  }

  async get(path: string): Promise<Buffer> {
    const entry = this.objects.get(path);
    if (!entry) {
      throw new Error(`Object not found: ${path}`);
    }
    return entry.data;
  }

  async exists(path: string): Promise<boolean> {
    return this.objects.has(path);
  }

  async list(prefix: string): Promise<StorageObject[]> {
    const result: StorageObject[] = [];
    for (const [path, entry] of this.objects.entries()) {
      if (path.startsWith(prefix)) {
        result.push({ path, url: this.urlFor(path), size: entry.data.length, uploadedAt: entry.uploadedAt });
      }
    }
    return result;
  }

  contentTypeOf(path: string): string | undefined {
    return this.objects.get(path)?.contentType;
  }

  private urlFor(path: string): string {
    return `memory://${this.bucket}/${path}`;
  }
}

export class StorageTool implements ObjectStorage {
  private backend: StorageBackend;
  private s3?: S3Storage;
  private memory?: MemoryStorage;
  // Cache of recently created blob URLs to avoid list() lookup delays
  private urlCache: Map<string, { url: string; createdAt: number }> = new Map();

  constructor(backend: string = Config.STORAGE_BACKEND) {
    if (!isStorageBackend(backend)) {
      throw new Error(`Unknown storage backend: ${backend}`);
    }
    this.backend = backend;
    if (backend === 's3') {
      this.s3 = new S3Storage();
    } else if (backend === 'memory') {
      this.memory = new MemoryStorage();
    }
  }

  get bucket(): string {
    if (this.backend === 'vercel-blob') {
      return 'vercel-blob';
    }
    return this.s3 ? this.s3.bucket : 'memory';
  }

  async put(
    path: string,
    data: Buffer | string,
    contentType: string
  ): Promise<string> {
    Logger.debug('Storage put', { path, size: data.length, contentType });

    if (this.s3) {
      return this.s3.put(path, data, contentType);
    }
    if (this.memory) {
      return this.memory.put(path, data, contentType);
    }
    return this.putVercelBlob(path, data, contentType);
  }

  async get(path: string): Promise<Buffer> {
    Logger.debug('Storage get', { path });

    if (this.s3) {
      return this.s3.get(path);
    }
    if (this.memory) {
      return this.memory.get(path);
    }
    return this.getVercelBlob(path);
  }

  async exists(path: string): Promise<boolean> {
    if (this.s3) {
      return this.s3.exists(path);
    }
    if (this.memory) {
      return this.memory.exists(path);
    }
    try {
      const { blobs } = await list({ prefix: path, limit: 1 });
      return blobs.length > 0 && blobs[0].pathname === path;
    } catch (error) {
      Logger.warn('Blob exists check failed', { path, error: errorMessage(error) });
      return false;
    }
  }

  async list(prefix: string): Promise<StorageObject[]> {
    if (this.s3) {
      return this.s3.list(prefix);
    }
    if (this.memory) {
      return this.memory.list(prefix);
    }
    const { blobs } = await list({ prefix });
    return blobs.map(blob => ({
      path: blob.pathname,
      url: blob.url,
      size: blob.size,
      uploadedAt: new Date(blob.uploadedAt),
    }));
  }

  // Vercel Blob implementation
  private async putVercelBlob(
    path: string,
    data: Buffer | string,
    contentType: string
  ): Promise<string> {
    const blob = await put(path, data, {
      access: 'public',
      contentType,
      addRandomSuffix: false,
      token: Config.BLOB_READ_WRITE_TOKEN || undefined,
    });

    Logger.debug('Blob created', { pathname: blob.pathname, url: blob.url });

    // list() is eventually consistent, so keep the URL for immediate reads
    this.urlCache.set(path, { url: blob.url, createdAt: Date.now() });

    const fiveMinutesAgo = Date.now() - 5 * 60 * 1000;
    for (const [key, value] of this.urlCache.entries()) {
      if (value.createdAt < fiveMinutesAgo) {
        this.urlCache.delete(key);
      }
    }

    return blob.url;
  }

  private async getVercelBlob(path: string): Promise<Buffer> {
    const cached = this.urlCache.get(path);
    const url = cached ? cached.url : await this.lookupBlobUrl(path);

    const response = await fetch(url);
    if (!response.ok) {
      this.urlCache.delete(path);
      throw new Error(`Failed to fetch blob: ${response.statusText}`);
    }

    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  private async lookupBlobUrl(path: string): Promise<string> {
    const { blobs } = await list({ prefix: path, limit: 10 });
    const exactMatch = blobs.find(b => b.pathname === path);
    if (!exactMatch) {
      throw new Error(`Blob not found: ${path} (found ${blobs.length} blobs with prefix)`);
    }
    return exactMatch.url;
  }
}
