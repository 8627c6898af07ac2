/**
 * Attachment access. Remote attachments are fetched over HTTP; local ones
 * must resolve inside the uploads directory.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { Config } from '../config';
import { ValidationError } from '../errors';
import { isHttpUrl } from '../utils';
import { HttpTool } from './http';

/**
 * Absolute path of a local attachment under `root`. Absolute paths and
 * `..` segments that leave the uploads directory are rejected.
 */
export function resolveUploadPath(uri: string, root: string = Config.UPLOADS_DIR): string {
  const relative = uri.trim().replace(/^file:\/\//, '');
  if (!relative || path.isAbsolute(relative)) {
    throw new ValidationError('Attachment path must be relative to the uploads directory', { attachment: uri });
  }

  const base = path.resolve(root);
  const target = path.resolve(base, relative);
  const inside = path.relative(base, target);
  if (!inside || inside === '..' || inside.startsWith(`..${path.sep}`) || path.isAbsolute(inside)) {
    throw new ValidationError('Attachment path escapes the uploads directory', { attachment: uri });
  }
  return target;
}

export async function readAttachment(uri: string, root: string = Config.UPLOADS_DIR): Promise<Buffer> {
  if (isHttpUrl(uri)) {
    const response = await HttpTool.fetchBuffer(uri, { maxRetries: 2 });
    return response.data;
  }
  return fs.readFile(resolveUploadPath(uri, root));
}
