/**
 * API key check for the story endpoints
 */

import type { VercelRequest } from '@vercel/node';
import { Config } from '../config';

/**
 * Returns an error message when the request is rejected, null otherwise.
 * With no STORY_API_KEY configured the endpoints are open.
 */
export function authenticateApiKey(req: Pick<VercelRequest, 'headers'>, expected: string = Config.STORY_API_KEY): string | null {
  if (!expected) {
    return null;
  }

  const header = req.headers['x-api-key'];
  const providedKey = Array.isArray(header) ? header[0] : header;

  if (!providedKey) {
    return 'Missing X-API-Key header';
  }
  if (providedKey !== expected) {
    return 'Invalid API key';
  }
  return null;
}
