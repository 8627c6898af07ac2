/**
 * Stories API
 *
 * POST /api/stories
 *
 * Headers:
 *   X-API-Key: <key>   (only when STORY_API_KEY is set)
 *
 * Body:
 *   {
 *     "mode": "news" | "curious",
 *     "template_key": "news",
 *     "slide_count": 6,
 *     "user_input": "https://example.com/article",
 *     "image_source": "ai" | "pexels" | "custom" | null,
 *     "voice_engine": "azure_basic"
 *   }
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getOrchestrator } from '../lib/container';
import { authenticateApiKey } from '../lib/middleware/api-auth';
import { errorResponseBody, httpStatusFor } from '../lib/errors';
import { Logger } from '../lib/utils';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-API-Key');

  if (req.method === 'OPTIONS') {
    return res.status(200).end();
  }
  if (req.method !== 'POST') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const authError = authenticateApiKey(req);
  if (authError) {
    return res.status(401).json({ error: authError });
  }

  try {
    const story = await getOrchestrator().createStory(req.body);
    return res.status(201).json(story);
  } catch (error) {
    const status = httpStatusFor(error);
    const body = errorResponseBody(error);
    if (status >= 500) {
      Logger.error('❌ Story creation failed', { ...body, status });
    } else {
      Logger.warn('Story request rejected', { ...body, status });
    }
    return res.status(status).json(body);
  }
}
