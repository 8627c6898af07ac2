/**
 * Health Check API endpoint
 *
 * GET /api/health
 * Returns storage connectivity and provider configuration
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { StorageTool } from '../lib/tools/storage';
import { Config } from '../lib/config';
import { Logger, errorMessage } from '../lib/utils';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  let storageOk = false;
  let storedStories = 0;

  try {
    const storage = new StorageTool();
    const objects = await storage.list('stories/');
    storedStories = objects.filter(obj => obj.path.endsWith('.json') && !obj.path.endsWith('index.json')).length;
    storageOk = true;
  } catch (error) {
    Logger.warn('Storage check failed', { error: errorMessage(error) });
  }

  const llmConfigured = !!(Config.OPENAI_API_KEY || Config.AZURE_OPENAI_API_KEY);

  const health = {
    status: storageOk && llmConfigured ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    checks: {
      storage: storageOk ? 'ok' : 'error',
      llm: llmConfigured ? 'ok' : 'not configured',
      pexels: Config.PEXELS_API_KEY ? 'ok' : 'not configured',
      voice: Config.DEFAULT_VOICE_PROVIDER,
    },
    stories: storedStories,
    config: {
      storage_backend: Config.STORAGE_BACKEND,
      repository_backend: Config.REPOSITORY_BACKEND,
    },
  };

  return res.status(health.status === 'healthy' ? 200 : 503).json(health);
}
