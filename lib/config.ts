/**
 * Configuration management for the story pipeline
 */

export interface ResizeVariant {
  name: string;
  width: number;
  height: number;
}

export class Config {
  // Language model
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static OPENAI_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini';
  static AZURE_OPENAI_ENDPOINT = process.env.AZURE_OPENAI_ENDPOINT || '';
  static AZURE_OPENAI_API_KEY = process.env.AZURE_OPENAI_API_KEY || '';
  static AZURE_OPENAI_DEPLOYMENT = process.env.AZURE_OPENAI_DEPLOYMENT || '';
  static AZURE_OPENAI_API_VERSION = process.env.AZURE_OPENAI_API_VERSION || '2024-06-01';
  static LLM_TIMEOUT_MS = parseInt(process.env.LLM_TIMEOUT_MS || '60000', 10);

  // Document OCR
  static AZURE_DOCUMENT_ENDPOINT = process.env.AZURE_DOCUMENT_ENDPOINT || '';
  static AZURE_DOCUMENT_KEY = process.env.AZURE_DOCUMENT_KEY || '';
  static AZURE_DOCUMENT_MODEL = process.env.AZURE_DOCUMENT_MODEL || 'prebuilt-layout';

  // Image generation
  static OPENAI_IMAGE_MODEL = process.env.OPENAI_IMAGE_MODEL || 'dall-e-3';
  static IMAGE_SIZE = process.env.IMAGE_SIZE || '1024x1792';
  static IMAGE_COOLDOWN_MS = parseInt(process.env.IMAGE_COOLDOWN_MS || '12000', 10);
  static IMAGE_MAX_ATTEMPTS = parseInt(process.env.IMAGE_MAX_ATTEMPTS || '5', 10);
  static PEXELS_API_KEY = process.env.PEXELS_API_KEY || '';

  // Voices
  static OPENAI_TTS_VOICE = process.env.OPENAI_TTS_VOICE || 'nova';
  static ELEVENLABS_API_KEY = process.env.ELEVENLABS_API_KEY || '';
  static ELEVENLABS_VOICE_ID = process.env.ELEVENLABS_VOICE_ID || '21m00Tcm4TlvDq8ikWAM';
  static ELEVENLABS_MODEL = process.env.ELEVENLABS_MODEL || 'eleven_multilingual_v2';
  static AZURE_SPEECH_KEY = process.env.AZURE_SPEECH_KEY || '';
  static AZURE_SPEECH_REGION = process.env.AZURE_SPEECH_REGION || 'centralindia';
  static AZURE_SPEECH_VOICE = process.env.AZURE_SPEECH_VOICE || 'hi-IN-AaravNeural';
  static DEFAULT_VOICE_PROVIDER = process.env.DEFAULT_VOICE_PROVIDER || 'azure_basic';
  static PLACEHOLDER_AUDIO_URL = process.env.PLACEHOLDER_AUDIO_URL || '';

  // Storage
  static STORAGE_BACKEND = process.env.STORAGE_BACKEND || 'memory';
  static BLOB_READ_WRITE_TOKEN = process.env.BLOB_READ_WRITE_TOKEN || '';
  static S3_ENDPOINT = process.env.S3_ENDPOINT || '';
  static S3_BUCKET = process.env.S3_BUCKET || '';
  static S3_ACCESS_KEY = process.env.S3_ACCESS_KEY || '';
  static S3_SECRET_KEY = process.env.S3_SECRET_KEY || '';
  static S3_REGION = process.env.S3_REGION || 'us-east-1';
  static S3_PREFIX_IMAGES = process.env.S3_PREFIX_IMAGES || 'media/images';
  static S3_PREFIX_AUDIO = process.env.S3_PREFIX_AUDIO || 'media/audio';
  static S3_PREFIX_HTML = process.env.S3_PREFIX_HTML || 'webstory-html';
  static CDN_MEDIA_PREFIX = process.env.CDN_MEDIA_PREFIX || 'https://media.example.com/';
  static CDN_HTML_BASE = process.env.CDN_HTML_BASE || '';

  // Stories
  static STORY_BASE_URL = process.env.STORY_BASE_URL || 'https://stories.example.com';
  static CANURL_SUFFIX = process.env.CANURL_SUFFIX || '_G';
  static REPOSITORY_BACKEND = process.env.REPOSITORY_BACKEND || 'storage';
  static TEMPLATES_DIR = process.env.TEMPLATES_DIR || 'templates';
  static UPLOADS_DIR = process.env.UPLOADS_DIR || 'uploads';
  static DEFAULT_COVER_IMAGE = process.env.DEFAULT_COVER_IMAGE || 'https://media.example.com/defaults/cover.jpg';
  static DEFAULT_SLIDE_IMAGE = process.env.DEFAULT_SLIDE_IMAGE || 'https://media.example.com/defaults/slide.jpg';

  // API
  static STORY_API_KEY = process.env.STORY_API_KEY || '';

  // Operational
  static STORY_DEADLINE_MS = parseInt(process.env.STORY_DEADLINE_MS || '600000', 10);
  static SLIDE_DELAY_MS = parseInt(process.env.SLIDE_DELAY_MS || '500', 10);
  static AGENT_RETRIES = parseInt(process.env.AGENT_RETRIES || '3', 10);
  static LOG_LEVEL = process.env.LOG_LEVEL || 'info';

  static parseResizeVariants(): ResizeVariant[] {
    const variantsStr = process.env.IMAGE_RESIZE_VARIANTS || 'sm:300x200,md:768x432,lg:1280x720';
    const variants: ResizeVariant[] = [];
    variantsStr.split(',').forEach(pair => {
      const [name, size] = pair.split(':');
      const [width, height] = (size || '').split('x').map(v => parseInt(v, 10));
      if (name && width > 0 && height > 0) {
        variants.push({ name: name.trim(), width, height });
      }
    });
    return variants;
  }
}
