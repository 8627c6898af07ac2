/**
 * Core type definitions for the story generation pipeline
 */

export const STORY_MODES = ['news', 'curious'] as const;
export type StoryMode = (typeof STORY_MODES)[number];

export const IMAGE_SOURCES = ['ai', 'pexels', 'custom'] as const;
export type ImageSource = (typeof IMAGE_SOURCES)[number];

export interface StoryCreateRequest {
  mode: StoryMode;
  template_key: string;
  slide_count: number;
  category?: string;
  user_input?: string;
  text_prompt?: string;
  notes?: string;
  urls?: string[];
  attachments?: string[];
  prompt_keywords?: string | string[];
  image_source?: ImageSource | null;
  voice_engine?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Normalized request. Frozen on construction; later stages receive derived
 * copies instead of mutating it.
 */
export interface IntakePayload {
  readonly text_prompt?: string;
  readonly notes?: string;
  readonly urls: readonly string[];
  readonly attachments: readonly string[];
  readonly prompt_keywords: readonly string[];
  readonly mode: StoryMode;
  readonly template_key: string;
  readonly slide_count: number;
  readonly category?: string;
  readonly image_source: ImageSource | null;
  readonly voice_engine?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface LanguageMetadata {
  language_code: string;
  confidence: number;
  source_text_preview?: string;
}

export interface AttachmentDescriptor {
  id: string;
  uri: string;
  media_type?: string;
}

export interface StructuredJobRequest {
  text_input?: string;
  url_list: string[];
  attachments: AttachmentDescriptor[];
  focus_keywords: string[];
}

export interface SemanticChunk {
  id: string;
  text: string;
  source_id: string;
  metadata: Record<string, unknown>;
}

export interface DocInsightsMetadata {
  article_images?: string[];
  [key: string]: unknown;
}

export interface DocInsights {
  semantic_chunks: SemanticChunk[];
  entities: Record<string, string[]>;
  summaries: string[];
  recommended_prompts: string[];
  gaps: string[];
  metadata: DocInsightsMetadata;
}

export interface AnalysisResult {
  keywords: string[];
  entities: Record<string, string[]>;
  summaries: string[];
  recommended_prompts: string[];
  gaps: string[];
}

export interface RenderedPrompt {
  system: string;
  user: string;
  metadata: {
    mode: StoryMode;
    language: string;
    category?: string;
    keywords: string[];
  };
}

export interface SlideBlock {
  placeholder_id: string;
  text: string;
  image_url?: string;
  /** Literal image prompt / alt text carried from the narrative. */
  image_prompt?: string;
}

export interface SlideDeck {
  template_key: string;
  language_code: string;
  slides: SlideBlock[];
}

export interface NewsClassification {
  category: string;
  subcategory: string;
  emotion: string;
}

export interface NarrativeResponse {
  mode: StoryMode;
  title: string;
  slide_deck: SlideDeck;
  raw_output: string;
  classification?: NewsClassification;
}

export interface ImageAsset {
  source: string;
  slide_index: number;
  original_object_key: string;
  /** Set when the object lives outside the configured media bucket. */
  bucket?: string;
  resized_variants: Record<string, string>;
  description?: string;
}

export interface VoiceAsset {
  provider: string;
  voice_id?: string;
  audio_url: string;
  duration_seconds: number;
}

export interface StoryRecord {
  id: string;
  mode: StoryMode;
  category: string;
  input_language: string;
  slide_count: number;
  template_key: string;
  title: string;
  doc_insights: DocInsights;
  slide_deck: SlideDeck;
  image_assets: ImageAsset[];
  voice_assets: VoiceAsset[];
  prompt_news?: string;
  prompt_curious?: string;
  canurl: string;
  canurl1: string;
  html_url?: string;
  created_at: string;
}

export interface AgentMessage<I, O> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: I;
  output?: O;
  errors: string[];
  duration_ms?: number;
}
