/**
 * Orchestrator - Coordinates the story pipeline
 */

import { Config } from './config';
import { Logger, Crypto, errorMessage, slugify } from './utils';
import { DeadlineExceededError, StageFailedError, StoryError } from './errors';
import { ImageAsset, StoryCreateRequest, StoryMode, StoryRecord, VoiceAsset } from './types';
import type { ObjectStorage } from './tools/storage';
import type { StoryRepository } from './tools/story-repository';
import { slugOf } from './tools/story-repository';
import type { HtmlRenderer } from './tools/html-renderer';

import { IntakeAgent, withMetadata } from './agents/intake';
import { LanguageAgent } from './agents/language';
import { IngestionAgent } from './agents/ingestion';
import { DocumentIntelligenceAgent } from './agents/document-intelligence';
import { AnalysisAgent } from './agents/analysis';
import { PromptSelectionAgent } from './agents/prompt-selection';
import { NarrativeAgent } from './agents/narrative';
import { ImageAgent } from './agents/image-director';
import { VoiceAgent } from './agents/voice-director';

export interface OrchestratorAgents {
  intake: IntakeAgent;
  language: LanguageAgent;
  ingestion: IngestionAgent;
  documents: DocumentIntelligenceAgent;
  analysis: AnalysisAgent;
  prompts: PromptSelectionAgent;
  narrative: NarrativeAgent;
  images: ImageAgent;
  voice: VoiceAgent;
}

export interface OrchestratorOptions {
  repository: StoryRepository;
  renderer?: HtmlRenderer;
  /** Where rendered HTML is uploaded; no upload without it. */
  htmlStorage?: ObjectStorage;
  htmlPrefix?: string;
  htmlBase?: string;
  baseUrl?: string;
  canurlSuffix?: string;
  deadlineMs?: number;
  now?: () => number;
}

export interface CanonicalUrls {
  canurl: string;
  canurl1: string;
}

const SLUGGED_MODES: ReadonlySet<StoryMode> = new Set<StoryMode>(['news', 'curious']);
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Slug plus a 10-character nano ID for titled modes, the story id otherwise
 * or when the title yields no slug.
 */
export function buildCanonicalUrls(
  title: string,
  mode: StoryMode,
  id: string,
  baseUrl: string = Config.STORY_BASE_URL,
  suffix: string = Config.CANURL_SUFFIX
): CanonicalUrls {
  const base = baseUrl.replace(/\/+$/, '');
  const slug = SLUGGED_MODES.has(mode) ? slugify(title) : '';
  if (!slug) {
    return { canurl: `${base}/${id}`, canurl1: `${base}/${id}.html` };
  }
  const path = `${slug}_${Crypto.nanoId(10)}${suffix}`;
  return { canurl: `${base}/${path}`, canurl1: `${base}/${path}.html` };
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export class Orchestrator {
  private repository: StoryRepository;
  private renderer?: HtmlRenderer;
  private htmlStorage?: ObjectStorage;
  private htmlPrefix: string;
  private htmlBase: string;
  private baseUrl: string;
  private canurlSuffix: string;
  private deadlineMs: number;
  private now: () => number;

  constructor(
    private agents: OrchestratorAgents,
    options: OrchestratorOptions
  ) {
    this.repository = options.repository;
    this.renderer = options.renderer;
    this.htmlStorage = options.htmlStorage;
    this.htmlPrefix = (options.htmlPrefix ?? Config.S3_PREFIX_HTML).replace(/\/+$/, '');
    this.htmlBase = (options.htmlBase ?? Config.CDN_HTML_BASE).replace(/\/+$/, '');
    this.baseUrl = options.baseUrl ?? Config.STORY_BASE_URL;
    this.canurlSuffix = options.canurlSuffix ?? Config.CANURL_SUFFIX;
    this.deadlineMs = options.deadlineMs ?? Config.STORY_DEADLINE_MS;
    this.now = options.now ?? Date.now;
  }

  async createStory(request: StoryCreateRequest): Promise<StoryRecord> {
    const runId = Crypto.uuid();
    const startTime = this.now();
    const deadline = startTime + this.deadlineMs;
    const agents = this.agents;

    Logger.info('🚀 Story creation started', { runId, mode: request.mode, slide_count: request.slide_count });

    const critical = async <T>(stage: string, run: () => Promise<T>): Promise<T> => {
      if (this.now() > deadline) {
        throw new DeadlineExceededError(stage, this.deadlineMs);
      }
      try {
        return await run();
      } catch (error) {
        if (error instanceof StoryError) {
          error.stage = error.stage ?? stage;
          throw error;
        }
        throw new StageFailedError(stage, error);
      }
    };

    const bestEffort = async <T>(stage: string, run: () => Promise<T>, fallback: T): Promise<T> => {
      if (this.now() > deadline) {
        Logger.warn('Deadline passed, skipping stage', { runId, stage });
        return fallback;
      }
      try {
        return await run();
      } catch (error) {
        Logger.warn('Best-effort stage failed, continuing', { runId, stage, error: errorMessage(error) });
        return fallback;
      }
    };

    const payload = await critical('intake', async () => (await agents.intake.execute(runId, request)).output);
    const language = await critical('language', async () => (await agents.language.execute(runId, payload)).output);
    const job = await critical('ingestion', async () => (await agents.ingestion.execute(runId, { payload, language })).output);
    const insights = await critical('document_intelligence', async () => (await agents.documents.execute(runId, job)).output);
    const analysis = await critical('analysis', async () =>
      (await agents.analysis.execute(runId, { insights, focus_keywords: job.focus_keywords })).output
    );
    const prompt = await critical('prompt_selection', async () =>
      (await agents.prompts.execute(runId, { payload, language, insights })).output
    );
    const narrative = await critical('narrative', async () =>
      (await agents.narrative.execute(runId, { payload, prompt, insights })).output
    );

    // later stages see the narrative output; the intake payload stays as it was
    const derived = withMetadata(payload, { narrative_json: narrative.raw_output });
    const deck = narrative.slide_deck;

    const image_assets = await bestEffort<ImageAsset[]>('images', async () =>
      (await agents.images.execute(runId, {
        deck,
        payload: derived,
        articleImages: insights.metadata.article_images ?? [],
      })).output,
      []
    );

    const voice_assets = await bestEffort<VoiceAsset[]>('voice', async () =>
      (await agents.voice.execute(runId, {
        deck,
        language: deck.language_code,
        providerId: derived.voice_engine,
      })).output,
      []
    );

    const urls = buildCanonicalUrls(narrative.title, payload.mode, runId, this.baseUrl, this.canurlSuffix);

    const record: StoryRecord = {
      id: runId,
      mode: payload.mode,
      category: payload.category || narrative.classification?.category || titleCase(payload.mode),
      input_language: language.language_code,
      slide_count: payload.slide_count,
      template_key: payload.template_key,
      title: narrative.title,
      doc_insights: insights,
      slide_deck: deck,
      image_assets,
      voice_assets,
      prompt_news: payload.mode === 'news' ? prompt.user : undefined,
      prompt_curious: payload.mode === 'curious' ? prompt.user : undefined,
      canurl: urls.canurl,
      canurl1: urls.canurl1,
      created_at: new Date(startTime).toISOString(),
    };

    record.html_url = await bestEffort<string | undefined>('html', () => this.publishHtml(record), undefined);
    await bestEffort('persistence', () => this.repository.save(record), record);

    Logger.info('✅ Story created', {
      runId,
      title: record.title,
      slides: deck.slides.length,
      images: image_assets.length,
      voices: voice_assets.length,
      keywords: analysis.keywords.length,
      duration_ms: this.now() - startTime,
    });

    return record;
  }

  /**
   * Looks up a story by UUID, otherwise by slug or canonical URL.
   */
  async getStory(idOrSlug: string): Promise<StoryRecord> {
    const key = idOrSlug.trim();
    return UUID_PATTERN.test(key) ? this.repository.get(key) : this.repository.getBySlug(key);
  }

  private async publishHtml(record: StoryRecord): Promise<string | undefined> {
    if (!this.renderer) {
      return undefined;
    }
    const html = await this.renderer.render(record, record.template_key);
    if (!this.htmlStorage) {
      Logger.debug('No HTML storage configured, rendered story not uploaded', { id: record.id });
      return undefined;
    }

    const key = `${this.htmlPrefix}/${slugOf(record.canurl)}.html`;
    const url = await this.htmlStorage.put(key, html, 'text/html; charset=utf-8');
    return this.htmlBase ? `${this.htmlBase}/${key}` : url;
  }
}
