/**
 * Tests for the Orchestrator
 */

import { describe, it, expect } from 'vitest';
import { Orchestrator, OrchestratorOptions, buildCanonicalUrls } from '../lib/orchestrator';
import { IntakeAgent } from '../lib/agents/intake';
import { LanguageAgent } from '../lib/agents/language';
import { IngestionAgent } from '../lib/agents/ingestion';
import { DocumentIntelligenceAgent } from '../lib/agents/document-intelligence';
import { AnalysisAgent } from '../lib/agents/analysis';
import { PromptSelectionAgent } from '../lib/agents/prompt-selection';
import { NarrativeAgent } from '../lib/agents/narrative';
import { CuriousWriter } from '../lib/agents/curious-writer';
import { NewsWriter } from '../lib/agents/news-writer';
import { ImageAgent } from '../lib/agents/image-director';
import { VoiceAgent } from '../lib/agents/voice-director';
import { ImageStorageService } from '../lib/tools/images/image-storage';
import { ImageContent, ImageProvider } from '../lib/tools/images/types';
import type { SynthesisResult, TtsProvider } from '../lib/tools/tts';
import type { ArticleExtractor } from '../lib/tools/article-extractor';
import { HtmlRenderer } from '../lib/tools/html-renderer';
import { InMemoryStoryRepository, slugOf } from '../lib/tools/story-repository';
import { MemoryStorage } from '../lib/tools/storage';
import { DeadlineExceededError, ExternalServiceError, NotFoundError } from '../lib/errors';
import type { StoryCreateRequest } from '../lib/types';
import { ScriptedModel } from './helpers';

const TIDES_REPLY = JSON.stringify({
  language: 'en',
  storytitle: 'How Tides Work',
  s0alt1: 'Ocean under moonlight',
  s1paragraph1: 'Tides rise twice a day.',
  s2paragraph1: 'The moon pulls the water.',
  s1alt1: 'Beach at high tide',
  s2alt1: 'Moon over the sea',
});

const REQUEST: StoryCreateRequest = {
  mode: 'curious',
  template_key: 'curious',
  slide_count: 4,
  text_prompt: 'Tides are caused by the moon.',
  image_source: 'ai',
  voice_engine: 'fake_voice',
};

const noArticles: ArticleExtractor = { extract: async () => null };

class CoverOnlyProvider implements ImageProvider {
  readonly source = 'ai';

  constructor(private failure?: Error) {}

  supports(): boolean {
    return true;
  }

  async generate(): Promise<ImageContent[]> {
    if (this.failure) {
      throw this.failure;
    }
    return [{ slide_index: 0, source_kind: 'generated', contentType: 'image/png', data: Buffer.from('png'), description: 'cover' }];
  }
}

const fakeVoice: TtsProvider = {
  name: 'fake_voice',
  supports: id => id === 'fake_voice',
  synthesize: async (): Promise<SynthesisResult> => ({ audio: Buffer.alloc(16000), format: 'mp3', bitrateKbps: 128 }),
};

interface Setup {
  llm?: ScriptedModel;
  imageFailure?: Error;
  options?: Partial<OrchestratorOptions>;
}

function setup({ llm = new ScriptedModel([TIDES_REPLY]), imageFailure, options = {} }: Setup = {}) {
  const storage = new MemoryStorage('test-bucket');
  const repository = new InMemoryStoryRepository();
  const orchestrator = new Orchestrator(
    {
      intake: new IntakeAgent(),
      language: new LanguageAgent(),
      ingestion: new IngestionAgent(),
      documents: new DocumentIntelligenceAgent({ extractor: noArticles }),
      analysis: new AnalysisAgent(),
      prompts: new PromptSelectionAgent(),
      narrative: new NarrativeAgent([new NewsWriter(llm), new CuriousWriter(llm)]),
      images: new ImageAgent(
        [new CoverOnlyProvider(imageFailure)],
        new ImageStorageService(storage, { prefix: 'media/images', cdnPrefix: 'https://cdn.example.com/', variants: [] })
      ),
      voice: new VoiceAgent([fakeVoice], storage, { prefix: 'media/audio', delayMs: 0 }),
    },
    {
      repository,
      renderer: new HtmlRenderer({
        loader: async name => (name === 'partials/slide' ? '<p>{{paragraph}}</p>' : '<h1>{{storytitle}}</h1><!--INSERT_SLIDES_HERE-->'),
      }),
      htmlStorage: storage,
      htmlPrefix: 'webstory-html',
      htmlBase: 'https://cdn.example.com/',
      baseUrl: 'https://stories.example.com/',
      canurlSuffix: '_G',
      ...options,
    }
  );
  return { orchestrator, repository, storage };
}

describe('buildCanonicalUrls', () => {
  it('should use the title slug and a nano id for titled modes', () => {
    const urls = buildCanonicalUrls('How Tides Work', 'curious', 'id-1', 'https://stories.example.com/', '_G');

    expect(urls.canurl).toMatch(/^https:\/\/stories\.example\.com\/how-tides-work_[A-Za-z0-9_-]{10}_G$/);
    expect(urls.canurl1).toBe(`${urls.canurl}.html`);
  });

  it('should fall back to the id when the title has no slug', () => {
    expect(buildCanonicalUrls('!!!', 'news', 'id-1', 'https://stories.example.com', '_G')).toEqual({
      canurl: 'https://stories.example.com/id-1',
      canurl1: 'https://stories.example.com/id-1.html',
    });
  });
});

describe('Orchestrator', () => {
  it('should create, publish and save a story', async () => {
    const { orchestrator, repository, storage } = setup();

    const record = await orchestrator.createStory(REQUEST);

    expect(record).toMatchObject({
      mode: 'curious',
      category: 'Curious',
      input_language: 'en',
      slide_count: 4,
      template_key: 'curious',
      title: 'How Tides Work',
    });
    expect(record.slide_deck.slides.map(s => s.text)).toEqual([
      'How Tides Work',
      'Tides rise twice a day.',
      'The moon pulls the water.',
    ]);
    expect(record.image_assets.map(a => [a.slide_index, a.source])).toEqual([[0, 'ai']]);
    expect(record.voice_assets).toHaveLength(3);
    expect(record.voice_assets[0]).toMatchObject({ provider: 'fake_voice', duration_seconds: 1 });
    expect(record.prompt_curious).toBeDefined();
    expect(record.prompt_news).toBeUndefined();

    const key = `webstory-html/${slugOf(record.canurl)}.html`;
    expect(record.html_url).toBe(`https://cdn.example.com/${key}`);
    expect((await storage.get(key)).toString('utf-8')).toBe(
      '<h1>How Tides Work</h1><p>Tides rise twice a day.</p>\n<p>The moon pulls the water.</p>'
    );
    expect(await repository.get(record.id)).toBe(record);
  });

  it('should finish without images when the image provider fails', async () => {
    const { orchestrator } = setup({ imageFailure: new Error('quota exhausted') });

    const record = await orchestrator.createStory(REQUEST);

    expect(record.image_assets).toEqual([]);
    expect(record.voice_assets).toHaveLength(3);
  });

  it('should fail the story when the language model is down', async () => {
    const { orchestrator, repository } = setup({ llm: new ScriptedModel([new Error('connection refused')]) });

    const error = await orchestrator.createStory(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({ service: 'llm', stage: 'narrative' });
    expect(repository.size).toBe(0);
  });

  it('should stop before a stage once the deadline has passed', async () => {
    let clock = 0;
    const { orchestrator } = setup({
      options: {
        deadlineMs: 2500,
        now: () => {
          clock += 1000;
          return clock;
        },
      },
    });

    const error = await orchestrator.createStory(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({ code: 'DEADLINE_EXCEEDED', stage: 'ingestion' });
  });

  it('should look stories up by id and by slug', async () => {
    const { orchestrator } = setup();
    const record = await orchestrator.createStory(REQUEST);

    expect(await orchestrator.getStory(record.id)).toBe(record);
    expect(await orchestrator.getStory(slugOf(record.canurl))).toBe(record);
    await expect(orchestrator.getStory('no-such-story')).rejects.toBeInstanceOf(NotFoundError);
  });
});
