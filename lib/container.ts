/**
 * Service container - builds the process-wide story pipeline once
 */

import { Config } from './config';
import { Logger } from './utils';
import { Orchestrator } from './orchestrator';
import { OpenAIChatModel, openAIClientFromConfig } from './tools/llm';
import { StorageTool } from './tools/storage';
import { CheerioArticleExtractor } from './tools/article-extractor';
import { UrlContentValidator } from './tools/url-validator';
import { DocumentOcrAdapter, ParagraphParser, PlainTextOcrAdapter, VisionOcrAdapter } from './tools/ocr';
import { HtmlRenderer } from './tools/html-renderer';
import { NoopStoryRepository, StorageStoryRepository, StoryRepository } from './tools/story-repository';
import { OpenAiTtsProvider } from './tools/tts';
import { AzureTtsProvider, ElevenLabsTtsProvider } from './tools/tts-rest';
import { AiImageProvider, OpenAIImageModel } from './tools/images/ai-provider';
import { PexelsImageProvider } from './tools/images/pexels-provider';
import { UserUploadProvider } from './tools/images/upload-provider';
import { ArticleImageProvider, NewsDefaultProvider } from './tools/images/article-provider';
import { ImageStorageService } from './tools/images/image-storage';

import { IntakeAgent } from './agents/intake';
import { LanguageAgent } from './agents/language';
import { IngestionAgent } from './agents/ingestion';
import { DocumentIntelligenceAgent } from './agents/document-intelligence';
import { AnalysisAgent } from './agents/analysis';
import { PromptSelectionAgent } from './agents/prompt-selection';
import { NarrativeAgent } from './agents/narrative';
import { CuriousWriter } from './agents/curious-writer';
import { NewsWriter } from './agents/news-writer';
import { ImageAgent } from './agents/image-director';
import { VoiceAgent } from './agents/voice-director';

let orchestrator: Orchestrator | undefined;

function buildRepository(storage: StorageTool): StoryRepository {
  switch (Config.REPOSITORY_BACKEND) {
    case 'storage':
      return new StorageStoryRepository(storage);
    case 'noop':
      return new NoopStoryRepository();
    default:
      throw new Error(`Unknown repository backend: ${Config.REPOSITORY_BACKEND}`);
  }
}

function buildOrchestrator(): Orchestrator {
  const client = openAIClientFromConfig();
  const llm = OpenAIChatModel.fromConfig(client);
  const storage = new StorageTool();

  const documents = new DocumentIntelligenceAgent({
    extractor: new CheerioArticleExtractor(),
    validator: new UrlContentValidator(),
    ocrAdapters: [new PlainTextOcrAdapter(), new DocumentOcrAdapter(), new VisionOcrAdapter(llm)],
    parsers: [new ParagraphParser()],
  });

  // first provider that supports the request wins, so order matters
  const images = new ImageAgent(
    [
      new AiImageProvider(new OpenAIImageModel(client), { llm }),
      new PexelsImageProvider(),
      new UserUploadProvider(),
      new NewsDefaultProvider(),
      new ArticleImageProvider(),
    ],
    new ImageStorageService(storage)
  );

  const voice = new VoiceAgent(
    [new AzureTtsProvider(), new ElevenLabsTtsProvider(), new OpenAiTtsProvider(client)],
    storage
  );

  Logger.info('Story pipeline ready', {
    storage_backend: Config.STORAGE_BACKEND,
    repository_backend: Config.REPOSITORY_BACKEND,
    default_voice: Config.DEFAULT_VOICE_PROVIDER,
  });

  return new Orchestrator(
    {
      intake: new IntakeAgent(),
      language: new LanguageAgent(),
      ingestion: new IngestionAgent(),
      documents,
      analysis: new AnalysisAgent(),
      prompts: new PromptSelectionAgent(),
      narrative: new NarrativeAgent([new NewsWriter(llm), new CuriousWriter(llm)]),
      images,
      voice,
    },
    {
      repository: buildRepository(storage),
      renderer: new HtmlRenderer({ bucket: storage.bucket }),
      htmlStorage: storage,
    }
  );
}

export function getOrchestrator(): Orchestrator {
  if (!orchestrator) {
    orchestrator = buildOrchestrator();
  }
  return orchestrator;
}
