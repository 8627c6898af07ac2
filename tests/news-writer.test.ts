/**
 * Tests for News Writer and narrative routing
 */

import { describe, it, expect } from 'vitest';
import { NewsWriter, fallbackStructure, narrationLimit } from '../lib/agents/news-writer';
import { NarrativeAgent, NarrativeGenerator, NarrativeRequest, fitSlides, middleSlideCount } from '../lib/agents/narrative';
import { CuriousWriter } from '../lib/agents/curious-writer';
import { emptyInsights } from '../lib/agents/document-intelligence';
import { ExternalServiceError, ValidationError } from '../lib/errors';
import type { NarrativeResponse } from '../lib/types';
import { RecordedCall, ScriptedModel, makePayload } from './helpers';

const ARTICLE =
  'The city council approved a record budget on Monday. Parks and roads get more money. Residents welcomed the vote.';
const SOURCE_URL = 'https://news.example.com/city-council-approves-budget';
const LONG_NARRATION = Array.from({ length: 150 }, () => 'word').join(' ');
const LONG_TITLE = 'City Council Approves Record Budget For Parks And Roads After A Long Night Of Debate Today';

function request(category?: string): NarrativeRequest {
  const insights = emptyInsights();
  insights.semantic_chunks.push({ id: `url:${SOURCE_URL}`, text: ARTICLE, source_id: SOURCE_URL, metadata: {} });
  return {
    prompt: { system: 'system', user: 'Create a news story', metadata: { mode: 'news', language: 'en', keywords: [] } },
    insights,
    slideCount: 5,
    templateKey: 'news',
    category,
  };
}

function desk(call: RecordedCall): string {
  if (call.system.startsWith('You are a news desk editor')) {
    return '{"category": "Politics", "subcategory": "Local", "emotion": "Neutral"}';
  }
  if (call.system.startsWith('You plan')) {
    return '{"slides": [{"title": "Vote", "summary": "Council voted.", "image_prompt": "Council chamber"}]}';
  }
  if (call.system.startsWith('You write cover lines')) {
    return LONG_TITLE;
  }
  return LONG_NARRATION;
}

describe('NewsWriter', () => {
  it('should classify, plan and narrate within the per-slide limits', async () => {
    const result = await new NewsWriter(new ScriptedModel([desk])).generate(request());
    const slides = result.slide_deck.slides;

    expect(result.classification).toEqual({ category: 'Politics', subcategory: 'Local', emotion: 'Neutral' });
    expect(result.title).toBe('City Council Approves Record Budget For Parks And Roads After A Long Night Of…');
    expect(slides).toHaveLength(4);
    expect(slides[0]).toEqual({ placeholder_id: 'cover', text: result.title, image_prompt: 'Council chamber' });
    expect(slides[1].text).toHaveLength(500);
    expect(slides[1].text.endsWith('…')).toBe(true);
    expect(slides[2].text).toHaveLength(450);
    expect(slides[3].text).toHaveLength(250);
    expect(slides[2].image_prompt).toBe('News story background');
  });

  it('should keep the requested category over the detected one', async () => {
    const result = await new NewsWriter(new ScriptedModel([desk])).generate(request('Civic'));
    expect(result.classification).toEqual({ category: 'Civic', subcategory: 'Local', emotion: 'Neutral' });
  });

  it('should anchor prompts to the source URL topic', async () => {
    const model = new ScriptedModel([desk]);
    await new NewsWriter(model).generate(request());
    expect(model.calls[0].user).toContain(
      'IMPORTANT: The story must stay on the topic indicated by the source URL: approves, council, budget, city.'
    );
  });

  it('should leave negative sentences out of the article it sends', async () => {
    const model = new ScriptedModel([desk]);
    const festival = request();
    festival.insights.semantic_chunks[0] = {
      id: 'text:1',
      text:
        'The festival drew large crowds to the river bank. Two people were injured in a crash on the highway. ' +
        'Local bakers sold out of sweets by noon.',
      source_id: 'text',
      metadata: {},
    };
    await new NewsWriter(model).generate(festival);
    expect(model.calls[0].user).toContain(
      'ARTICLE:\nThe festival drew large crowds to the river bank. Local bakers sold out of sweets by noon.'
    );
    expect(model.calls[0].user).not.toContain('crash');
  });

  it('should use the slide summary when narration fails', async () => {
    const model = new ScriptedModel([
      call => {
        if (call.system.startsWith('You narrate')) {
          throw new Error('timeout');
        }
        return desk(call);
      },
    ]);
    const result = await new NewsWriter(model).generate(request());
    expect(result.slide_deck.slides[1].text).toBe('Council voted.');
  });

  it('should raise an external service error when every call fails', async () => {
    const model = new ScriptedModel([new Error('connection refused')]);
    await expect(new NewsWriter(model).generate(request())).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it('should keep the upstream status when the model is down', async () => {
    const model = new ScriptedModel([new ExternalServiceError('openai', 'unavailable', { status: 503 })]);
    await expect(new NewsWriter(model).generate(request())).rejects.toMatchObject({
      service: 'llm',
      status: 503,
      isRetryable: true,
    });
  });
});

describe('news helpers', () => {
  it('should know the narration limit of each slide position', () => {
    expect(narrationLimit(1)).toBe(80);
    expect(narrationLimit(2)).toBe(500);
    expect(narrationLimit(9)).toBe(200);
  });

  it('should split an article into sentence groups', () => {
    expect(fallbackStructure('One. Two. Three. Four', 2).map(s => s.summary)).toEqual(['One. Two', 'Three. Four']);
  });
});

describe('narrative helpers', () => {
  it('should keep at least one middle slide', () => {
    expect(middleSlideCount(7)).toBe(5);
    expect(middleSlideCount(2)).toBe(1);
  });

  it('should pad and truncate to the exact count', () => {
    const pad = (index: number) => ({ placeholder_id: `slide_${index}`, text: 'pad' });
    expect(fitSlides([{ placeholder_id: 'cover', text: 'c' }], 3, pad).map(s => s.placeholder_id)).toEqual([
      'cover',
      'slide_1',
      'slide_2',
    ]);
    expect(fitSlides([{ placeholder_id: 'a', text: '' }, { placeholder_id: 'b', text: '' }], 1, pad)).toHaveLength(1);
  });
});

class FlakyGenerator implements NarrativeGenerator {
  readonly mode = 'news' as const;
  calls = 0;

  constructor(private failures: Error[]) {}

  async generate(): Promise<NarrativeResponse> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return {
      mode: 'news',
      title: 'Budget passes',
      slide_deck: { template_key: 'news', language_code: 'en', slides: [] },
      raw_output: '{}',
    };
  }
}

function narrativeInput() {
  return {
    payload: makePayload(),
    prompt: { system: '', user: '', metadata: { mode: 'news' as const, language: 'en', keywords: [] } },
    insights: emptyInsights(),
  };
}

describe('NarrativeAgent', () => {
  it('should retry a generator that hit a retryable outage', async () => {
    const generator = new FlakyGenerator([new ExternalServiceError('llm', 'unavailable', { status: 503 })]);
    const agent = new NarrativeAgent([generator], { retries: 3, retryDelayMs: 0 });

    const { output, errors } = await agent.execute('run-1', narrativeInput());

    expect(output.title).toBe('Budget passes');
    expect(generator.calls).toBe(2);
    expect(errors).toEqual(['llm: unavailable']);
  });

  it('should not retry final failures', async () => {
    const rejected = new FlakyGenerator([new ExternalServiceError('llm', 'bad request', { status: 400 })]);
    await expect(
      new NarrativeAgent([rejected], { retries: 3, retryDelayMs: 0 }).execute('run-1', narrativeInput())
    ).rejects.toBeInstanceOf(ExternalServiceError);
    expect(rejected.calls).toBe(1);

    const invalid = new FlakyGenerator([new ValidationError('deck has no slides')]);
    await expect(
      new NarrativeAgent([invalid], { retries: 3, retryDelayMs: 0 }).execute('run-1', narrativeInput())
    ).rejects.toBeInstanceOf(ValidationError);
    expect(invalid.calls).toBe(1);
  });


  it('should reject a mode without a generator', async () => {
    const agent = new NarrativeAgent([new CuriousWriter(new ScriptedModel(['{}']))]);
    const input = {
      payload: makePayload(),
      prompt: { system: '', user: '', metadata: { mode: 'news' as const, language: 'en', keywords: [] } },
      insights: emptyInsights(),
    };
    await expect(agent.execute('run-1', input)).rejects.toBeInstanceOf(ValidationError);
  });
});
