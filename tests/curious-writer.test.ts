/**
 * Tests for Curious Writer
 */

import { describe, it, expect } from 'vitest';
import { CuriousWriter } from '../lib/agents/curious-writer';
import { GENERIC_ALT, NarrativeRequest } from '../lib/agents/narrative';
import { emptyInsights } from '../lib/agents/document-intelligence';
import { ExternalServiceError } from '../lib/errors';
import { ScriptedModel } from './helpers';

const SOURCE = 'Tides are caused by the moon.';

function request(slideCount: number, language = 'en'): NarrativeRequest {
  const insights = emptyInsights();
  insights.semantic_chunks.push({ id: 'payload:text', text: SOURCE, source_id: 'payload', metadata: {} });
  return {
    prompt: { system: 'system', user: 'Explain tides', metadata: { mode: 'curious', language, keywords: [] } },
    insights,
    slideCount,
    templateKey: 'curious',
  };
}

const fullReply = JSON.stringify({
  language: 'en',
  storytitle: 'How Tides Work',
  s0alt1: 'Ocean under moonlight',
  s1paragraph1: '**Tides** rise twice a day.',
  s2paragraph1: 'The moon pulls the water.',
  s3paragraph1: 'The sun helps a little.',
  s4paragraph1: 'Spring tides are strongest.',
  s5paragraph1: 'Neap tides are weakest.',
  s1alt1: 'Beach at high tide',
  s2alt1: 'Moon over the sea',
  s3alt1: 'Sun and moon aligned',
  s4alt1: 'Big waves',
  s5alt1: 'Calm harbour',
});

describe('CuriousWriter', () => {
  it('should build cover plus slide_count - 2 slides from one structured call', async () => {
    const model = new ScriptedModel([fullReply]);
    const result = await new CuriousWriter(model).generate(request(7));

    expect(model.calls).toHaveLength(1);
    expect(model.calls[0].options).toEqual({ json: true });
    expect(result.title).toBe('How Tides Work');
    expect(result.slide_deck.slides).toHaveLength(6);
    expect(result.slide_deck.slides[0]).toEqual({
      placeholder_id: 'cover',
      text: 'How Tides Work',
      image_prompt: 'Ocean under moonlight',
    });
    expect(result.slide_deck.slides[1]).toEqual({
      placeholder_id: 'slide_1',
      text: 'Tides rise twice a day.',
      image_prompt: 'Beach at high tide',
    });
    expect(result.slide_deck.slides[5].placeholder_id).toBe('slide_5');
    expect(JSON.parse(result.raw_output).s1paragraph1).toBe('Tides rise twice a day.');
  });

  it('should fall back to the source text when the reply is not JSON', async () => {
    const model = new ScriptedModel(['not json at all']);
    const result = await new CuriousWriter(model).generate(request(4));

    expect(result.title).toBe(SOURCE);
    expect(result.slide_deck.slides.map(s => s.text)).toEqual([SOURCE, SOURCE, 'Slide 2 content']);
    expect(result.slide_deck.slides[0].image_prompt).toBe(
      `Cover for the story titled '${SOURCE}': welcoming, abstract, educational motif — ${GENERIC_ALT}`
    );
    expect(result.slide_deck.slides[1].image_prompt).toBe(`${SOURCE} — ${GENERIC_ALT}`);
  });

  it('should translate missing alt text to English for other languages', async () => {
    const model = new ScriptedModel([
      JSON.stringify({ storytitle: 'ज्वार', s1paragraph1: 'चंद्रमा पानी खींचता है।', s2paragraph1: 'दिन में दो बार।' }),
      'Ocean tides under the moon',
      'Waves on a beach',
    ]);
    const result = await new CuriousWriter(model).generate(request(4, 'hi'));

    expect(model.calls).toHaveLength(4);
    expect(result.slide_deck.language_code).toBe('hi');
    expect(result.slide_deck.slides[0].image_prompt).toBe(
      `Cover illustration for story about Ocean tides under the moon: welcoming, abstract, educational motif — ${GENERIC_ALT}`
    );
    expect(result.slide_deck.slides[2].image_prompt).toBe(`Waves on a beach — ${GENERIC_ALT}`);
  });

  it('should raise an external service error when the model is down', async () => {
    const model = new ScriptedModel([new Error('connection refused')]);
    await expect(new CuriousWriter(model).generate(request(5))).rejects.toBeInstanceOf(ExternalServiceError);
  });
});
