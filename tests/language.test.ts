/**
 * Tests for Language Agent and detection helpers
 */

import { describe, it, expect } from 'vitest';
import { LanguageAgent } from '../lib/agents/language';
import { ScriptLanguageStrategy, detectLanguageRequest, languageName } from '../lib/tools/language-detection';
import { ValidationError } from '../lib/errors';
import { makePayload } from './helpers';

describe('detectLanguageRequest', () => {
  it('should find an explicit request', () => {
    expect(detectLanguageRequest('tell me about monsoons in hindi')).toBe('hi');
    expect(detectLanguageRequest('marathi mein batao')).toBe('mr');
  });

  it('should return null without a request', () => {
    expect(detectLanguageRequest('tell me about monsoons')).toBeNull();
    expect(detectLanguageRequest(undefined)).toBeNull();
  });
});

describe('ScriptLanguageStrategy', () => {
  const strategy = new ScriptLanguageStrategy();

  it('should report the dominant script', () => {
    expect(strategy.detect('भारत की राजधानी')).toEqual({ language_code: 'hi', confidence: 1 });
    expect(strategy.detect('Hello world')).toEqual({ language_code: 'en', confidence: 1 });
  });

  it('should fall back to the default with zero confidence', () => {
    expect(strategy.detect('12345 !!')).toEqual({ language_code: 'en', confidence: 0 });
  });
});

describe('languageName', () => {
  it('should resolve region-qualified codes', () => {
    expect(languageName('hi-IN')).toBe('Hindi');
    expect(languageName('xx')).toBe('English');
  });
});

describe('LanguageAgent', () => {
  it('should honour an explicit request over the script', () => {
    const agent = new LanguageAgent();
    const result = agent.detect(makePayload({ text_prompt: 'Tell me about monsoons in hindi' }));
    expect(result.language_code).toBe('hi');
    expect(result.confidence).toBe(0.95);
    expect(result.source_text_preview).toBe('Tell me about monsoons in hindi');
  });

  it('should use the default language when there is no text', () => {
    expect(new LanguageAgent().detect(makePayload())).toEqual({ language_code: 'en', confidence: 0 });
  });

  it('should reject an unparseable language code', () => {
    const agent = new LanguageAgent({ detect: () => ({ language_code: 'english', confidence: 0.9 }) });
    expect(() => agent.detect(makePayload({ text_prompt: 'Hello' }))).toThrow(ValidationError);
  });

  it('should reject confidence outside 0..1', () => {
    const agent = new LanguageAgent({ detect: () => ({ language_code: 'en', confidence: 1.5 }) });
    expect(() => agent.detect(makePayload({ text_prompt: 'Hello' }))).toThrow(ValidationError);
  });
});
