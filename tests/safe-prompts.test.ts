/**
 * Tests for content-policy prompt handling and the image cooldown
 */

import { describe, it, expect } from 'vitest';
import {
  SafePromptLadder,
  genericSafePrompt,
  removeUnsafeTerms,
  safeTopicTerm,
  sanitizeRevisedPrompt,
} from '../lib/tools/images/safe-prompts';
import { CooldownLimiter } from '../lib/tools/images/cooldown';

const MODIFIERS = 'family-friendly, calm, optimistic mood, professional quality, clean composition';

describe('removeUnsafeTerms', () => {
  it('should drop unsafe words and tidy the spacing', () => {
    expect(removeUnsafeTerms('Police arrest suspect after bomb attack downtown')).toBe('Police suspect after downtown');
  });
});

describe('sanitizeRevisedPrompt', () => {
  it('should cut long prompts at a late comma', () => {
    const prompt = `${'a'.repeat(150)}, ${'b'.repeat(100)}`;
    expect(sanitizeRevisedPrompt(prompt)).toBe(`${'a'.repeat(150)},`);
  });

  it('should hard-cut when there is no late break', () => {
    expect(sanitizeRevisedPrompt('a'.repeat(250))).toBe('a'.repeat(200));
  });
});

describe('safeTopicTerm', () => {
  it('should prefer a term from the topic', () => {
    expect(safeTopicTerm('Economy grows fast')).toBe('economy');
  });

  it('should fall back to the opening words of the prompt', () => {
    expect(safeTopicTerm('Cricket final', 'science lesson today')).toBe('science');
    expect(safeTopicTerm('Cricket final', 'Cricket final at dawn')).toBeNull();
  });
});

describe('SafePromptLadder', () => {
  it('should step through progressively safer prompts', () => {
    const ladder = new SafePromptLadder('Cricket final', 'Cricket final at dawn', 2);

    expect(ladder.next('')).toBe(
      `professional news themed editorial illustration, informative, uplifting, clean design, modern aesthetic, ${MODIFIERS}`
    );
    expect(ladder.next()).toBe(`professional news themed illustration, clean, modern, uplifting, ${MODIFIERS}`);
    expect(ladder.next()).toBe(genericSafePrompt(2));
    expect(ladder.next()).toBeNull();
  });

  it('should try the revised prompt first', () => {
    expect(new SafePromptLadder('x', 'y', 0).next('A calm stadium at dawn')).toBe('A calm stadium at dawn');
  });

  it('should build the generic prompt from the slide index', () => {
    expect(genericSafePrompt(2)).toBe(
      'professional business illustration, with modern design elements, professional, clean, modern, positive, informative, high quality'
    );
  });
});

describe('CooldownLimiter', () => {
  it('should space task starts by the interval', async () => {
    let clock = 1000;
    const waits: number[] = [];
    const limiter = new CooldownLimiter(
      100,
      () => clock,
      async ms => {
        waits.push(ms);
        clock += ms;
      }
    );

    const first = limiter.schedule(async () => 'a');
    const second = limiter.schedule(async () => 'b');

    await expect(first).resolves.toBe('a');
    await expect(second).resolves.toBe('b');
    expect(waits).toEqual([100]);
  });

  it('should keep going after a task fails', async () => {
    const limiter = new CooldownLimiter(0);
    const failing = limiter.schedule(async () => {
      throw new Error('boom');
    });
    const next = limiter.schedule(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
