/**
 * Shared stand-ins for tests
 */

import { IntakeAgent } from '../lib/agents/intake';
import type { CompletionOptions, LanguageModel } from '../lib/tools/llm';
import type { IntakePayload, StoryCreateRequest, StoryRecord } from '../lib/types';

export function makePayload(overrides: Partial<StoryCreateRequest> = {}): IntakePayload {
  return new IntakeAgent().normalize({
    mode: 'news',
    template_key: 'news',
    slide_count: 5,
    ...overrides,
  });
}

export function makeRecord(overrides: Partial<StoryRecord> = {}): StoryRecord {
  return {
    id: '0b6f5d2e-1c1a-4f7e-9a51-3d2c8e4b7a10',
    mode: 'news',
    category: 'Politics',
    input_language: 'en',
    slide_count: 2,
    template_key: 'news',
    title: 'Council Approves Budget',
    doc_insights: { semantic_chunks: [], entities: {}, summaries: [], recommended_prompts: [], gaps: [], metadata: {} },
    slide_deck: {
      template_key: 'news',
      language_code: 'en',
      slides: [
        { placeholder_id: 'cover', text: 'Council Approves Budget' },
        { placeholder_id: 'slide_1', text: 'The vote was **close**.', image_prompt: 'Council chamber' },
      ],
    },
    image_assets: [],
    voice_assets: [],
    canurl: 'https://stories.example.com/council-approves-budget_abc123DEF0_G',
    canurl1: 'https://stories.example.com/council-approves-budget_abc123DEF0_G.html',
    created_at: '2026-01-15T08:00:00.000Z',
    ...overrides,
  };
}

export interface RecordedCall {
  system: string;
  user: string;
  options?: CompletionOptions;
}

type Reply = string | Error | ((call: RecordedCall) => string);

/**
 * Language model that answers from a script. Replies are consumed in order;
 * the last one repeats once the script runs out.
 */
export class ScriptedModel implements LanguageModel {
  readonly calls: RecordedCall[] = [];

  constructor(private replies: Reply[]) {}

  async complete(system: string, user: string, options?: CompletionOptions): Promise<string> {
    const call = { system, user, options };
    this.calls.push(call);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error('no scripted reply');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(call) : reply;
  }
}

export const noWait = async (): Promise<void> => {};
