/**
 * Prompt Selection Agent - Picks and renders the prompt template for a mode
 */

import { BaseAgent } from './base';
import { DocInsights, IntakePayload, LanguageMetadata, RenderedPrompt, StoryMode } from '../types';
import { languageName } from '../tools/language-detection';

export interface PromptSelectionInput {
  payload: IntakePayload;
  language: LanguageMetadata;
  insights: DocInsights;
}

interface PromptTemplate {
  system: string;
  user: (vars: TemplateVars) => string;
}

interface TemplateVars {
  slideCount: number;
  language: string;
  category: string;
  keywords: string;
  summary: string;
  focus: string;
}

const TEMPLATES: Record<StoryMode, PromptTemplate> = {
  news: {
    system:
      'You are a senior news editor who turns reported articles into short, factual, neutral web stories. ' +
      'Never invent facts that are not in the source.',
    user: v =>
      `Create a ${v.slideCount}-slide news web story in ${v.language}.\n` +
      `Category: ${v.category}\n` +
      `Keywords: ${v.keywords}\n` +
      `${v.focus}\n\n` +
      `Source summary:\n${v.summary}`,
  },
  curious: {
    system:
      'You are an educational storyteller who explains ideas clearly for a curious general audience. ' +
      'Keep the tone warm, simple and accurate.',
    user: v =>
      `Create a ${v.slideCount}-slide explanatory web story in ${v.language}.\n` +
      `Topic keywords: ${v.keywords}\n` +
      `${v.focus}\n\n` +
      `What the reader asked about:\n${v.summary}`,
  },
};

export class PromptSelectionAgent extends BaseAgent<PromptSelectionInput, RenderedPrompt> {
  constructor() {
    super({ name: 'PromptSelectionAgent' });
  }

  protected async process(input: PromptSelectionInput): Promise<RenderedPrompt> {
    return this.render(input.payload, input.language, input.insights);
  }

  render(payload: IntakePayload, language: LanguageMetadata, insights: DocInsights): RenderedPrompt {
    const template = TEMPLATES[payload.mode];
    const keywords = payload.prompt_keywords.length > 0
      ? [...payload.prompt_keywords]
      : (Array.isArray(insights.metadata.keywords) ? insights.metadata.keywords.filter((k): k is string => typeof k === 'string') : []);

    const summary = insights.summaries[0] || insights.semantic_chunks[0]?.text.substring(0, 600) || payload.text_prompt || '';

    return {
      system: template.system,
      user: template.user({
        slideCount: payload.slide_count,
        language: languageName(language.language_code),
        category: payload.category || 'General',
        keywords: keywords.join(', ') || 'none',
        summary,
        focus: insights.recommended_prompts.join('\n'),
      }),
      metadata: {
        mode: payload.mode,
        language: language.language_code,
        category: payload.category,
        keywords,
      },
    };
  }
}
