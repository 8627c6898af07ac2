/**
 * Analysis Agent - Keyword, entity and gap heuristics over DocInsights
 */

import { BaseAgent } from './base';
import { AnalysisResult, DocInsights } from '../types';
import { summarize } from '../tools/article-extractor';
import stopwordList from '../../data/stopwords.json';

export interface AnalysisInput {
  insights: DocInsights;
  focus_keywords: string[];
}

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);
const ENTITY_PATTERN = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+\b/g;
export const SHORT_SOURCE_LENGTH = 200;

export function topKeywords(text: string, limit = 8): string[] {
  const counts = new Map<string, number>();
  for (const match of text.toLowerCase().matchAll(/[\p{L}\p{M}]{4,}/gu)) {
    const word = match[0];
    if (!STOPWORDS.has(word)) {
      counts.set(word, (counts.get(word) || 0) + 1);
    }
  }
  // Map preserves insertion order, so ties keep first appearance
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}

export class AnalysisAgent extends BaseAgent<AnalysisInput, AnalysisResult> {
  constructor() {
    super({ name: 'AnalysisAgent' });
  }

  protected async process(input: AnalysisInput): Promise<AnalysisResult> {
    const result = this.analyze(input.insights, input.focus_keywords);
    this.apply(input.insights, result);
    return result;
  }

  analyze(insights: DocInsights, focusKeywords: string[]): AnalysisResult {
    const allText = insights.semantic_chunks.map(c => c.text).join('\n');
    const keywords = topKeywords(allText);

    const entities: Record<string, string[]> = {};
    for (const chunk of insights.semantic_chunks) {
      for (const match of chunk.text.matchAll(ENTITY_PATTERN)) {
        const seenIn = entities[match[0]] ?? [];
        if (!seenIn.includes(chunk.id)) {
          seenIn.push(chunk.id);
        }
        entities[match[0]] = seenIn;
      }
    }

    const summaries = insights.summaries.length > 0
      ? [...insights.summaries]
      : insights.semantic_chunks.slice(0, 1).map(c => summarize(c.text)).filter(s => s.length > 0);

    const focus = focusKeywords.length > 0 ? focusKeywords : keywords.slice(0, 5);
    const recommended_prompts = focus.length > 0 ? [`Focus the story on: ${focus.join(', ')}`] : [];

    const gaps: string[] = [];
    if (!insights.semantic_chunks.some(c => c.source_id !== 'payload')) {
      gaps.push('No source documents provided; story relies on prompt text');
    }
    if (allText.trim().length < SHORT_SOURCE_LENGTH) {
      gaps.push('Source text is very short');
    }

    return { keywords, entities, summaries, recommended_prompts, gaps };
  }

  apply(insights: DocInsights, result: AnalysisResult): void {
    insights.entities = { ...insights.entities, ...result.entities };
    if (result.summaries.length > 0) {
      insights.summaries = result.summaries;
    }
    if (result.recommended_prompts.length > 0) {
      insights.recommended_prompts = result.recommended_prompts;
    }
    insights.gaps = result.gaps;
    insights.metadata.keywords = result.keywords;
  }
}
