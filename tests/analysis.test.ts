/**
 * Tests for Analysis Agent
 */

import { describe, it, expect } from 'vitest';
import { AnalysisAgent, topKeywords } from '../lib/agents/analysis';
import { emptyInsights } from '../lib/agents/document-intelligence';
import type { DocInsights } from '../lib/types';

const TEXT = 'Solar Power grows fast. Solar panels cover roofs. Solar Power helps.';

function insightsWith(sourceId: string, text: string): DocInsights {
  const insights = emptyInsights();
  insights.semantic_chunks.push({ id: 'chunk-1', text, source_id: sourceId, metadata: {} });
  return insights;
}

describe('topKeywords', () => {
  it('should rank by frequency and skip stop words', () => {
    expect(topKeywords('The river and the river bank, then the valley', 2)).toEqual(['river', 'bank']);
  });
});

describe('AnalysisAgent', () => {
  const agent = new AnalysisAgent();

  it('should derive keywords, entities, summaries and gaps', () => {
    const result = agent.analyze(insightsWith('https://x.example.com', TEXT), []);

    expect(result.keywords).toEqual(['solar', 'power', 'grows', 'fast', 'panels', 'cover', 'roofs', 'helps']);
    expect(result.entities).toEqual({ 'Solar Power': ['chunk-1'] });
    expect(result.summaries).toEqual([TEXT]);
    expect(result.recommended_prompts).toEqual(['Focus the story on: solar, power, grows, fast, panels']);
    expect(result.gaps).toEqual(['Source text is very short']);
  });

  it('should prefer the requested focus keywords and flag prompt-only sources', () => {
    const result = agent.analyze(insightsWith('payload', 'How tides work'), ['tides']);

    expect(result.recommended_prompts).toEqual(['Focus the story on: tides']);
    expect(result.gaps).toEqual([
      'No source documents provided; story relies on prompt text',
      'Source text is very short',
    ]);
  });

  it('should write the result back into the insights', async () => {
    const insights = insightsWith('https://x.example.com', TEXT);
    await agent.execute('run-1', { insights, focus_keywords: [] });

    expect(insights.metadata.keywords).toEqual(['solar', 'power', 'grows', 'fast', 'panels', 'cover', 'roofs', 'helps']);
    expect(insights.summaries).toEqual([TEXT]);
    expect(insights.gaps).toEqual(['Source text is very short']);
  });
});
