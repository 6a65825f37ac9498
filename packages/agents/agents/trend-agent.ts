// Trend Agent — major trends and sentiment shifts across article summaries

import { z } from 'zod';
import type { Article, TrendAnalysis } from '../types/report.js';
import { UNPARSED_PLACEHOLDER } from '../utils/json-output.js';
import { MarketAgent, type AgentContext } from './base-agent.js';

const SYSTEM =
  'You are a market research analyst specialising in trend detection. ' +
  'Return ONLY valid JSON with two keys: ' +
  '"trends" (list of 3 strings) and ' +
  '"sentiment_shifts" (list of strings describing sentiment changes). ' +
  'No markdown, no code fences.';

const TrendOutputSchema = z
  .object({
    trends: z.array(z.string()).default([]),
    sentiment_shifts: z.array(z.string()).default([]),
  })
  .transform((o): TrendAnalysis => ({ trends: o.trends, sentimentShifts: o.sentiment_shifts }));

export class TrendAgent extends MarketAgent<Article[], TrendAnalysis> {
  readonly label = 'Trend Agent';

  async run(articles: Article[], ctx: AgentContext = {}): Promise<TrendAnalysis> {
    if (articles.length === 0) {
      return { trends: [], sentimentShifts: [] };
    }

    const brief = articles
      .map(a => `- [${a.source}] ${a.headline}: ${a.summary}`)
      .join('\n');

    const result = await this.askJson(
      SYSTEM,
      `News summaries:\n${brief}\n\nIdentify 3 major market trends and any notable sentiment shifts.`,
      TrendOutputSchema,
      raw => ({ trends: [raw], sentimentShifts: [UNPARSED_PLACEHOLDER] }),
      ctx,
    );

    result.trends.forEach((t, i) => ctx.log?.(`  Trend ${i + 1}: ${t}`));
    return result;
  }
}
