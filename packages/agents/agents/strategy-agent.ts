// Strategy Agent — opportunities and recommendations from detected trends

import { z } from 'zod';
import type { StrategyAnalysis, TrendAnalysis } from '../types/report.js';
import { UNPARSED_PLACEHOLDER } from '../utils/json-output.js';
import { MarketAgent, bullets, type AgentContext } from './base-agent.js';

const SYSTEM =
  'You are a senior business strategist. ' +
  'Return ONLY valid JSON with two keys: ' +
  '"opportunities" (list of 3 business opportunity strings) and ' +
  '"recommendations" (list of 3 strategic recommendation strings). ' +
  'No markdown, no code fences.';

const StrategyOutputSchema = z.object({
  opportunities: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
});

export class StrategyAgent extends MarketAgent<TrendAnalysis, StrategyAnalysis> {
  readonly label = 'Strategy Agent';

  async run(trends: TrendAnalysis, ctx: AgentContext = {}): Promise<StrategyAnalysis> {
    if (trends.trends.length === 0 && trends.sentimentShifts.length === 0) {
      return { opportunities: [], recommendations: [] };
    }

    const result = await this.askJson(
      SYSTEM,
      `Market Trends:\n${bullets(trends.trends)}\n\n` +
        `Sentiment Shifts:\n${bullets(trends.sentimentShifts)}\n\n` +
        'Generate concrete business opportunities and strategic recommendations.',
      StrategyOutputSchema,
      raw => ({ opportunities: [raw], recommendations: [UNPARSED_PLACEHOLDER] }),
      ctx,
    );

    result.opportunities.forEach((o, i) => ctx.log?.(`  Opportunity ${i + 1}: ${o}`));
    return result;
  }
}
