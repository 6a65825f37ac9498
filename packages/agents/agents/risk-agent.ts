// Risk Agent — cross-references trends with proposed strategies

import { z } from 'zod';
import type { RiskAnalysis, StrategyAnalysis, TrendAnalysis } from '../types/report.js';
import { UNPARSED_PLACEHOLDER } from '../utils/json-output.js';
import { MarketAgent, bullets, type AgentContext } from './base-agent.js';

const SYSTEM =
  'You are a risk analyst specialising in emerging market threats. ' +
  'Return ONLY valid JSON with three keys: ' +
  '"risks" (list of 3 market risk strings), ' +
  '"weak_signals" (list of 2 early warning signals), and ' +
  '"uncertainties" (list of 2 major uncertainty factors). ' +
  'No markdown, no code fences.';

const RiskOutputSchema = z
  .object({
    risks: z.array(z.string()).default([]),
    weak_signals: z.array(z.string()).default([]),
    uncertainties: z.array(z.string()).default([]),
  })
  .transform((o): RiskAnalysis => ({
    risks: o.risks,
    weakSignals: o.weak_signals,
    uncertainties: o.uncertainties,
  }));

export interface RiskInput {
  trends: TrendAnalysis;
  strategy: StrategyAnalysis;
}

export class RiskAgent extends MarketAgent<RiskInput, RiskAnalysis> {
  readonly label = 'Risk Agent';

  async run({ trends, strategy }: RiskInput, ctx: AgentContext = {}): Promise<RiskAnalysis> {
    if (trends.trends.length === 0 && strategy.recommendations.length === 0) {
      return { risks: [], weakSignals: [], uncertainties: [] };
    }

    const result = await this.askJson(
      SYSTEM,
      `Market Trends:\n${bullets(trends.trends)}\n\n` +
        `Proposed Strategies:\n${bullets(strategy.recommendations)}\n\n` +
        'Identify the key risks, weak signals, and uncertainties.',
      RiskOutputSchema,
      raw => ({
        risks: [raw],
        weakSignals: [UNPARSED_PLACEHOLDER],
        uncertainties: [UNPARSED_PLACEHOLDER],
      }),
      ctx,
    );

    result.risks.forEach((r, i) => ctx.log?.(`  Risk ${i + 1}: ${r}`));
    return result;
  }
}
