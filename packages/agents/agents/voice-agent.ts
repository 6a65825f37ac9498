// Voice Agent — 60-second broadcast script from the finished analysis

import type { RiskAnalysis, StrategyAnalysis, TrendAnalysis } from '../types/report.js';
import { MarketAgent, type AgentContext } from './base-agent.js';

const SYSTEM =
  'You are a professional radio broadcaster. ' +
  'Convert the market intelligence report into a concise 60-second verbal briefing. ' +
  'Use natural, spoken language.';

export interface VoiceInput {
  topic: string;
  trends: TrendAnalysis;
  strategy: StrategyAnalysis;
  risks: RiskAnalysis;
}

export function buildVoiceBrief({ topic, trends, strategy, risks }: VoiceInput): string {
  return (
    `Market Intelligence on '${topic}': ` +
    trends.trends.join(' | ') + '. ' +
    'Opportunities: ' + strategy.opportunities.join('; ') + '. ' +
    'Key Risks: ' + risks.risks.join('; ')
  );
}

export class VoiceAgent extends MarketAgent<VoiceInput, string> {
  readonly label = 'Voice Agent';

  async run(input: VoiceInput, ctx: AgentContext = {}): Promise<string> {
    const script = await this.chat(SYSTEM, buildVoiceBrief(input), ctx);
    if (!script.trim()) {
      throw new Error('Voice agent returned an empty script');
    }
    return script;
  }
}
