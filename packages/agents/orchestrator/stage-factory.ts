// Factory for the market-intelligence pipeline
// data → trends → strategy → risks → (voice, optional)

import type { Article, RiskAnalysis, StrategyAnalysis, TrendAnalysis } from '../types/report.js';
import type { ChatModel } from '../bridge/llm-client.js';
import type { NewsSearch } from '../bridge/news-client.js';
import type { StageAgent } from '../agents/base-agent.js';
import { DataAgent } from '../agents/data-agent.js';
import { TrendAgent } from '../agents/trend-agent.js';
import { StrategyAgent } from '../agents/strategy-agent.js';
import { RiskAgent, type RiskInput } from '../agents/risk-agent.js';
import { VoiceAgent, type VoiceInput } from '../agents/voice-agent.js';
import { createPipeline, defineStage, type Pipeline } from './pipeline.js';

export interface MarketAgents {
  data: StageAgent<string, Article[]>;
  trend: StageAgent<Article[], TrendAnalysis>;
  strategy: StageAgent<TrendAnalysis, StrategyAnalysis>;
  risk: StageAgent<RiskInput, RiskAnalysis>;
  voice: StageAgent<VoiceInput, string>;
}

export interface MarketAgentDeps {
  llm: ChatModel;
  news: NewsSearch;
  maxArticles?: number;
}

export function createMarketAgents({ llm, news, maxArticles }: MarketAgentDeps): MarketAgents {
  return {
    data: new DataAgent(llm, news, maxArticles),
    trend: new TrendAgent(llm),
    strategy: new StrategyAgent(llm),
    risk: new RiskAgent(llm),
    voice: new VoiceAgent(llm),
  };
}

export function createMarketIntelPipeline(agents: MarketAgents): Pipeline {
  return createPipeline([
    defineStage({
      name: 'articles',
      label: agents.data.label,
      announce: `🔍 [${agents.data.label}] Searching for recent news...`,
      inputs: [],
      invoke: (input, ctx) => agents.data.run(input.topic, ctx),
      summarize: articles => `[${agents.data.label}] Retrieved ${articles.length} articles.`,
    }),
    defineStage({
      name: 'trends',
      label: agents.trend.label,
      announce: `📈 [${agents.trend.label}] Detecting market trends and sentiment shifts...`,
      inputs: ['articles'],
      invoke: (input, ctx) => agents.trend.run(input.get('articles'), ctx),
      summarize: t => `[${agents.trend.label}] Found ${t.trends.length} trends, ${t.sentimentShifts.length} sentiment shifts.`,
    }),
    defineStage({
      name: 'strategy',
      label: agents.strategy.label,
      announce: `💡 [${agents.strategy.label}] Generating strategic opportunities...`,
      inputs: ['trends'],
      invoke: (input, ctx) => agents.strategy.run(input.get('trends'), ctx),
      summarize: s =>
        `[${agents.strategy.label}] ${s.opportunities.length} opportunities, ${s.recommendations.length} recommendations.`,
    }),
    defineStage({
      name: 'risks',
      label: agents.risk.label,
      announce: `⚠️  [${agents.risk.label}] Identifying risks and weak signals...`,
      inputs: ['trends', 'strategy'],
      invoke: (input, ctx) =>
        agents.risk.run({ trends: input.get('trends'), strategy: input.get('strategy') }, ctx),
      summarize: r =>
        `[${agents.risk.label}] ${r.risks.length} risks, ${r.weakSignals.length} weak signals, ${r.uncertainties.length} uncertainties.`,
    }),
    defineStage({
      name: 'voiceScript',
      label: agents.voice.label,
      announce: `🎙️  [${agents.voice.label}] Writing broadcast script...`,
      inputs: ['trends', 'strategy', 'risks'],
      optional: true,
      enabled: run => run.includeVoice,
      invoke: (input, ctx) =>
        agents.voice.run(
          {
            topic: input.topic,
            trends: input.get('trends'),
            strategy: input.get('strategy'),
            risks: input.get('risks'),
          },
          ctx,
        ),
      summarize: script => `[${agents.voice.label}] Script ready (${script.split(/\s+/).filter(Boolean).length} words).`,
    }),
  ]);
}
