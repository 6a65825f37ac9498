// Data Agent — news retrieval + one-sentence summary per article

import type { Article } from '../types/report.js';
import type { ChatModel } from '../bridge/llm-client.js';
import type { NewsSearch } from '../bridge/news-client.js';
import { MarketAgent, type AgentContext } from './base-agent.js';

const SUMMARY_SYSTEM = 'You are a concise financial news analyst. Summarise the article in one sentence.';
const MAX_CONTENT_CHARS = 1500;

export class DataAgent extends MarketAgent<string, Article[]> {
  readonly label = 'Data Agent';

  constructor(
    llm: ChatModel,
    private readonly news: NewsSearch,
    private readonly maxArticles = 5,
  ) {
    super(llm);
  }

  async run(topic: string, ctx: AgentContext = {}): Promise<Article[]> {
    const results = await this.news.search(topic, ctx.signal);
    if (results.length === 0) {
      ctx.log?.(`⚠️  [${this.label}] No results returned from news search.`);
      return [];
    }

    const articles: Article[] = [];
    for (const item of results.slice(0, this.maxArticles)) {
      const headline = item.title || 'No title';
      const source = item.url || 'Unknown source';

      const summary = await this.chat(
        SUMMARY_SYSTEM,
        `Article title: ${headline}\n\nContent: ${item.content.slice(0, MAX_CONTENT_CHARS)}`,
        ctx,
      );

      articles.push({ headline, source, summary });
      ctx.log?.(`  ✔ ${headline.slice(0, 80)}`);
    }
    return articles;
  }
}
