// Tavily news search client with caching and rate limiting

import { z } from 'zod';

const TavilyResultSchema = z
  .object({
    title: z.string().default(''),
    url: z.string().default(''),
    content: z.string().default(''),
    snippet: z.string().default(''),
  })
  .transform(({ snippet, ...result }) => ({ ...result, content: result.content || snippet }));

const TavilyResponseSchema = z.object({
  results: z.array(TavilyResultSchema).default([]),
});

export type NewsResult = z.infer<typeof TavilyResultSchema>;

export interface NewsSearch {
  search(query: string, signal?: AbortSignal): Promise<NewsResult[]>;
}

export interface NewsClientConfig {
  apiKey?: string;
  baseUrl?: string;
  /** Requests per minute */
  rateLimit?: number;
  /** Seconds, 0 disables caching */
  cacheTtl?: number;
  maxResults?: number;
  requestTimeoutMs?: number;
}

interface CacheEntry {
  data: NewsResult[];
  expiresAt: number;
}

const MAX_CACHE_ENTRIES = 1000;

export class TavilyNewsClient implements NewsSearch {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly rateLimit: number;
  private readonly cacheTtl: number;
  private readonly maxResults: number;
  private readonly requestTimeoutMs: number;

  private readonly cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];

  constructor(config: NewsClientConfig = {}) {
    this.apiKey = config.apiKey ?? '';
    this.baseUrl = config.baseUrl ?? 'https://api.tavily.com';
    this.rateLimit = config.rateLimit ?? 60;
    this.cacheTtl = config.cacheTtl ?? 300;
    this.maxResults = config.maxResults ?? 5;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 15_000;
  }

  async search(query: string, signal?: AbortSignal): Promise<NewsResult[]> {
    if (!this.apiKey) {
      throw new Error('TAVILY_API_KEY environment variable is not set');
    }

    const cacheKey = `${query}\u0000${this.maxResults}`;
    if (this.cacheTtl > 0) {
      const cached = this.getCached(cacheKey);
      if (cached !== undefined) return cached;
    }

    if (this.isRateLimited()) {
      throw new Error(`Tavily rate limit exceeded (${this.rateLimit} req/min). Try again shortly.`);
    }
    this.requestTimestamps.push(Date.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error('Tavily: request timed out')), this.requestTimeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    else signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const url = new URL('search', this.baseUrl.endsWith('/') ? this.baseUrl : this.baseUrl + '/');
      const res = await fetch(url.toString(), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          search_depth: 'advanced',
          topic: 'news',
          max_results: this.maxResults,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        if (res.status === 401) throw new Error('Tavily: Invalid API key');
        if (res.status === 429) throw new Error('Tavily: Rate limited by server');
        throw new Error(`Tavily: HTTP ${res.status} — ${body.slice(0, 200)}`);
      }

      const parsed = TavilyResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`Tavily: Unexpected response shape — ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }

      const results = parsed.data.results;
      if (this.cacheTtl > 0) this.setCache(cacheKey, results);
      return results;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.rateLimit;
  }

  private getCached(key: string): NewsResult[] | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  private setCache(key: string, data: NewsResult[]): void {
    this.cache.set(key, { data, expiresAt: Date.now() + this.cacheTtl * 1000 });
    if (this.cache.size > MAX_CACHE_ENTRIES) {
      const now = Date.now();
      for (const [k, v] of this.cache) {
        if (now > v.expiresAt) this.cache.delete(k);
      }
    }
  }
}
