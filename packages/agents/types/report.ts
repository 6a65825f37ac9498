// Report aggregate — the terminal artifact of a successful run
// Each field is the output of one pipeline stage

export interface Article {
  readonly headline: string;
  readonly source: string;   // article URL as returned by the news provider
  readonly summary: string;
}

export interface TrendAnalysis {
  readonly trends: string[];
  readonly sentimentShifts: string[];
}

export interface StrategyAnalysis {
  readonly opportunities: string[];
  readonly recommendations: string[];
}

export interface RiskAnalysis {
  readonly risks: string[];
  readonly weakSignals: string[];
  readonly uncertainties: string[];
}

export interface Report {
  readonly topic: string;
  readonly articles: Article[];
  readonly trends: TrendAnalysis;
  readonly strategy: StrategyAnalysis;
  readonly risks: RiskAnalysis;
  /** Present only when voice was requested and the voice stage succeeded */
  readonly voiceScript?: string;
  readonly generatedAt: string;  // ISO-8601
}

/** Output of every stage, keyed by stage name */
export interface StageOutputs {
  articles: Article[];
  trends: TrendAnalysis;
  strategy: StrategyAnalysis;
  risks: RiskAnalysis;
  voiceScript: string;
}

export type StageName = keyof StageOutputs;
