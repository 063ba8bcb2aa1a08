export type Action = "ALLOW" | "RESTRICT" | "BLOCK";

export type RiskLevel = "low" | "medium" | "high" | "critical";

export interface KeywordPattern {
  phrase: string;
  words: readonly string[];
  maxGap: number;
}

export interface Bucket {
  name: string;
  risk: RiskLevel;
  weight: number;
  hard: boolean;
  patterns: readonly KeywordPattern[];
}

export type BucketTable = readonly Bucket[];

export interface TokenSpan {
  start: number;
  end: number;
}

export interface BucketMatch {
  bucket: string;
  risk: RiskLevel;
  weight: number;
  hard: boolean;
  hits: number;
  patterns: string[];
  occurrences: number;
  spans: TokenSpan[];
}

export type MatchResult = BucketMatch[];

export interface DecisionPolicy {
  restrictThreshold: number;
  blockThreshold: number;
}

export interface Decision {
  action: Action;
  score: number;
  reason: string;
  buckets_hit: Record<string, number>;
  matches: MatchResult;
}
